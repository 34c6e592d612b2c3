import type { QueryOptions, SqlRunner, SqlValue } from "@/lib/db/types";
import { addDays } from "@/lib/utils/dates";

export type RecordedQuery = {
  sql: string;
  values: SqlValue[];
  timeoutMs: number;
};

export type FakeHandler = (sql: string, values: SqlValue[]) => Record<string, unknown>[] | Promise<Record<string, unknown>[]>;

/** In-process SqlRunner: records every statement and answers through a handler. */
export class FakeSqlRunner implements SqlRunner {
  readonly queries: RecordedQuery[] = [];
  private readonly handler: FakeHandler;

  constructor(handler: FakeHandler = () => []) {
    this.handler = handler;
  }

  async query(sql: string, values: SqlValue[], options: QueryOptions): Promise<{ rows: Record<string, unknown>[] }> {
    this.queries.push({ sql, values, timeoutMs: options.timeoutMs });
    return { rows: await this.handler(sql, values) };
  }
}

export type DailyFixture = {
  dt: string;
  pv: number;
  uv: number;
  buyers: number;
  cart_users: number;
};

export type CategoryFixture = {
  category_id: string;
  uv_cur: number;
  uv_prev: number;
  buyers_cur: number;
  buyers_prev: number;
};

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}

function windowRows(days: DailyFixture[], endDt: string, span: number): DailyFixture[] {
  const start = addDays(endDt, -(span - 1));
  return days.filter((day) => day.dt >= start && day.dt <= endDt);
}

/**
 * Answers the bundled aggregate and category templates from fixtures, matching on the
 * statement text the way the templates are written.
 */
export function datasetHandler(days: DailyFixture[], categories: Record<string, CategoryFixture[]> = {}): FakeHandler {
  return (sql, values) => {
    if (sql.includes("FULL OUTER JOIN prev")) {
      const dt = String(values[0]);
      return (categories[dt] ?? []).map((row) => ({ ...row, delta: row.buyers_cur - row.buyers_prev }));
    }
    if (sql.includes("buyers::float8 / uv")) {
      return windowRows(days, String(values[0]), Number(values[1])).map((day) => ({
        dt: day.dt,
        uv: day.uv,
        cart_users: day.cart_users,
        buyers: day.buyers,
        uv_to_buyer: ratio(day.buyers, day.uv),
        uv_to_cart: ratio(day.cart_users, day.uv),
        cart_to_buyer: ratio(day.buyers, day.cart_users),
      }));
    }
    if (sql.includes("WHERE dt = $1::date")) {
      return days.filter((day) => day.dt === values[0]).map((day) => ({ ...day }));
    }
    if (sql.includes("FROM ub.daily_metrics") && sql.includes("BETWEEN")) {
      return windowRows(days, String(values[0]), Number(values[1])).map((day) => ({ ...day }));
    }
    return [];
  };
}

export const DIAGNOSE_DAYS: DailyFixture[] = [
  { dt: "2017-11-30", pv: 900, uv: 95, buyers: 9, cart_users: 38 },
  { dt: "2017-12-01", pv: 950, uv: 98, buyers: 10, cart_users: 39 },
  { dt: "2017-12-02", pv: 1000, uv: 100, buyers: 10, cart_users: 40 },
  { dt: "2017-12-03", pv: 820, uv: 80, buyers: 6, cart_users: 30 },
];

export const DIAGNOSE_FACTS = { minDate: "2017-11-25", maxDate: "2017-12-03" };
