import { z } from "zod";
import type { DatasetFacts } from "@/lib/planner/types";
import { isValidIsoDate } from "@/lib/utils/dates";
import { executeWithRetry } from "./retry";
import type { SqlRunner } from "./types";

const RANGE_QUERIES = [
  "SELECT to_char(MIN(dt), 'YYYY-MM-DD') AS min_dt, to_char(MAX(dt), 'YYYY-MM-DD') AS max_dt FROM ub.daily_metrics",
  "SELECT to_char(MIN(dt::date), 'YYYY-MM-DD') AS min_dt, to_char(MAX(dt::date), 'YYYY-MM-DD') AS max_dt FROM ub.user_behavior",
];

const RangeRowSchema = z.object({
  min_dt: z.string().refine(isValidIsoDate),
  max_dt: z.string().refine(isValidIsoDate),
});

/**
 * Date span of the stored data. Read from the aggregate table, or from the raw event
 * table when the aggregates are empty.
 */
export async function loadDatasetFacts(runner: SqlRunner, options: { timeoutMs: number }): Promise<DatasetFacts> {
  for (const sql of RANGE_QUERIES) {
    const { rows } = await executeWithRetry(() => runner.query(sql, [], options));
    const parsed = RangeRowSchema.safeParse(rows[0]);
    if (parsed.success) {
      console.log(`[DatasetFacts] Data spans ${parsed.data.min_dt}..${parsed.data.max_dt}`);
      return { minDate: parsed.data.min_dt, maxDate: parsed.data.max_dt };
    }
  }
  throw new Error("Dataset has no dated rows in ub.daily_metrics or ub.user_behavior");
}
