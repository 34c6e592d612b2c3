import type { Intent } from "@/lib/capabilities/types";
import { ExecutionError, QueryExecutionError, QueryTimeoutError, TemplateNotFoundError } from "@/lib/core/errors";
import type { DatasetFacts, Scalar, TemplateCall } from "@/lib/planner/types";
import { addDays, isValidIsoDate } from "@/lib/utils/dates";
import { assertAllowedTables, assertTimeFilter, bindNamedParams, withRowCap } from "./sql-guard";
import type { TemplateRegistry } from "./templates";
import type { ExecutionContext, ExecutionOutcome, SqlRow, SqlRunner, SqlValue } from "./types";

export type ExecutorOptions = {
  runner: SqlRunner;
  registry: TemplateRegistry;
  facts: DatasetFacts;
  maxRows: number;
  timeoutMs: number;
};

// Postgres cancels a statement past statement_timeout with this SQLSTATE.
const QUERY_CANCELED = "57014";

function pgCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return JSON.stringify(value);
}

function normalizeRow(row: Record<string, unknown>): SqlRow {
  const normalized: SqlRow = {};
  for (const [column, value] of Object.entries(row)) {
    normalized[column] = toSqlValue(value);
  }
  return normalized;
}

function dateParam(params: Record<string, Scalar>, name: string): string | null {
  const value = params[name];
  return typeof value === "string" && isValidIsoDate(value) ? value : null;
}

/** The calendar window a call reads, when its params name one. */
export function requestedWindow(params: Record<string, Scalar>): { start: string; end: string } | null {
  const dt = dateParam(params, "dt");
  if (dt) return { start: dt, end: dt };

  const start = dateParam(params, "start");
  const end = dateParam(params, "end");
  if (start && end) return { start, end };

  const endDt = dateParam(params, "end_dt");
  if (endDt) {
    const days = typeof params.days === "number" ? params.days : Number(params.days);
    const span = Number.isInteger(days) && days > 0 ? days : 1;
    return { start: addDays(endDt, -(span - 1)), end: endDt };
  }
  return null;
}

/**
 * Runs templates and ad-hoc statements against the allow-listed tables. Every guard runs
 * before the runner is touched, and every failure comes back as a value.
 */
export class GuardedQueryExecutor {
  private readonly options: ExecutorOptions;

  constructor(options: ExecutorOptions) {
    this.options = options;
  }

  async execute(call: TemplateCall, intent: Intent): Promise<ExecutionOutcome> {
    const template = this.options.registry.get(call.template_key);
    if (!template) {
      return this.failure(call.call_id, new TemplateNotFoundError(call.template_key));
    }
    return this.run(call.call_id, call.template_key, template.sql, call.params, intent);
  }

  /** Same guards as a template, for SQL supplied at call time. */
  async executeAdHoc(callId: string, sql: string, params: Record<string, Scalar>, intent: Intent): Promise<ExecutionOutcome> {
    return this.run(callId, "adhoc", sql, params, intent);
  }

  private async run(
    callId: string,
    templateKey: string,
    sql: string,
    params: Record<string, Scalar>,
    intent: Intent
  ): Promise<ExecutionOutcome> {
    const { facts, maxRows } = this.options;
    const baseContext: ExecutionContext = {
      row_count: 0,
      truncated: false,
      max_rows: maxRows,
      out_of_range: false,
      data_range: { min_date: facts.minDate, max_date: facts.maxDate },
    };

    try {
      const tables = assertAllowedTables(templateKey, sql);
      assertTimeFilter(templateKey, sql, tables, params);
      const bound = bindNamedParams(templateKey, sql, params);

      const window = requestedWindow(params);
      if (window && (window.end < facts.minDate || window.start > facts.maxDate)) {
        console.log(`[GuardedQuery] ${templateKey} window ${window.start}..${window.end} outside ${facts.minDate}..${facts.maxDate}`);
        return {
          ok: true,
          result: { call_id: callId, template_key: templateKey, intent, rows: [], context: { ...baseContext, out_of_range: true } },
        };
      }

      const rows = await this.query(templateKey, withRowCap(bound.text, maxRows), bound.values);
      const truncated = rows.length > maxRows;
      const kept = truncated ? rows.slice(0, maxRows) : rows;
      if (truncated) {
        console.warn(`[GuardedQuery] ${templateKey} returned more than ${maxRows} rows; truncated`);
      }

      return {
        ok: true,
        result: {
          call_id: callId,
          template_key: templateKey,
          intent,
          rows: kept.map(normalizeRow),
          context: { ...baseContext, row_count: kept.length, truncated },
        },
      };
    } catch (error) {
      if (error instanceof ExecutionError) {
        return this.failure(callId, error);
      }
      throw error;
    }
  }

  private async query(templateKey: string, text: string, values: SqlValue[]): Promise<Record<string, unknown>[]> {
    const { runner, timeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new QueryTimeoutError(templateKey, timeoutMs)), timeoutMs);
    });

    try {
      const result = await Promise.race([runner.query(text, values, { timeoutMs }), timeout]);
      return result.rows;
    } catch (error) {
      if (error instanceof QueryTimeoutError) throw error;
      if (pgCode(error) === QUERY_CANCELED) throw new QueryTimeoutError(templateKey, timeoutMs);
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[GuardedQuery] ${templateKey} failed`, { message, code: pgCode(error) ?? null });
      throw new QueryExecutionError(templateKey, `Query "${templateKey}" failed to execute`);
    } finally {
      clearTimeout(timer);
    }
  }

  private failure(callId: string, error: ExecutionError): ExecutionOutcome {
    console.warn(`[GuardedQuery] ${error.kind} on ${error.templateKey}: ${error.message}`);
    return {
      ok: false,
      error: { call_id: callId, template_key: error.templateKey, kind: error.kind, message: error.message },
    };
  }
}
