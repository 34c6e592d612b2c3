import type { Intent } from "@/lib/capabilities/types";
import type { ExecutionErrorType } from "@/lib/core/errors";

export type SqlValue = string | number | boolean | null;

export type SqlRow = Record<string, SqlValue>;

export type QueryOptions = {
  timeoutMs: number;
};

/**
 * Storage boundary. Implementations run one read-only statement with positional
 * parameters and must stop waiting after `timeoutMs`.
 */
export interface SqlRunner {
  query(sql: string, values: SqlValue[], options: QueryOptions): Promise<{ rows: Record<string, unknown>[] }>;
}

export type ExecutionContext = {
  row_count: number;
  truncated: boolean;
  max_rows: number;
  out_of_range: boolean;
  data_range: { min_date: string; max_date: string };
};

export type ExecutionResult = {
  call_id: string;
  template_key: string;
  intent: Intent;
  rows: SqlRow[];
  context: ExecutionContext;
};

// Stand-in result for a turn the Arbiter refused: no rows, and the reason why.
export type NotSupportedResult = {
  rows: [];
  intent: "not_supported";
  context: { reason: string };
};

export type FailureKind = ExecutionErrorType;

export type ExecutionFailure = {
  call_id: string;
  template_key: string;
  kind: FailureKind;
  message: string;
};

export type ExecutionOutcome = { ok: true; result: ExecutionResult } | { ok: false; error: ExecutionFailure };

export function notSupportedResult(reason: string): NotSupportedResult {
  return { rows: [], intent: "not_supported", context: { reason } };
}
