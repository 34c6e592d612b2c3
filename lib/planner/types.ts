import type { Intent } from "@/lib/capabilities/types";

export type { Intent };

/**
 * Provenance of a time field. Only `explicit` values were asserted upstream; `default`
 * values were filled in and may be overridden by any explicit signal.
 */
export type Tagged<T> = { kind: "unset" } | { kind: "default"; value: T } | { kind: "explicit"; value: T };

export type Strength = "default" | "explicit";

export type TimeMode = "day" | "days" | "range" | "unspecified";

export type TimeSpec = {
  mode: TimeMode;
  dt: Tagged<string>;
  days: Tagged<number>;
  start: Tagged<string>;
  end: Tagged<string>;
};

export type Scalar = string | number | boolean;

export type ToolHint = {
  name: string;
  params: Record<string, Scalar>;
};

export type CoercionIssue = {
  field: string;
  received: string;
  message: string;
};

export type Plan = {
  intent: Intent;
  time_spec: TimeSpec;
  metrics: string[];
  dimension: string | null;
  operation: string | null;
  tool_calls: ToolHint[];
  coercion_issues: CoercionIssue[];
};

// A complete choice of time window, as carried by a candidate during arbitration.
export type TimeChoice =
  | { mode: "day"; dt: string }
  | { mode: "days"; days: number }
  | { mode: "range"; start: string; end: string };

export type ResolvedTime =
  | { mode: "day"; dt: string; days: null; start: null; end: null; strength: Strength }
  | { mode: "days"; dt: null; days: number; start: null; end: null; strength: Strength }
  | { mode: "range"; dt: null; days: null; start: string; end: string; strength: Strength };

export type ValidatedPlan = {
  intent: Intent;
  time: ResolvedTime;
  metrics: string[];
  dimension: string | null;
  operation: string | null;
  assumptions: string[];
  not_supported: null;
};

export type NotSupportedDecision = {
  subject: string;
  reason: string;
  missing_fields: string[];
  suggestion: string | null;
  assumptions: string[];
};

export type ArbiterDecision =
  | { kind: "validated"; plan: ValidatedPlan }
  | { kind: "not_supported"; decision: NotSupportedDecision };

export type TemplateCall = {
  kind: "template";
  call_id: string;
  template_key: string;
  params: Record<string, Scalar>;
};

export type DiagnosticReport = "buyers_decomposition" | "anomaly_scan";

export type ReportCall = {
  kind: "report";
  call_id: string;
  report: DiagnosticReport;
  params: Record<string, Scalar>;
};

export type ToolCall = TemplateCall | ReportCall;

/** Facts about the stored data supplied by the storage collaborator at startup. */
export type DatasetFacts = {
  minDate: string;
  maxDate: string;
};
