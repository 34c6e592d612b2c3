import { INTENTS, type Intent } from "@/lib/capabilities/types";
import { TypeCoercionError } from "@/lib/core/errors";
import { buildIsoDate, yearOf } from "@/lib/utils/dates";
import { RawPlanSchema, RawToolHintSchema, parseScalar, type ParsedRawPlan } from "./schema";
import type { CoercionIssue, DatasetFacts, Plan, Scalar, Strength, Tagged, TimeMode, TimeSpec, ToolHint } from "./types";

export const DEFAULT_LOOKBACK_DAYS = 7;
export const DAYS_MIN = 1;
export const DAYS_MAX = 90;

type TimeField = "dt" | "days" | "start" | "end";

const TIME_FIELDS: TimeField[] = ["dt", "days", "start", "end"];
const TIME_MODES: TimeMode[] = ["day", "days", "range", "unspecified"];

export function clampDays(days: number): number {
  return Math.max(DAYS_MIN, Math.min(DAYS_MAX, days));
}

export function coerceDays(value: string | number, field = "days"): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new TypeCoercionError(field, String(value), "integer");
    return Math.trunc(value);
  }
  const match = value.trim().match(/^([+-]?\d+)\s*(?:d|days?)?$/i);
  if (!match) throw new TypeCoercionError(field, value, "integer");
  return parseInt(match[1], 10);
}

/**
 * Reads a calendar date. Full dates are validated as given; a bare month/day takes its
 * year from the latest date known to be in the dataset.
 */
export function coerceDate(value: string | number, facts: DatasetFacts, field = "dt"): string {
  const text = String(value).trim();

  const full = text.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/);
  if (full) {
    const date = buildIsoDate(parseInt(full[1], 10), parseInt(full[2], 10), parseInt(full[3], 10));
    if (date) return date;
    throw new TypeCoercionError(field, text, "calendar date");
  }

  const monthDay = text.match(/^(\d{1,2})[-/.](\d{1,2})$/);
  if (monthDay) {
    const date = buildIsoDate(yearOf(facts.maxDate), parseInt(monthDay[1], 10), parseInt(monthDay[2], 10));
    if (date) return date;
  }

  throw new TypeCoercionError(field, text, "calendar date");
}

function isExplicit(field: TimeField, flag: boolean | string[] | undefined): boolean {
  if (flag === undefined) return true;
  if (typeof flag === "boolean") return flag;
  return flag.includes(field);
}

function tag<T>(kind: Strength, value: T): Tagged<T> {
  return kind === "explicit" ? { kind: "explicit", value } : { kind: "default", value };
}

function readTimeInputs(raw: ParsedRawPlan) {
  const spec = raw.time_spec ?? undefined;
  const pick = (field: TimeField) => spec?.[field] ?? raw[field] ?? null;
  return {
    mode: typeof spec?.mode === "string" ? spec.mode.trim().toLowerCase() : null,
    explicit: spec?.explicit,
    values: { dt: pick("dt"), days: pick("days"), start: pick("start"), end: pick("end") },
  };
}

function inferMode(spec: Omit<TimeSpec, "mode">): TimeMode {
  if (spec.dt.kind !== "unset") return "day";
  if (spec.start.kind !== "unset" || spec.end.kind !== "unset") return "range";
  if (spec.days.kind !== "unset") return "days";
  return "unspecified";
}

function modeHasFields(mode: TimeMode, spec: Omit<TimeSpec, "mode">): boolean {
  switch (mode) {
    case "day":
      return spec.dt.kind !== "unset";
    case "days":
      return spec.days.kind !== "unset";
    case "range":
      return spec.start.kind !== "unset" || spec.end.kind !== "unset";
    case "unspecified":
      return false;
  }
}

function normalizeTimeSpec(raw: ParsedRawPlan, facts: DatasetFacts, issues: CoercionIssue[]): TimeSpec {
  const inputs = readTimeInputs(raw);
  const fields: Omit<TimeSpec, "mode"> = {
    dt: { kind: "unset" },
    days: { kind: "unset" },
    start: { kind: "unset" },
    end: { kind: "unset" },
  };

  for (const field of TIME_FIELDS) {
    const value = inputs.values[field];
    if (value === null || value === "") continue;
    const kind: Strength = isExplicit(field, inputs.explicit) ? "explicit" : "default";
    try {
      if (field === "days") {
        fields.days = tag(kind, clampDays(coerceDays(value)));
      } else {
        fields[field] = tag(kind, coerceDate(value, facts, field));
      }
    } catch (err) {
      if (!(err instanceof TypeCoercionError)) throw err;
      issues.push({ field, received: String(value), message: err.message });
    }
  }

  const declared = TIME_MODES.find((mode) => mode === inputs.mode);
  let mode = declared && modeHasFields(declared, fields) ? declared : inferMode(fields);

  if (mode === "unspecified") {
    mode = "days";
    fields.days = { kind: "default", value: DEFAULT_LOOKBACK_DAYS };
  }

  return { mode, ...fields };
}

function normalizeIntent(value: string | null | undefined): Intent {
  const candidate = (value ?? "").trim().toLowerCase();
  return INTENTS.find((intent) => intent === candidate) ?? "other";
}

function normalizeMetrics(values: unknown[] | undefined): string[] {
  const metrics: string[] = [];
  for (const value of values ?? []) {
    if (typeof value !== "string") continue;
    const trimmed = value.trim();
    if (trimmed && !metrics.includes(trimmed)) metrics.push(trimmed);
  }
  return metrics;
}

function normalizeHints(values: unknown[] | undefined): ToolHint[] {
  const hints: ToolHint[] = [];
  for (const value of values ?? []) {
    const parsed = RawToolHintSchema.safeParse(value);
    if (!parsed.success) continue;
    const name = parsed.data.name ?? parsed.data.tool ?? parsed.data.template_key;
    if (!name) continue;
    const params: Record<string, Scalar> = {};
    for (const [key, param] of Object.entries(parsed.data.params ?? {})) {
      const scalar = parseScalar(param);
      if (scalar !== undefined) params[key] = scalar;
    }
    hints.push({ name, params });
  }
  return hints;
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Coerces whatever the extractor produced into a well-typed Plan. Never throws on bad input. */
export function normalizePlan(input: unknown, facts: DatasetFacts): Plan {
  const parsed = RawPlanSchema.safeParse(input);
  const raw: ParsedRawPlan = parsed.success ? parsed.data : {};
  const issues: CoercionIssue[] = [];

  const plan: Plan = {
    intent: normalizeIntent(raw.intent),
    time_spec: normalizeTimeSpec(raw, facts, issues),
    metrics: normalizeMetrics(raw.metrics),
    dimension: optionalText(raw.dimension),
    operation: optionalText(raw.operation),
    tool_calls: normalizeHints(raw.tool_calls),
    coercion_issues: issues,
  };

  return Object.freeze(plan);
}
