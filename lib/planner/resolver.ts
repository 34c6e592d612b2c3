import type { CapabilityCatalog } from "@/lib/capabilities/registry";
import type { Intent, MetricSource } from "@/lib/capabilities/types";
import { ResolutionError } from "@/lib/core/errors";
import { spanDays } from "@/lib/utils/dates";
import type { DatasetFacts, DiagnosticReport, ResolvedTime, Scalar, ToolCall, ValidatedPlan } from "./types";

export type ResolverOptions = {
  catalog: CapabilityCatalog;
  facts: DatasetFacts;
  anomalyWindowDays: number;
};

type CallDraft =
  | { kind: "template"; template_key: string; params: Record<string, Scalar> }
  | { kind: "report"; report: DiagnosticReport; params: Record<string, Scalar> };

type Window = { end: string; days: number; day: string | null };

type Builder = (plan: ValidatedPlan, window: Window, options: ResolverOptions) => CallDraft[];

const SOURCE_ORDER: MetricSource[] = ["daily_metrics", "funnel", "activity", "retention", "segment"];

/** Every time branch reduces to a window of `days` days ending on `end`. */
export function windowOf(time: ResolvedTime, facts: DatasetFacts): Window {
  switch (time.mode) {
    case "day":
      return { end: time.dt, days: 1, day: time.dt };
    case "days":
      return { end: facts.maxDate, days: time.days, day: null };
    case "range":
      return { end: time.end, days: spanDays(time.start, time.end), day: null };
  }
}

function template(template_key: string, params: Record<string, Scalar>): CallDraft {
  return { kind: "template", template_key, params };
}

function report(name: DiagnosticReport, params: Record<string, Scalar>): CallDraft {
  return { kind: "report", report: name, params };
}

function sourcesFor(plan: ValidatedPlan, catalog: CapabilityCatalog): MetricSource[] {
  const sources = new Set<MetricSource>();
  for (const key of plan.metrics) {
    const metric = catalog.getSupportedMetric(key);
    if (metric) sources.add(metric.source);
  }
  if (plan.dimension === "user_segment") sources.add("segment");
  return SOURCE_ORDER.filter((source) => sources.has(source));
}

function sourceCall(source: MetricSource, window: Window): CallDraft {
  const span = { days: window.days, end_dt: window.end };
  switch (source) {
    case "daily_metrics":
      return window.day && window.days === 1 ? template("overview_day", { dt: window.day }) : template("overview_daily", span);
    case "funnel":
      return template("funnel_daily", span);
    case "activity":
      return template("user_activity", span);
    case "retention":
      return template("user_retention", span);
    case "segment":
      return template("new_vs_old_user_conversion", { dt: window.end });
  }
}

function categoryCall(plan: ValidatedPlan, target: string): CallDraft[] {
  return plan.dimension === "category" ? [template("category_contrib_buyers", { dt: target })] : [];
}

const BUILDERS: Partial<Record<Intent, Builder>> = {
  overview: (plan, window, { catalog }) => sourcesFor(plan, catalog).map((source) => sourceCall(source, window)),

  compare: (plan, window, { catalog }) => {
    const widened: Window = { end: window.end, days: Math.max(2, window.days), day: null };
    return sourcesFor(plan, catalog).map((source) => sourceCall(source, widened));
  },

  attribution: (plan, window) => [
    template("overview_daily", { days: 2, end_dt: window.end }),
    ...categoryCall(plan, window.end),
    report("buyers_decomposition", { dt: window.end }),
  ],

  diagnose: (plan, window) => [
    template("overview_day", { dt: window.end }),
    template("funnel_daily", { days: Math.max(2, window.days), end_dt: window.end }),
    ...categoryCall(plan, window.end),
    report("buyers_decomposition", { dt: window.end }),
  ],

  anomaly: (plan, window, { anomalyWindowDays }) => [
    template("overview_daily", { days: window.days + anomalyWindowDays, end_dt: window.end }),
    report("anomaly_scan", { end_dt: window.end, days: window.days, window: anomalyWindowDays }),
  ],
};

/**
 * Maps a validated plan to its fixed list of calls. Pure: the same plan and options
 * always produce the same calls with the same ids.
 */
export function resolveToolCalls(plan: ValidatedPlan, options: ResolverOptions): ToolCall[] {
  const builder = BUILDERS[plan.intent];
  if (!builder) {
    throw new ResolutionError(plan.intent);
  }
  const window = windowOf(plan.time, options.facts);
  return builder(plan, window, options).map((draft, index): ToolCall => ({ ...draft, call_id: String(index) }));
}
