import type { ExecutionResult, SqlRow } from "@/lib/db/types";
import type { ReportCall, ToolCall, ValidatedPlan } from "@/lib/planner/types";
import { addDays } from "@/lib/utils/dates";
import { scanSeries, type SeriesPoint } from "./anomaly";
import { attributeCategories } from "./categories";
import { decomposeBuyers, type DayCounts } from "./decomposition";
import type { AnomalyTree, DecompositionTree, DiagnosticNode, DiagnosticTree, DiagnosticsConfig } from "./types";

// Templates carrying per-day uv/buyers, most complete first.
const DAILY_TEMPLATES = ["funnel_daily", "overview_daily", "overview_day"];
const DAILY_COLUMNS = ["pv", "uv", "buyers", "cart_users"];
const DEFAULT_SCAN_METRICS = ["uv", "buyers"];

function numeric(value: SqlRow[string] | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function stringParam(call: ReportCall, name: string): string | null {
  const value = call.params[name];
  return typeof value === "string" ? value : null;
}

function numberParam(call: ReportCall, name: string, fallback: number): number {
  const value = call.params[name];
  return typeof value === "number" ? value : fallback;
}

function dailyRows(results: ExecutionResult[]): SqlRow[] {
  const rows: SqlRow[] = [];
  for (const key of DAILY_TEMPLATES) {
    for (const result of results) {
      if (result.template_key === key) rows.push(...result.rows);
    }
  }
  return rows;
}

export function findDayCounts(results: ExecutionResult[], dt: string): DayCounts | null {
  for (const row of dailyRows(results)) {
    if (row.dt !== dt) continue;
    const uv = numeric(row.uv);
    const buyers = numeric(row.buyers);
    if (uv === null || buyers === null) continue;
    return { dt, uv, buyers, cart_users: numeric(row.cart_users) };
  }
  return null;
}

function buildDecomposition(call: ReportCall, results: ExecutionResult[], config: DiagnosticsConfig): DecompositionTree {
  const target = stringParam(call, "dt");
  if (!target) {
    throw new Error(`Report ${call.report} on call ${call.call_id} has no dt`);
  }
  const prior = addDays(target, -1);
  const notes: string[] = [];

  const current = findDayCounts(results, target);
  const previous = findDayCounts(results, prior);
  let root: DiagnosticNode | null = null;
  if (current && previous) {
    const decomposition = decomposeBuyers(previous, current);
    root = decomposition.root;
    notes.push(...decomposition.notes);
  } else {
    const missing = [current ? null : target, previous ? null : prior].filter((dt): dt is string => dt !== null);
    notes.push(`No aggregate row for ${missing.join(" and ")}; buyers change not decomposed`);
  }

  const categoryResult = results.find((result) => result.template_key === "category_contrib_buyers");
  const categories = categoryResult ? attributeCategories(categoryResult.rows, config.categoryTopN) : null;
  if (categories && categories.total_categories === 0) {
    notes.push(`No category rows for ${target}`);
  }

  return { kind: "decomposition", target_dt: target, prior_dt: prior, root, categories, notes };
}

function seriesFor(results: ExecutionResult[], metric: string, endDt: string): SeriesPoint[] {
  const byDate = new Map<string, number>();
  for (const row of dailyRows(results)) {
    const dt = typeof row.dt === "string" ? row.dt : null;
    const value = numeric(row[metric]);
    if (dt === null || value === null || dt > endDt || byDate.has(dt)) continue;
    byDate.set(dt, value);
  }
  return [...byDate.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([dt, value]) => ({ dt, value }));
}

function buildAnomalyScan(call: ReportCall, plan: ValidatedPlan, results: ExecutionResult[], config: DiagnosticsConfig): AnomalyTree {
  const endDt = stringParam(call, "end_dt");
  if (!endDt) {
    throw new Error(`Report ${call.report} on call ${call.call_id} has no end_dt`);
  }
  const days = numberParam(call, "days", 1);
  const thresholds = {
    z_threshold: config.zThreshold,
    pct_band: config.pctBand,
    window_days: numberParam(call, "window", config.windowDays),
  };

  const requested = plan.metrics.filter((metric) => DAILY_COLUMNS.includes(metric));
  const metrics = requested.length > 0 ? requested : DEFAULT_SCAN_METRICS;
  const notes: string[] = [];
  if (requested.length < plan.metrics.length) {
    notes.push(`Anomaly scan covers daily aggregates only: ${metrics.join(", ")}`);
  }

  const findings = metrics.flatMap((metric) => {
    const series = seriesFor(results, metric, endDt);
    if (series.length === 0) notes.push(`No daily values for ${metric}`);
    return scanSeries(metric, series, days, thresholds);
  });
  for (const finding of findings) {
    if (finding.baseline_days < 2) {
      notes.push(`${finding.metric} on ${finding.dt} has ${finding.baseline_days} baseline day(s); no z-score`);
    }
  }

  return { kind: "anomaly", thresholds, findings, notes };
}

/**
 * Runs the report calls of a turn over rows that were already fetched. Pure: no queries,
 * no clock. Returns null when the turn asked for no report.
 */
export function buildDiagnosticTree(
  plan: ValidatedPlan,
  calls: ToolCall[],
  results: ExecutionResult[],
  config: DiagnosticsConfig
): DiagnosticTree | null {
  const report = calls.find((call): call is ReportCall => call.kind === "report");
  if (!report) return null;

  switch (report.report) {
    case "buyers_decomposition":
      return buildDecomposition(report, results, config);
    case "anomaly_scan":
      return buildAnomalyScan(report, plan, results, config);
  }
}
