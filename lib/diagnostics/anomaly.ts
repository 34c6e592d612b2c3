import type { AnomalyFinding, AnomalyReason, AnomalyThresholds } from "./types";

export type SeriesPoint = {
  dt: string;
  value: number;
};

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Sample standard deviation (n - 1).
function sampleStd(values: number[], avg: number): number {
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Scores one day against the `window_days` points before it. Needs at least two baseline
 * points for a deviation; z is null when the baseline is flat.
 */
export function scoreDay(metric: string, series: SeriesPoint[], index: number, thresholds: AnomalyThresholds): AnomalyFinding {
  const point = series[index];
  const baseline = series.slice(Math.max(0, index - thresholds.window_days), index).map((p) => p.value);
  const previous = index > 0 ? series[index - 1].value : null;

  const avg = baseline.length > 0 ? mean(baseline) : null;
  const std = avg !== null && baseline.length >= 2 ? sampleStd(baseline, avg) : null;
  const z = avg !== null && std !== null && std > 0 ? (point.value - avg) / std : null;
  const pct = previous !== null && previous !== 0 ? (point.value - previous) / previous : null;

  const reasons: AnomalyReason[] = [];
  if (z !== null && Math.abs(z) > thresholds.z_threshold) reasons.push("z_score");
  if (pct !== null && Math.abs(pct) > thresholds.pct_band) reasons.push("pct_change");

  return {
    dt: point.dt,
    metric,
    value: point.value,
    baseline_days: baseline.length,
    baseline_mean: avg,
    baseline_std: std,
    z_score: z,
    pct_change: pct,
    flagged: reasons.length > 0,
    reasons,
  };
}

/** Scores the last `days` points of a date-ordered series. */
export function scanSeries(metric: string, series: SeriesPoint[], days: number, thresholds: AnomalyThresholds): AnomalyFinding[] {
  const first = Math.max(0, series.length - days);
  const findings: AnomalyFinding[] = [];
  for (let index = first; index < series.length; index++) {
    findings.push(scoreDay(metric, series, index, thresholds));
  }
  return findings;
}
