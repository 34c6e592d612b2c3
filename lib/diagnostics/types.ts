export type FactorStatus = "ok" | "undefined";

export type FactorContribution = {
  factor: string;
  contribution: number | null;
  status: FactorStatus;
};

export type DiagnosticNode = {
  metric: string;
  prior_value: number | null;
  current_value: number | null;
  delta: number | null;
  decomposition: FactorContribution[];
  children: DiagnosticNode[];
};

export type CategoryAttribution = {
  category_id: string;
  uv_prev: number;
  uv_cur: number;
  buyers_prev: number;
  buyers_cur: number;
  delta: number;
  traffic: number | null;
  efficiency: number | null;
};

export type CategoryBreakdown = {
  top_n: number;
  total_categories: number;
  total_delta: number;
  negative_delta: number;
  /** Share of the summed negative delta coming from the three most negative categories. */
  concentration_top3: number | null;
  entries: CategoryAttribution[];
};

export type DecompositionTree = {
  kind: "decomposition";
  target_dt: string;
  prior_dt: string;
  root: DiagnosticNode | null;
  categories: CategoryBreakdown | null;
  notes: string[];
};

export type AnomalyReason = "z_score" | "pct_change";

export type AnomalyFinding = {
  dt: string;
  metric: string;
  value: number;
  baseline_days: number;
  baseline_mean: number | null;
  baseline_std: number | null;
  z_score: number | null;
  pct_change: number | null;
  flagged: boolean;
  reasons: AnomalyReason[];
};

export type AnomalyThresholds = {
  z_threshold: number;
  pct_band: number;
  window_days: number;
};

export type AnomalyTree = {
  kind: "anomaly";
  thresholds: AnomalyThresholds;
  findings: AnomalyFinding[];
  notes: string[];
};

export type DiagnosticTree = DecompositionTree | AnomalyTree;

export type DiagnosticsConfig = {
  zThreshold: number;
  pctBand: number;
  windowDays: number;
  categoryTopN: number;
};
