export const INTENTS = ["overview", "compare", "attribution", "anomaly", "diagnose", "forecast", "other"] as const;

export type Intent = (typeof INTENTS)[number];

// Which template family serves a metric; the resolver emits one call per family.
export type MetricSource = "daily_metrics" | "funnel" | "activity" | "retention" | "segment";

export type MetricCapability = {
  key: string;
  description: string;
  synonyms: string[];
} & (
  | { supported: true; source: MetricSource; column: string }
  | { supported: false; missing_reason: string; missing_fields: string[]; suggestion?: string }
);

export type IntentCapability = {
  intent: Intent;
  description: string;
} & ({ supported: true } | { supported: false; missing_reason: string; suggestion?: string });

export type DimensionCapability = {
  key: string;
  description: string;
  synonyms: string[];
} & ({ supported: true } | { supported: false; missing_reason: string; missing_fields: string[] });

export type SupportedMetric = Extract<MetricCapability, { supported: true }>;
