import { CORE_METRICS, DIMENSION_DEFINITIONS, INTENT_DEFINITIONS, METRIC_DEFINITIONS } from "./definitions";
import type { DimensionCapability, Intent, IntentCapability, MetricCapability, SupportedMetric } from "./types";

export type { DimensionCapability, IntentCapability, MetricCapability, SupportedMetric };

function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/[\s_-]+/g, " ");
}

function indexByTerm<T extends { key: string; synonyms: string[] }>(entries: readonly T[]): ReadonlyMap<string, T> {
  const index = new Map<string, T>();
  for (const entry of entries) {
    for (const term of [entry.key, ...entry.synonyms]) {
      const normalized = normalizeTerm(term);
      if (index.has(normalized)) {
        throw new Error(`CapabilityCatalog: term "${term}" is registered twice`);
      }
      index.set(normalized, entry);
    }
  }
  return index;
}

/**
 * Immutable registry of what the dataset can answer. Built once at startup and passed
 * by reference into the Arbiter; tests construct alternates with their own entries.
 */
export class CapabilityCatalog {
  private readonly metricIndex: ReadonlyMap<string, MetricCapability>;
  private readonly dimensionIndex: ReadonlyMap<string, DimensionCapability>;
  private readonly intents: ReadonlyMap<Intent, IntentCapability>;
  readonly coreMetrics: readonly string[];

  constructor(input: {
    metrics: readonly MetricCapability[];
    intents: readonly IntentCapability[];
    dimensions: readonly DimensionCapability[];
    coreMetrics: readonly string[];
  }) {
    this.metricIndex = indexByTerm(input.metrics);
    this.dimensionIndex = indexByTerm(input.dimensions);
    this.intents = new Map(input.intents.map((entry) => [entry.intent, entry]));
    for (const key of input.coreMetrics) {
      const metric = this.metricIndex.get(normalizeTerm(key));
      if (!metric || !metric.supported) {
        throw new Error(`CapabilityCatalog: core metric "${key}" must be a supported metric`);
      }
    }
    this.coreMetrics = Object.freeze([...input.coreMetrics]);
    Object.freeze(this);
  }

  resolveMetric(term: string): MetricCapability | undefined {
    return this.metricIndex.get(normalizeTerm(term));
  }

  resolveDimension(term: string): DimensionCapability | undefined {
    return this.dimensionIndex.get(normalizeTerm(term));
  }

  getIntent(intent: Intent): IntentCapability | undefined {
    return this.intents.get(intent);
  }

  getSupportedMetric(key: string): SupportedMetric | undefined {
    const metric = this.resolveMetric(key);
    return metric?.supported ? metric : undefined;
  }
}

export function createDefaultCatalog(): CapabilityCatalog {
  return new CapabilityCatalog({
    metrics: METRIC_DEFINITIONS,
    intents: INTENT_DEFINITIONS,
    dimensions: DIMENSION_DEFINITIONS,
    coreMetrics: CORE_METRICS,
  });
}
