import type { CapabilityCatalog } from "@/lib/capabilities/registry";
import { addDays, spanDays } from "@/lib/utils/dates";
import { CapabilityError, ConsistencyError, TypeCoercionError } from "@/lib/core/errors";
import { DAYS_MAX, DEFAULT_LOOKBACK_DAYS, clampDays, coerceDate, coerceDays } from "./normalizer";
import type {
  ArbiterDecision,
  DatasetFacts,
  NotSupportedDecision,
  Plan,
  ResolvedTime,
  Scalar,
  Strength,
  TimeChoice,
  ToolHint,
} from "./types";

export type ArbiterContext = {
  catalog: CapabilityCatalog;
  facts: DatasetFacts;
  /** Explicit time expression recognised in the question text, if any. */
  signal?: TimeChoice | null;
};

type CandidateSource = "plan" | "signal" | "hint";

type TimeCandidate = {
  choice: TimeChoice;
  strength: Strength;
  source: CandidateSource;
};

type ArbiterState = {
  plan: Plan;
  assumptions: string[];
  metrics: string[];
  dimension: string | null;
  candidates: TimeCandidate[];
  time: ResolvedTime | null;
};

type Rule = {
  name: string;
  apply: (state: ArbiterState, ctx: ArbiterContext) => NotSupportedDecision | null;
};

function describeChoice(choice: TimeChoice): string {
  switch (choice.mode) {
    case "day":
      return `day ${choice.dt}`;
    case "days":
      return `last ${choice.days} days`;
    case "range":
      return `${choice.start} to ${choice.end}`;
  }
}

function notSupported(
  state: ArbiterState,
  subject: string,
  reason: string,
  missingFields: string[],
  suggestion: string | undefined
): NotSupportedDecision {
  const error = new CapabilityError(subject, reason, missingFields);
  console.warn(`[Arbiter] ${error.type}: ${error.message}`);
  return { subject, reason, missing_fields: missingFields, suggestion: suggestion ?? null, assumptions: state.assumptions };
}

// Rule 1: anything the dataset cannot answer stops the turn before a query is planned.
const capabilityGate: Rule = {
  name: "capability",
  apply(state, { catalog }) {
    for (const term of state.plan.metrics) {
      const metric = catalog.resolveMetric(term);
      if (metric && !metric.supported) {
        return notSupported(state, metric.key, metric.missing_reason, metric.missing_fields, metric.suggestion);
      }
    }

    if (state.plan.dimension) {
      const dimension = catalog.resolveDimension(state.plan.dimension);
      if (dimension && !dimension.supported) {
        return notSupported(state, dimension.key, dimension.missing_reason, dimension.missing_fields, undefined);
      }
    }

    const intent = catalog.getIntent(state.plan.intent);
    if (!intent || !intent.supported) {
      return notSupported(
        state,
        state.plan.intent,
        intent && !intent.supported ? intent.missing_reason : `No capability registered for intent "${state.plan.intent}"`,
        [],
        intent && !intent.supported ? intent.suggestion : undefined
      );
    }
    return null;
  },
};

const coercionIssues: Rule = {
  name: "coercion",
  apply(state) {
    for (const issue of state.plan.coercion_issues) {
      state.assumptions.push(`${issue.field}="${issue.received}" could not be read and was treated as absent`);
    }
    return null;
  },
};

// Rule 2: the plan's own time fields collapse to the branch its mode names.
const timeConsistency: Rule = {
  name: "time-consistency",
  apply(state) {
    const spec = state.plan.time_spec;
    const cleared = (fields: ("dt" | "days" | "start" | "end")[]) => {
      const stale = fields.filter((field) => spec[field].kind !== "unset");
      if (stale.length > 0) {
        state.assumptions.push(`${spec.mode} mode selected; ignored ${stale.join(", ")}`);
      }
    };

    if (spec.mode === "day" && spec.dt.kind !== "unset") {
      cleared(["days", "start", "end"]);
      state.candidates.push({ choice: { mode: "day", dt: spec.dt.value }, strength: spec.dt.kind, source: "plan" });
      return null;
    }

    if (spec.mode === "range") {
      cleared(["dt", "days"]);
      if (spec.start.kind !== "unset" && spec.end.kind !== "unset") {
        const strength = spec.start.kind === "explicit" && spec.end.kind === "explicit" ? "explicit" : "default";
        state.candidates.push({
          choice: { mode: "range", start: spec.start.value, end: spec.end.value },
          strength,
          source: "plan",
        });
      } else {
        state.assumptions.push(`Range had only one end; using the last ${DEFAULT_LOOKBACK_DAYS} days instead`);
        state.candidates.push({ choice: { mode: "days", days: DEFAULT_LOOKBACK_DAYS }, strength: "default", source: "plan" });
      }
      return null;
    }

    if (spec.days.kind !== "unset") {
      cleared(["dt", "start", "end"]);
      state.candidates.push({ choice: { mode: "days", days: spec.days.value }, strength: spec.days.kind, source: "plan" });
      return null;
    }

    state.candidates.push({ choice: { mode: "days", days: DEFAULT_LOOKBACK_DAYS }, strength: "default", source: "plan" });
    return null;
  },
};

function readHint(hint: ToolHint, facts: DatasetFacts): TimeChoice | null {
  const { dt, days, start, end } = hint.params;
  const date = (value: Scalar | undefined) => (typeof value === "boolean" || value === undefined ? null : coerceDate(value, facts));
  try {
    const day = date(dt);
    if (day) return { mode: "day", dt: day };
    const from = date(start);
    const to = date(end);
    if (from && to) return { mode: "range", start: from, end: to };
    if (typeof days === "number" || typeof days === "string") {
      return { mode: "days", days: clampDays(coerceDays(days)) };
    }
  } catch (err) {
    if (!(err instanceof TypeCoercionError)) throw err;
    console.warn(`[Arbiter] Ignoring unreadable time hint on ${hint.name}: ${err.message}`);
  }
  return null;
}

const SOURCE_ORDER: Record<CandidateSource, number> = { plan: 0, signal: 1, hint: 2 };
const SPECIFICITY: Record<TimeChoice["mode"], number> = { day: 3, range: 2, days: 1 };

function rank(candidate: TimeCandidate): number {
  if (candidate.strength === "explicit") return 2;
  return candidate.source === "hint" ? 1 : 0;
}

// Rule 3: explicit beats hint beats default; among explicit ones the more specific wins.
const explicitOverDefault: Rule = {
  name: "explicit-over-default",
  apply(state, { facts, signal }) {
    if (signal) state.candidates.push({ choice: signal, strength: "explicit", source: "signal" });
    for (const hint of state.plan.tool_calls) {
      const choice = readHint(hint, facts);
      if (choice) state.candidates.push({ choice, strength: "default", source: "hint" });
    }

    const ordered = [...state.candidates].sort(
      (a, b) =>
        rank(b) - rank(a) ||
        (rank(a) === 2 ? SPECIFICITY[b.choice.mode] - SPECIFICITY[a.choice.mode] : 0) ||
        SOURCE_ORDER[a.source] - SOURCE_ORDER[b.source]
    );
    const winner = ordered[0];
    const planned = state.candidates.find((candidate) => candidate.source === "plan");
    if (planned && winner !== planned) {
      state.assumptions.push(
        `Used ${describeChoice(winner.choice)} from the ${winner.source === "signal" ? "question" : "tool hint"} instead of ${describeChoice(planned.choice)}`
      );
    }

    state.time = toResolved(winner.choice, winner.strength);
    return null;
  },
};

function toResolved(choice: TimeChoice, strength: Strength): ResolvedTime {
  switch (choice.mode) {
    case "day":
      return { mode: "day", dt: choice.dt, days: null, start: null, end: null, strength };
    case "days":
      return { mode: "days", dt: null, days: clampDays(choice.days), start: null, end: null, strength };
    case "range":
      return { mode: "range", dt: null, days: null, start: choice.start, end: choice.end, strength };
  }
}

const windowBounds: Rule = {
  name: "window-bounds",
  apply(state) {
    const time = state.time;
    if (!time || time.mode !== "range") return null;
    let { start, end } = time;
    if (start > end) {
      [start, end] = [end, start];
      state.assumptions.push(`Range start was after its end; swapped to ${start} to ${end}`);
    }
    if (spanDays(start, end) > DAYS_MAX) {
      start = addDays(end, -(DAYS_MAX - 1));
      state.assumptions.push(`Range longer than ${DAYS_MAX} days; kept ${start} to ${end}`);
    }
    state.time = { ...time, start, end };
    return null;
  },
};

// Rule 4: unknown terms are dropped; nothing usable left means the core metrics.
const metricFallback: Rule = {
  name: "metric-fallback",
  apply(state, { catalog }) {
    for (const term of state.plan.metrics) {
      const metric = catalog.getSupportedMetric(term);
      if (!metric) {
        state.assumptions.push(`Unknown metric "${term}" was dropped`);
      } else if (!state.metrics.includes(metric.key)) {
        state.metrics.push(metric.key);
      }
    }
    if (state.metrics.length === 0) {
      state.metrics.push(...catalog.coreMetrics);
      state.assumptions.push(`No supported metric requested; using ${catalog.coreMetrics.join(" and ")}`);
    }

    if (state.plan.dimension) {
      const dimension = catalog.resolveDimension(state.plan.dimension);
      if (dimension) {
        state.dimension = dimension.key;
      } else {
        state.assumptions.push(`Unknown dimension "${state.plan.dimension}" was dropped`);
      }
    }
    return null;
  },
};

export const ARBITER_RULES: readonly Rule[] = [
  capabilityGate,
  coercionIssues,
  timeConsistency,
  explicitOverDefault,
  windowBounds,
  metricFallback,
];

/** Repairs and validates a normalized plan. Never throws for bad plan content. */
export function arbitratePlan(plan: Plan, ctx: ArbiterContext): ArbiterDecision {
  const state: ArbiterState = {
    plan,
    assumptions: [],
    metrics: [],
    dimension: null,
    candidates: [],
    time: null,
  };

  for (const rule of ARBITER_RULES) {
    const decision = rule.apply(state, ctx);
    if (decision) {
      console.log(`[Arbiter] ${rule.name} rejected plan: ${decision.subject} (${decision.reason})`);
      return { kind: "not_supported", decision };
    }
  }

  if (!state.time) {
    throw new ConsistencyError("Arbiter finished without a resolved time window", { intent: plan.intent });
  }

  if (state.assumptions.length > 0) {
    console.log(`[Arbiter] Validated ${plan.intent} plan with ${state.assumptions.length} assumption(s)`);
  }

  return {
    kind: "validated",
    plan: {
      intent: plan.intent,
      time: state.time,
      metrics: state.metrics,
      dimension: state.dimension,
      operation: plan.operation,
      assumptions: state.assumptions,
      not_supported: null,
    },
  };
}
