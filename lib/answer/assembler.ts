import type { CapabilityCatalog } from "@/lib/capabilities/registry";
import type { Intent } from "@/lib/capabilities/types";
import type { ExecutionFailure, ExecutionOutcome, ExecutionResult, SqlRow } from "@/lib/db/types";
import type { AnomalyTree, DecompositionTree, DiagnosticNode, DiagnosticTree } from "@/lib/diagnostics/types";
import type { NotSupportedDecision, ValidatedPlan } from "@/lib/planner/types";
import { changeOf, rowsPointer, treePointer, verifyTraceability } from "./provenance";
import {
  AnswerPayloadSchema,
  type AnswerStatus,
  type EvidenceItem,
  type FactPoint,
  type HeadlineFact,
  type NotSupportedInfo,
} from "./types";

export type AnswerPayload = {
  status: AnswerStatus;
  intent: Intent;
  headline_facts: HeadlineFact[];
  evidence: EvidenceItem[];
  diagnostic_tree: DiagnosticTree | null;
  assumptions: string[];
  limitations: string[];
  not_supported: NotSupportedInfo | null;
};

export type AssemblyInput = {
  plan: ValidatedPlan;
  /** Maps each requested metric to the column its rows carry. */
  catalog: CapabilityCatalog;
  outcomes: ExecutionOutcome[];
  tree: DiagnosticTree | null;
};

// Columns that identify a row rather than measure something.
const KEY_COLUMNS = new Set(["dt", "category_id"]);
// Category rows are summarised through the tree, not listed one by one.
const TREE_SUMMARISED = new Set(["category_contrib_buyers"]);
const FUNNEL_STAGES = ["uv_to_buyer", "uv_to_cart", "cart_to_buyer"];
// Raw-event trends also report where the day-over-day direction first turns.
const INFLECTION_METRICS = new Set(["dau", "retention_1d"]);

function rowLabel(row: SqlRow, index: number): string {
  return typeof row.dt === "string" ? row.dt : `#${index}`;
}

function rowEvidence(result: ExecutionResult): EvidenceItem[] {
  const items: EvidenceItem[] = [];
  result.rows.forEach((row, index) => {
    for (const [column, value] of Object.entries(row)) {
      if (KEY_COLUMNS.has(column) || typeof value === "string" || typeof value === "boolean") continue;
      items.push({
        label: `${result.template_key} ${rowLabel(row, index)} ${column}`,
        value,
        source: rowsPointer(result.call_id, index, column),
      });
    }
  });
  return items;
}

function nodeEvidence(node: DiagnosticNode, path: (string | number)[], items: EvidenceItem[]): void {
  items.push(
    { label: `${node.metric} prior`, value: node.prior_value, source: treePointer(...path, "prior_value") },
    { label: `${node.metric} current`, value: node.current_value, source: treePointer(...path, "current_value") },
    { label: `${node.metric} delta`, value: node.delta, source: treePointer(...path, "delta") }
  );
  node.decomposition.forEach((factor, index) => {
    items.push({
      label: `${node.metric} ${factor.factor} contribution`,
      value: factor.contribution,
      source: treePointer(...path, "decomposition", index, "contribution"),
    });
  });
  node.children.forEach((child, index) => nodeEvidence(child, [...path, "children", index], items));
}

function decompositionEvidence(tree: DecompositionTree): EvidenceItem[] {
  const items: EvidenceItem[] = [];
  if (tree.root) nodeEvidence(tree.root, ["root"], items);
  if (tree.categories) {
    items.push({
      label: "top 3 negative categories share of buyers decline",
      value: tree.categories.concentration_top3,
      source: treePointer("categories", "concentration_top3"),
    });
    tree.categories.entries.forEach((entry, index) => {
      for (const field of ["delta", "traffic", "efficiency"] as const) {
        items.push({
          label: `category ${entry.category_id} ${field}`,
          value: entry[field],
          source: treePointer("categories", "entries", index, field),
        });
      }
    });
  }
  return items;
}

function anomalyEvidence(tree: AnomalyTree): EvidenceItem[] {
  const items: EvidenceItem[] = [];
  tree.findings.forEach((finding, index) => {
    for (const field of ["value", "baseline_mean", "z_score", "pct_change", "flagged"] as const) {
      items.push({
        label: `${finding.metric} ${finding.dt} ${field}`,
        value: finding[field],
        source: treePointer("findings", index, field),
      });
    }
  });
  return items;
}

function fact(label: string, metric: string, from: FactPoint | null, to: FactPoint): HeadlineFact {
  const derived = from ? changeOf(from.value, to.value) : { change: null, change_pct: null };
  return { label, metric, from, to, ...derived };
}

function nodeFact(node: DiagnosticNode, path: (string | number)[], priorDt: string, targetDt: string): HeadlineFact | null {
  if (node.prior_value === null || node.current_value === null) return null;
  return fact(
    `${node.metric} ${priorDt} to ${targetDt}`,
    node.metric,
    { dt: priorDt, value: node.prior_value, source: treePointer(...path, "prior_value") },
    { dt: targetDt, value: node.current_value, source: treePointer(...path, "current_value") }
  );
}

function decompositionFacts(tree: DecompositionTree): HeadlineFact[] {
  if (!tree.root) return [];
  const facts = [nodeFact(tree.root, ["root"], tree.prior_dt, tree.target_dt)];
  tree.root.children.forEach((child, index) => {
    facts.push(nodeFact(child, ["root", "children", index], tree.prior_dt, tree.target_dt));
  });
  return facts.filter((entry): entry is HeadlineFact => entry !== null);
}

function anomalyFacts(tree: AnomalyTree): HeadlineFact[] {
  const facts: HeadlineFact[] = [];
  tree.findings.forEach((finding, index) => {
    if (!finding.flagged) return;
    const baseline =
      finding.baseline_mean === null ? null : { dt: null, value: finding.baseline_mean, source: treePointer("findings", index, "baseline_mean") };
    facts.push(
      fact(`${finding.metric} anomaly on ${finding.dt}`, finding.metric, baseline, {
        dt: finding.dt,
        value: finding.value,
        source: treePointer("findings", index, "value"),
      })
    );
  });
  return facts;
}

function point(result: ExecutionResult, index: number, column: string): FactPoint | null {
  const row = result.rows[index];
  const value = row[column];
  if (typeof value !== "number") return null;
  return { dt: typeof row.dt === "string" ? row.dt : null, value, source: rowsPointer(result.call_id, index, column) };
}

function inflectionFact(metric: string, points: FactPoint[]): HeadlineFact | null {
  for (let index = 2; index < points.length; index += 1) {
    const before = points[index - 1].value - points[index - 2].value;
    const after = points[index].value - points[index - 1].value;
    if (before * after < 0) {
      const turn = points[index - 1];
      return fact(`${metric} turned ${after > 0 ? "up" : "down"} after ${turn.dt ?? `row ${index - 1}`}`, metric, turn, points[index]);
    }
  }
  return null;
}

// First against last day, plus the extreme days, for each requested metric.
function trendFacts(plan: ValidatedPlan, results: ExecutionResult[], catalog: CapabilityCatalog): HeadlineFact[] {
  const facts: HeadlineFact[] = [];
  for (const metric of plan.metrics) {
    const column = catalog.getSupportedMetric(metric)?.column ?? metric;
    const result = results.find(
      (candidate) => !TREE_SUMMARISED.has(candidate.template_key) && candidate.rows.some((row) => typeof row[column] === "number")
    );
    if (!result) continue;

    const points = result.rows.map((_, index) => point(result, index, column)).filter((entry): entry is FactPoint => entry !== null);
    if (points.length === 1) {
      facts.push(fact(`${metric} on ${points[0].dt ?? "requested day"}`, metric, null, points[0]));
      continue;
    }

    const first = points[0];
    const last = points[points.length - 1];
    facts.push(fact(`${metric} ${first.dt ?? "first"} to ${last.dt ?? "last"}`, metric, first, last));
    const highest = points.reduce((best, entry) => (entry.value > best.value ? entry : best));
    const lowest = points.reduce((best, entry) => (entry.value < best.value ? entry : best));
    facts.push(fact(`${metric} highest day`, metric, null, highest));
    facts.push(fact(`${metric} lowest day`, metric, null, lowest));

    if (INFLECTION_METRICS.has(metric)) {
      const inflection = inflectionFact(metric, points);
      if (inflection) facts.push(inflection);
    }
  }
  return facts;
}

/** Every funnel stage with a defined relative change, largest first. */
function stageFacts(results: ExecutionResult[]): HeadlineFact[] {
  const funnel = results.find((result) => result.template_key === "funnel_daily" && result.rows.length >= 2);
  if (!funnel) return [];
  const lastIndex = funnel.rows.length - 1;

  const ranked: HeadlineFact[] = [];
  for (const stage of FUNNEL_STAGES) {
    const from = point(funnel, 0, stage);
    const to = point(funnel, lastIndex, stage);
    if (!from || !to) continue;
    const candidate = fact(stage, stage, from, to);
    if (candidate.change_pct !== null) ranked.push(candidate);
  }
  ranked.sort((a, b) => Math.abs(b.change_pct ?? 0) - Math.abs(a.change_pct ?? 0));

  return ranked.map((entry, index) => ({
    ...entry,
    label: `${index === 0 ? "primary" : "secondary"} funnel stage change: ${entry.metric}`,
  }));
}

function limitationFor(result: ExecutionResult): string | null {
  const { context } = result;
  if (context.out_of_range) {
    return `${result.template_key}: requested dates are outside the available data (${context.data_range.min_date} to ${context.data_range.max_date})`;
  }
  if (context.truncated) {
    return `${result.template_key}: only the first ${context.max_rows} rows were kept`;
  }
  if (context.row_count === 0) {
    return `${result.template_key}: no rows for the requested dates`;
  }
  return null;
}

function failureLimitation(failure: ExecutionFailure): string {
  return `${failure.template_key} was not executed (${failure.kind}): ${failure.message}`;
}

function hasTreeContent(tree: DiagnosticTree | null): boolean {
  if (!tree) return false;
  return tree.kind === "decomposition" ? tree.root !== null : tree.findings.length > 0;
}

function statusOf(results: ExecutionResult[], failures: ExecutionFailure[], tree: DiagnosticTree | null): AnswerStatus {
  if (results.length === 0 && failures.length > 0) return "failed";
  const anyRows = results.some((result) => result.rows.length > 0);
  if (!anyRows && !hasTreeContent(tree)) return "no_data";
  if (failures.length > 0 || results.some((result) => result.context.out_of_range)) return "partial";
  return "ok";
}

/**
 * Builds the payload from this turn's results and tree only. Every number in it points
 * back at a row or tree node; the payload is checked before it is returned.
 */
export function assembleAnswer(input: AssemblyInput): AnswerPayload {
  const { plan, catalog, outcomes, tree } = input;
  const results: ExecutionResult[] = [];
  const failures: ExecutionFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) results.push(outcome.result);
    else failures.push(outcome.error);
  }

  const evidence = results.filter((result) => !TREE_SUMMARISED.has(result.template_key)).flatMap(rowEvidence);
  const headline: HeadlineFact[] = [];
  if (tree?.kind === "decomposition") {
    evidence.push(...decompositionEvidence(tree));
    headline.push(...decompositionFacts(tree));
  } else if (tree?.kind === "anomaly") {
    evidence.push(...anomalyEvidence(tree));
    headline.push(...anomalyFacts(tree));
  }
  if (headline.length === 0) {
    headline.push(...trendFacts(plan, results, catalog));
  }
  headline.push(...stageFacts(results));

  const limitations = [
    ...failures.map(failureLimitation),
    ...results.map(limitationFor).filter((entry): entry is string => entry !== null),
    ...(tree ? tree.notes : []),
  ];

  const payload: AnswerPayload = {
    status: statusOf(results, failures, tree),
    intent: plan.intent,
    headline_facts: headline,
    evidence,
    diagnostic_tree: tree,
    assumptions: [...plan.assumptions],
    limitations,
    not_supported: null,
  };

  AnswerPayloadSchema.parse(payload);
  verifyTraceability(payload, results);
  return payload;
}

export function assembleNotSupported(intent: Intent, decision: NotSupportedDecision): AnswerPayload {
  const limitations = [`${decision.subject} is not supported: ${decision.reason}`];
  if (decision.missing_fields.length > 0) {
    limitations.push(`Missing fields: ${decision.missing_fields.join(", ")}`);
  }
  if (decision.suggestion) limitations.push(decision.suggestion);

  const payload: AnswerPayload = {
    status: "not_supported",
    intent,
    headline_facts: [],
    evidence: [],
    diagnostic_tree: null,
    assumptions: [...decision.assumptions],
    limitations,
    not_supported: {
      subject: decision.subject,
      reason: decision.reason,
      missing_fields: [...decision.missing_fields],
      suggestion: decision.suggestion,
    },
  };
  AnswerPayloadSchema.parse(payload);
  return payload;
}
