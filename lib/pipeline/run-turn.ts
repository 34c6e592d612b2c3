import { assembleAnswer, assembleNotSupported, type AnswerPayload } from "@/lib/answer/assembler";
import type { CapabilityCatalog } from "@/lib/capabilities/registry";
import { Semaphore } from "@/lib/core/semaphore";
import type { GuardedQueryExecutor } from "@/lib/db/executor";
import { notSupportedResult, type ExecutionOutcome, type NotSupportedResult } from "@/lib/db/types";
import { buildDiagnosticTree } from "@/lib/diagnostics/engine";
import type { DiagnosticsConfig } from "@/lib/diagnostics/types";
import type { ServerEnv } from "@/lib/env/server";
import { PipelineTracer, type PipelineTrace } from "@/lib/observability/tracer";
import { arbitratePlan } from "@/lib/planner/arbiter";
import { normalizePlan } from "@/lib/planner/normalizer";
import { resolveToolCalls } from "@/lib/planner/resolver";
import { extractTimeSignal } from "@/lib/planner/time-signals";
import type { DatasetFacts, TemplateCall, ToolCall, ValidatedPlan } from "@/lib/planner/types";

export type PipelineConfig = {
  concurrency: number;
  diagnostics: DiagnosticsConfig;
};

export type PipelineDeps = {
  catalog: CapabilityCatalog;
  executor: GuardedQueryExecutor;
  facts: DatasetFacts;
  config: PipelineConfig;
  quietTrace?: boolean;
};

export type TurnInput = {
  /** Whatever the upstream extractor produced. */
  plan: unknown;
  question?: string;
};

export type TurnOutcome = {
  payload: AnswerPayload;
  validated: ValidatedPlan | null;
  calls: ToolCall[];
  outcomes: ExecutionOutcome[];
  notSupported: NotSupportedResult | null;
  trace: PipelineTrace;
};

export function pipelineConfigFromEnv(env: ServerEnv): PipelineConfig {
  return {
    concurrency: env.QUERY_CONCURRENCY,
    diagnostics: {
      zThreshold: env.ANOMALY_Z_THRESHOLD,
      pctBand: env.ANOMALY_PCT_BAND,
      windowDays: env.ANOMALY_WINDOW_DAYS,
      categoryTopN: env.CATEGORY_TOP_N,
    },
  };
}

/**
 * One user turn, plan in, payload out. Holds no state between calls; the only failure
 * that escapes is a ResolutionError, which means a validated intent has no mapping.
 */
export async function runTurn(input: TurnInput, deps: PipelineDeps): Promise<TurnOutcome> {
  const { catalog, executor, facts, config } = deps;
  const tracer = new PipelineTracer({ quiet: deps.quietTrace });

  try {
    const plan = await tracer.stage("normalize", () => normalizePlan(input.plan, facts));
    tracer.setIntent(plan.intent);

    const signal = input.question ? extractTimeSignal(input.question, facts) : null;
    const decision = await tracer.stage("arbitrate", () => arbitratePlan(plan, { catalog, facts, signal }));

    if (decision.kind === "not_supported") {
      const payload = assembleNotSupported(plan.intent, decision.decision);
      const trace = tracer.finish("not_supported", decision.decision.reason);
      return {
        payload,
        validated: null,
        calls: [],
        outcomes: [],
        notSupported: notSupportedResult(decision.decision.reason),
        trace,
      };
    }

    const validated = decision.plan;
    tracer.setAssumptions(validated.assumptions.length);
    const calls = await tracer.stage("resolve", () =>
      resolveToolCalls(validated, { catalog, facts, anomalyWindowDays: config.diagnostics.windowDays })
    );

    const templateCalls = calls.filter((call): call is TemplateCall => call.kind === "template");
    const semaphore = new Semaphore(config.concurrency);
    const outcomes: ExecutionOutcome[] = await tracer.stage(
      "execute",
      () => Promise.all(templateCalls.map((call) => semaphore.run(() => executor.execute(call, validated.intent)))),
      `${templateCalls.length} call(s)`
    );
    outcomes.forEach((outcome) => tracer.logQuery(outcome));

    const results = outcomes.flatMap((outcome) => (outcome.ok ? [outcome.result] : []));
    const tree = await tracer.stage("diagnose", () => buildDiagnosticTree(validated, calls, results, config.diagnostics));
    const payload = await tracer.stage("assemble", () => assembleAnswer({ plan: validated, catalog, outcomes, tree }));

    const trace = tracer.finish("success");
    return { payload, validated, calls, outcomes, notSupported: null, trace };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    tracer.finish("failure", message);
    throw error;
  }
}
