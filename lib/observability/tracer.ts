import { randomUUID } from "crypto";
import type { Intent } from "@/lib/capabilities/types";
import type { ExecutionOutcome } from "@/lib/db/types";

export type TraceStage = "normalize" | "arbitrate" | "resolve" | "execute" | "diagnose" | "assemble";

export type StageRecord = {
  stage: TraceStage;
  durationMs: number;
  detail?: string;
};

export type QueryRecord = {
  callId: string;
  templateKey: string;
  ok: boolean;
  rowCount: number;
  failure?: string;
};

export type PipelineTrace = {
  id: string;
  timestamp: string;
  intent?: Intent;
  stages: StageRecord[];
  queries: QueryRecord[];
  assumptions: number;
  outcome: "success" | "not_supported" | "failure";
  failure_reason?: string;
};

/**
 * Per-turn trace. Lives beside the payload, never inside it, so answers stay identical
 * across runs while every run still gets its own id and timings.
 */
export class PipelineTracer {
  private trace: PipelineTrace;
  private readonly quiet: boolean;

  constructor(options: { quiet?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
    this.trace = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      stages: [],
      queries: [],
      assumptions: 0,
      outcome: "failure", // Default to failure until explicit success
    };
  }

  setIntent(intent: Intent) {
    this.trace.intent = intent;
  }

  setAssumptions(count: number) {
    this.trace.assumptions = count;
  }

  async stage<T>(stage: TraceStage, fn: () => T | Promise<T>, detail?: string): Promise<T> {
    const started = Date.now();
    try {
      return await fn();
    } finally {
      this.trace.stages.push({ stage, durationMs: Date.now() - started, ...(detail ? { detail } : {}) });
    }
  }

  logQuery(outcome: ExecutionOutcome) {
    if (outcome.ok) {
      const { result } = outcome;
      this.trace.queries.push({ callId: result.call_id, templateKey: result.template_key, ok: true, rowCount: result.rows.length });
    } else {
      const { error } = outcome;
      this.trace.queries.push({ callId: error.call_id, templateKey: error.template_key, ok: false, rowCount: 0, failure: error.kind });
    }
  }

  finish(outcome: PipelineTrace["outcome"], reason?: string) {
    this.trace.outcome = outcome;
    if (reason) this.trace.failure_reason = reason;

    if (!this.quiet) {
      console.log(`[PipelineTrace] ${JSON.stringify(this.trace)}`);
    }
    return this.trace;
  }
}
