import { describe, it, expect } from "vitest";
import { assembleAnswer, assembleNotSupported, type AnswerPayload } from "@/lib/answer/assembler";
import { verifyTraceability } from "@/lib/answer/provenance";
import { createDefaultCatalog } from "@/lib/capabilities/registry";
import { TraceabilityError } from "@/lib/core/errors";
import type { ExecutionOutcome, ExecutionResult, SqlRow } from "@/lib/db/types";
import { buildDiagnosticTree } from "@/lib/diagnostics/engine";
import type { ToolCall, ValidatedPlan } from "@/lib/planner/types";

const CATALOG = createDefaultCatalog();
const CONFIG = { zThreshold: 2, pctBand: 0.3, windowDays: 7, categoryTopN: 20 };

const DIAGNOSE: ValidatedPlan = {
  intent: "diagnose",
  time: { mode: "day", dt: "2017-12-03", days: null, start: null, end: null, strength: "explicit" },
  metrics: ["uv", "buyers"],
  dimension: "category",
  operation: null,
  assumptions: ["No supported metric requested; using uv and buyers"],
  not_supported: null,
};

const OVERVIEW = {
  ...DIAGNOSE,
  intent: "overview",
  time: { mode: "days", dt: null, days: 3, start: null, end: null, strength: "explicit" },
  metrics: ["uv"],
  dimension: null,
  assumptions: [],
} satisfies ValidatedPlan;

const CALLS: ToolCall[] = [
  { kind: "template", call_id: "0", template_key: "overview_day", params: { dt: "2017-12-03" } },
  { kind: "template", call_id: "1", template_key: "funnel_daily", params: { days: 2, end_dt: "2017-12-03" } },
  { kind: "template", call_id: "2", template_key: "category_contrib_buyers", params: { dt: "2017-12-03" } },
  { kind: "report", call_id: "3", report: "buyers_decomposition", params: { dt: "2017-12-03" } },
];

function ok(call_id: string, template_key: string, rows: SqlRow[], outOfRange = false): ExecutionOutcome {
  const result: ExecutionResult = {
    call_id,
    template_key,
    intent: "diagnose",
    rows,
    context: {
      row_count: rows.length,
      truncated: false,
      max_rows: 500,
      out_of_range: outOfRange,
      data_range: { min_date: "2017-11-25", max_date: "2017-12-03" },
    },
  };
  return { ok: true, result };
}

function resultsOf(outcomes: ExecutionOutcome[]): ExecutionResult[] {
  return outcomes.flatMap((outcome) => (outcome.ok ? [outcome.result] : []));
}

const DIAGNOSE_OUTCOMES: ExecutionOutcome[] = [
  ok("0", "overview_day", [{ dt: "2017-12-03", pv: 820, uv: 80, buyers: 6, cart_users: 30 }]),
  ok("1", "funnel_daily", [
    { dt: "2017-12-02", uv: 100, cart_users: 40, buyers: 10, uv_to_buyer: 10 / 100, uv_to_cart: 40 / 100, cart_to_buyer: 10 / 40 },
    { dt: "2017-12-03", uv: 80, cart_users: 30, buyers: 6, uv_to_buyer: 6 / 80, uv_to_cart: 30 / 80, cart_to_buyer: 6 / 30 },
  ]),
  ok("2", "category_contrib_buyers", [
    { category_id: "7", uv_prev: 50, uv_cur: 40, buyers_prev: 5, buyers_cur: 2, delta: -3 },
    { category_id: "12", uv_prev: 30, uv_cur: 30, buyers_prev: 3, buyers_cur: 2, delta: -1 },
  ]),
];

function diagnosePayload(): AnswerPayload {
  const tree = buildDiagnosticTree(DIAGNOSE, CALLS, resultsOf(DIAGNOSE_OUTCOMES), CONFIG);
  return assembleAnswer({ plan: DIAGNOSE, catalog: CATALOG, outcomes: DIAGNOSE_OUTCOMES, tree });
}

describe("assembleAnswer", () => {
  it("leads a diagnosis with the decomposed buyers change", () => {
    const payload = diagnosePayload();

    expect(payload.status).toBe("ok");
    expect(payload.assumptions).toEqual(["No supported metric requested; using uv and buyers"]);
    expect(payload.limitations).toEqual([]);
    expect(payload.headline_facts.map((fact) => fact.label)).toEqual([
      "buyers 2017-12-02 to 2017-12-03",
      "uv 2017-12-02 to 2017-12-03",
      "uv_to_buyer 2017-12-02 to 2017-12-03",
      "primary funnel stage change: uv_to_buyer",
      "secondary funnel stage change: cart_to_buyer",
      "secondary funnel stage change: uv_to_cart",
    ]);
    expect(payload.headline_facts[0]).toEqual({
      label: "buyers 2017-12-02 to 2017-12-03",
      metric: "buyers",
      from: { dt: "2017-12-02", value: 10, source: "tree:/root/prior_value" },
      to: { dt: "2017-12-03", value: 6, source: "tree:/root/current_value" },
      change: -4,
      change_pct: -40,
    });
    expect(payload.headline_facts[1]).toMatchObject({ change: -20, change_pct: -20 });
  });

  it("points every row value back at its call, row and column", () => {
    const payload = diagnosePayload();
    expect(payload.evidence.find((item) => item.label === "overview_day 2017-12-03 uv")).toEqual({
      label: "overview_day 2017-12-03 uv",
      value: 80,
      source: "rows:0/0/uv",
    });
    expect(payload.evidence.some((item) => item.source.startsWith("rows:2/"))).toBe(false);
    expect(payload.evidence.find((item) => item.label === "category 7 delta")).toEqual({
      label: "category 7 delta",
      value: -3,
      source: "tree:/categories/entries/0/delta",
    });
    expect(payload.evidence.find((item) => item.source === "tree:/categories/concentration_top3")?.value).toBe(1);
  });

  it("builds the same evidence for the same rows", () => {
    expect(diagnosePayload().evidence).toEqual(diagnosePayload().evidence);
  });

  it("reports trend facts when there is no diagnostic tree", () => {
    const outcomes = [
      ok("0", "overview_daily", [
        { dt: "2017-12-01", uv: 98 },
        { dt: "2017-12-02", uv: 100 },
        { dt: "2017-12-03", uv: 80 },
      ]),
    ];
    const payload = assembleAnswer({ plan: OVERVIEW, catalog: CATALOG, outcomes, tree: null });

    expect(payload.headline_facts).toEqual([
      {
        label: "uv 2017-12-01 to 2017-12-03",
        metric: "uv",
        from: { dt: "2017-12-01", value: 98, source: "rows:0/0/uv" },
        to: { dt: "2017-12-03", value: 80, source: "rows:0/2/uv" },
        change: -18,
        change_pct: (-18 * 100) / 98,
      },
      {
        label: "uv highest day",
        metric: "uv",
        from: null,
        to: { dt: "2017-12-02", value: 100, source: "rows:0/1/uv" },
        change: null,
        change_pct: null,
      },
      {
        label: "uv lowest day",
        metric: "uv",
        from: null,
        to: { dt: "2017-12-03", value: 80, source: "rows:0/2/uv" },
        change: null,
        change_pct: null,
      },
    ]);
  });

  it("ranks every funnel stage by its relative change", () => {
    const stages = diagnosePayload().headline_facts.filter((fact) => fact.label.includes("funnel stage change"));
    expect(stages.map((fact) => [fact.metric, fact.from?.source, fact.to.source])).toEqual([
      ["uv_to_buyer", "rows:1/0/uv_to_buyer", "rows:1/1/uv_to_buyer"],
      ["cart_to_buyer", "rows:1/0/cart_to_buyer", "rows:1/1/cart_to_buyer"],
      ["uv_to_cart", "rows:1/0/uv_to_cart", "rows:1/1/uv_to_cart"],
    ]);
  });

  it("reports where a raw-event trend turns", () => {
    const plan: ValidatedPlan = { ...OVERVIEW, time: { ...OVERVIEW.time, days: 4 }, metrics: ["dau"] };
    const outcomes = [
      ok("0", "user_activity", [
        { dt: "2017-11-30", dau: 50 },
        { dt: "2017-12-01", dau: 60 },
        { dt: "2017-12-02", dau: 55 },
        { dt: "2017-12-03", dau: 40 },
      ]),
    ];
    const payload = assembleAnswer({ plan, catalog: CATALOG, outcomes, tree: null });

    expect(payload.headline_facts.map((fact) => fact.label)).toEqual([
      "dau 2017-11-30 to 2017-12-03",
      "dau highest day",
      "dau lowest day",
      "dau turned down after 2017-12-01",
    ]);
    expect(payload.headline_facts[3]).toEqual({
      label: "dau turned down after 2017-12-01",
      metric: "dau",
      from: { dt: "2017-12-01", value: 60, source: "rows:0/1/dau" },
      to: { dt: "2017-12-02", value: 55, source: "rows:0/2/dau" },
      change: -5,
      change_pct: (-5 * 100) / 60,
    });
  });

  it("reads a metric through the column the catalog names", () => {
    const plan: ValidatedPlan = { ...OVERVIEW, metrics: ["new_vs_old_cvr"] };
    const outcomes = [
      ok("0", "new_vs_old_user_conversion", [
        { dt: "2017-12-03", new_cvr: 0.05, old_cvr: 0.08, new_uv: 200, old_uv: 500, new_buyers: 10, old_buyers: 40 },
      ]),
    ];
    expect(assembleAnswer({ plan, catalog: CATALOG, outcomes, tree: null }).headline_facts).toEqual([
      {
        label: "new_vs_old_cvr on 2017-12-03",
        metric: "new_vs_old_cvr",
        from: null,
        to: { dt: "2017-12-03", value: 0.05, source: "rows:0/0/new_cvr" },
        change: null,
        change_pct: null,
      },
    ]);
  });

  it("marks a turn with a failed call as partial and says why", () => {
    const outcomes: ExecutionOutcome[] = [
      ok("0", "overview_daily", [{ dt: "2017-12-03", uv: 80 }]),
      {
        ok: false,
        error: {
          call_id: "1",
          template_key: "funnel_daily",
          kind: "QueryTimeoutError",
          message: 'Query "funnel_daily" exceeded 15000ms; try a narrower time range',
        },
      },
    ];
    const payload = assembleAnswer({ plan: OVERVIEW, catalog: CATALOG, outcomes, tree: null });

    expect(payload.status).toBe("partial");
    expect(payload.limitations).toEqual([
      'funnel_daily was not executed (QueryTimeoutError): Query "funnel_daily" exceeded 15000ms; try a narrower time range',
    ]);
    expect(payload.headline_facts.map((fact) => fact.label)).toEqual(["uv on 2017-12-03"]);
  });

  it("reports dates outside the data as no_data", () => {
    const payload = assembleAnswer({ plan: OVERVIEW, catalog: CATALOG, outcomes: [ok("0", "overview_daily", [], true)], tree: null });
    expect(payload.status).toBe("no_data");
    expect(payload.headline_facts).toEqual([]);
    expect(payload.limitations).toEqual([
      "overview_daily: requested dates are outside the available data (2017-11-25 to 2017-12-03)",
    ]);
  });

  it("fails when no call succeeded", () => {
    const payload = assembleAnswer({
      plan: OVERVIEW,
      catalog: CATALOG,
      outcomes: [
        {
          ok: false,
          error: { call_id: "0", template_key: "overview_daily", kind: "QueryExecutionError", message: 'Query "overview_daily" failed to execute' },
        },
      ],
      tree: null,
    });
    expect(payload.status).toBe("failed");
    expect(payload.evidence).toEqual([]);
  });
});

describe("verifyTraceability", () => {
  it("rejects evidence whose value differs from its source", () => {
    const payload = diagnosePayload();
    const tampered: AnswerPayload = {
      ...payload,
      evidence: payload.evidence.map((item) => (item.source === "rows:0/0/uv" ? { ...item, value: 81 } : item)),
    };
    expect(() => verifyTraceability(tampered, resultsOf(DIAGNOSE_OUTCOMES))).toThrow(TraceabilityError);
  });

  it("rejects a change that does not follow from its endpoints", () => {
    const payload = diagnosePayload();
    const [first, ...rest] = payload.headline_facts;
    const tampered: AnswerPayload = { ...payload, headline_facts: [{ ...first, change_pct: -35 }, ...rest] };
    expect(() => verifyTraceability(tampered, resultsOf(DIAGNOSE_OUTCOMES))).toThrow(
      'Untraceable value at tree:/root/current_value: fact "buyers 2017-12-02 to 2017-12-03" change is not derived from its endpoints'
    );
  });
});

describe("assembleNotSupported", () => {
  it("explains the refusal with no facts or evidence", () => {
    const payload = assembleNotSupported("overview", {
      subject: "gmv",
      reason: "The dataset has no price or amount fields",
      missing_fields: ["price", "amount"],
      suggestion: "Ask about buyers, uv or conversion instead",
      assumptions: [],
    });
    expect(payload).toEqual({
      status: "not_supported",
      intent: "overview",
      headline_facts: [],
      evidence: [],
      diagnostic_tree: null,
      assumptions: [],
      limitations: [
        "gmv is not supported: The dataset has no price or amount fields",
        "Missing fields: price, amount",
        "Ask about buyers, uv or conversion instead",
      ],
      not_supported: {
        subject: "gmv",
        reason: "The dataset has no price or amount fields",
        missing_fields: ["price", "amount"],
        suggestion: "Ask about buyers, uv or conversion instead",
      },
    });
  });
});
