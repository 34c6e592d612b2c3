import { describe, it, expect } from "vitest";
import type { ExecutionResult, SqlRow } from "@/lib/db/types";
import { buildDiagnosticTree, findDayCounts } from "@/lib/diagnostics/engine";
import type { ToolCall, ValidatedPlan } from "@/lib/planner/types";

const CONFIG = { zThreshold: 2, pctBand: 0.3, windowDays: 7, categoryTopN: 20 };

const PLAN: ValidatedPlan = {
  intent: "diagnose",
  time: { mode: "day", dt: "2017-12-03", days: null, start: null, end: null, strength: "explicit" },
  metrics: ["uv", "buyers"],
  dimension: "category",
  operation: null,
  assumptions: [],
  not_supported: null,
};

function result(call_id: string, template_key: string, rows: SqlRow[]): ExecutionResult {
  return {
    call_id,
    template_key,
    intent: "diagnose",
    rows,
    context: {
      row_count: rows.length,
      truncated: false,
      max_rows: 500,
      out_of_range: false,
      data_range: { min_date: "2017-11-25", max_date: "2017-12-03" },
    },
  };
}

const DECOMPOSE: ToolCall[] = [
  { kind: "template", call_id: "0", template_key: "overview_day", params: { dt: "2017-12-03" } },
  { kind: "template", call_id: "1", template_key: "funnel_daily", params: { days: 2, end_dt: "2017-12-03" } },
  { kind: "template", call_id: "2", template_key: "category_contrib_buyers", params: { dt: "2017-12-03" } },
  { kind: "report", call_id: "3", report: "buyers_decomposition", params: { dt: "2017-12-03" } },
];

const FUNNEL = result("1", "funnel_daily", [
  { dt: "2017-12-02", uv: 100, cart_users: 40, buyers: 10 },
  { dt: "2017-12-03", uv: 80, cart_users: 30, buyers: 6 },
]);

const CATEGORIES = result("2", "category_contrib_buyers", [
  { category_id: "7", uv_prev: 50, uv_cur: 40, buyers_prev: 5, buyers_cur: 2, delta: -3 },
  { category_id: "3", uv_prev: 20, uv_cur: 25, buyers_prev: 1, buyers_cur: 4, delta: 3 },
]);

describe("findDayCounts", () => {
  it("prefers funnel rows and reads numeric text", () => {
    const overview = result("0", "overview_day", [{ dt: "2017-12-03", uv: "81", buyers: "7", cart_users: null }]);
    expect(findDayCounts([overview, FUNNEL], "2017-12-03")).toEqual({ dt: "2017-12-03", uv: 80, buyers: 6, cart_users: 30 });
    expect(findDayCounts([overview], "2017-12-03")).toEqual({ dt: "2017-12-03", uv: 81, buyers: 7, cart_users: null });
    expect(findDayCounts([overview], "2017-12-02")).toBeNull();
  });
});

describe("buildDiagnosticTree", () => {
  it("returns null when the turn has no report call", () => {
    expect(buildDiagnosticTree(PLAN, DECOMPOSE.slice(0, 3), [FUNNEL], CONFIG)).toBeNull();
  });

  it("decomposes the buyers change and attributes it to categories", () => {
    const tree = buildDiagnosticTree(PLAN, DECOMPOSE, [FUNNEL, CATEGORIES], CONFIG);
    if (tree?.kind !== "decomposition") throw new Error("expected a decomposition tree");

    expect(tree.target_dt).toBe("2017-12-03");
    expect(tree.prior_dt).toBe("2017-12-02");
    expect(tree.root?.delta).toBe(-4);
    expect(tree.categories?.entries.map((entry) => entry.category_id)).toEqual(["3", "7"]);
    expect(tree.categories?.concentration_top3).toBe(1);
    expect(tree.notes).toEqual([]);
  });

  it("notes the missing day instead of decomposing", () => {
    const overview = result("0", "overview_day", [{ dt: "2017-12-03", uv: 80, buyers: 6, cart_users: 30 }]);
    const tree = buildDiagnosticTree(PLAN, DECOMPOSE, [overview, result("2", "category_contrib_buyers", [])], CONFIG);
    if (tree?.kind !== "decomposition") throw new Error("expected a decomposition tree");

    expect(tree.root).toBeNull();
    expect(tree.notes).toEqual([
      "No aggregate row for 2017-12-02; buyers change not decomposed",
      "No category rows for 2017-12-03",
    ]);
  });

  it("scans the requested daily metrics for anomalies", () => {
    const days = ["11-26", "11-27", "11-28", "11-29", "11-30", "12-01", "12-02", "12-03"];
    const rows = days.map((day, index) => ({ dt: `2017-${day}`, pv: 100, uv: index === 7 ? 20 : 10, buyers: 1, cart_users: 4 }));
    const calls: ToolCall[] = [
      { kind: "template", call_id: "0", template_key: "overview_daily", params: { days: 8, end_dt: "2017-12-03" } },
      { kind: "report", call_id: "1", report: "anomaly_scan", params: { end_dt: "2017-12-03", days: 1, window: 7 } },
    ];
    const plan: ValidatedPlan = { ...PLAN, intent: "anomaly", metrics: ["uv", "uv_to_buyer"], dimension: null };

    const tree = buildDiagnosticTree(plan, calls, [result("0", "overview_daily", rows)], CONFIG);
    if (tree?.kind !== "anomaly") throw new Error("expected an anomaly tree");

    expect(tree.thresholds).toEqual({ z_threshold: 2, pct_band: 0.3, window_days: 7 });
    expect(tree.notes).toEqual(["Anomaly scan covers daily aggregates only: uv"]);
    expect(tree.findings).toHaveLength(1);
    expect(tree.findings[0]).toMatchObject({ dt: "2017-12-03", metric: "uv", value: 20, pct_change: 1, flagged: true });
  });

  it("is deterministic for the same rows", () => {
    const first = buildDiagnosticTree(PLAN, DECOMPOSE, [FUNNEL, CATEGORIES], CONFIG);
    const second = buildDiagnosticTree(PLAN, DECOMPOSE, [FUNNEL, CATEGORIES], CONFIG);
    expect(second).toEqual(first);
  });
});
