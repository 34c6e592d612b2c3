import type { SqlRow } from "@/lib/db/types";
import { splitTwoFactor } from "./decomposition";
import type { CategoryAttribution, CategoryBreakdown } from "./types";

const CONCENTRATION_DEPTH = 3;

function count(value: SqlRow[string] | undefined): number {
  const parsed = typeof value === "number" ? value : Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Orders ids numerically when both are digit strings, otherwise by code point. */
export function compareCategoryIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b) && a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function toAttribution(row: SqlRow): CategoryAttribution | null {
  const id = row.category_id;
  if (id === null || id === undefined || id === "") return null;
  const uvPrev = count(row.uv_prev);
  const uvCur = count(row.uv_cur);
  const buyersPrev = count(row.buyers_prev);
  const buyersCur = count(row.buyers_cur);
  const split = splitTwoFactor(uvPrev, buyersPrev, uvCur, buyersCur);
  return {
    category_id: String(id),
    uv_prev: uvPrev,
    uv_cur: uvCur,
    buyers_prev: buyersPrev,
    buyers_cur: buyersCur,
    delta: buyersCur - buyersPrev,
    traffic: split.traffic,
    efficiency: split.efficiency,
  };
}

/**
 * Ranks categories by |delta| (ties by id) and keeps the top N. Concentration is measured
 * over all categories, not just the kept ones.
 */
export function attributeCategories(rows: SqlRow[], topN: number): CategoryBreakdown {
  const all = rows.map(toAttribution).filter((entry): entry is CategoryAttribution => entry !== null);

  const ranked = [...all].sort(
    (a, b) => Math.abs(b.delta) - Math.abs(a.delta) || compareCategoryIds(a.category_id, b.category_id)
  );

  const negatives = all
    .filter((entry) => entry.delta < 0)
    .sort((a, b) => a.delta - b.delta || compareCategoryIds(a.category_id, b.category_id));
  const negativeDelta = negatives.reduce((sum, entry) => sum + entry.delta, 0);
  const topNegative = negatives.slice(0, CONCENTRATION_DEPTH).reduce((sum, entry) => sum + entry.delta, 0);

  return {
    top_n: topN,
    total_categories: all.length,
    total_delta: all.reduce((sum, entry) => sum + entry.delta, 0),
    negative_delta: negativeDelta,
    concentration_top3: negativeDelta < 0 ? topNegative / negativeDelta : null,
    entries: ranked.slice(0, topN),
  };
}
