import { TraceabilityError } from "@/lib/core/errors";
import type { ExecutionResult, SqlValue } from "@/lib/db/types";
import type { DiagnosticTree } from "@/lib/diagnostics/types";
import type { AnswerPayload } from "./assembler";

export function rowsPointer(callId: string, row: number, column: string): string {
  return `rows:${callId}/${row}/${column}`;
}

function escapeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

function unescapeToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

export function treePointer(...path: (string | number)[]): string {
  return `tree:${path.map((token) => `/${escapeToken(String(token))}`).join("")}`;
}

function walk(tree: DiagnosticTree, tokens: string[], source: string): unknown {
  let current: unknown = tree;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      const index = /^\d+$/.test(token) ? parseInt(token, 10) : -1;
      if (index < 0 || index >= current.length) throw new TraceabilityError(source, `no element ${token}`);
      current = current[index];
    } else if (typeof current === "object" && current !== null && Object.prototype.hasOwnProperty.call(current, token)) {
      current = Object.getOwnPropertyDescriptor(current, token)?.value;
    } else {
      throw new TraceabilityError(source, `no field ${token}`);
    }
  }
  return current;
}

/** Resolves an evidence pointer against this turn's rows and tree. */
export function resolvePointer(source: string, results: readonly ExecutionResult[], tree: DiagnosticTree | null): SqlValue {
  let value: unknown;
  if (source.startsWith("rows:")) {
    const match = source.match(/^rows:([^/]+)\/(\d+)\/(.+)$/);
    if (!match) throw new TraceabilityError(source, "malformed row pointer");
    const result = results.find((candidate) => candidate.call_id === match[1]);
    if (!result) throw new TraceabilityError(source, `no result for call ${match[1]}`);
    const row = result.rows[parseInt(match[2], 10)];
    if (!row || !(match[3] in row)) throw new TraceabilityError(source, "no such row or column");
    value = row[match[3]];
  } else if (source.startsWith("tree:")) {
    if (!tree) throw new TraceabilityError(source, "turn produced no diagnostic tree");
    const path = source.slice("tree:".length);
    const tokens = path === "" ? [] : path.slice(1).split("/").map(unescapeToken);
    value = walk(tree, tokens, source);
  } else {
    throw new TraceabilityError(source, "unknown pointer scheme");
  }

  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  throw new TraceabilityError(source, "pointer does not name a scalar");
}

export function changeOf(from: number, to: number): { change: number; change_pct: number | null } {
  const change = to - from;
  return { change, change_pct: from !== 0 ? (change * 100) / from : null };
}

/**
 * Re-resolves every pointer in the payload and checks the value it carries. Derived
 * changes must be recomputable from their endpoints. Throws on the first mismatch.
 */
export function verifyTraceability(payload: AnswerPayload, results: readonly ExecutionResult[]): void {
  const tree = payload.diagnostic_tree;

  for (const item of payload.evidence) {
    const resolved = resolvePointer(item.source, results, tree);
    if (!Object.is(resolved, item.value)) {
      throw new TraceabilityError(item.source, `evidence "${item.label}" carries ${String(item.value)}, source holds ${String(resolved)}`);
    }
  }

  for (const fact of payload.headline_facts) {
    for (const point of fact.from ? [fact.from, fact.to] : [fact.to]) {
      const resolved = resolvePointer(point.source, results, tree);
      if (!Object.is(resolved, point.value)) {
        throw new TraceabilityError(point.source, `fact "${fact.label}" carries ${point.value}, source holds ${String(resolved)}`);
      }
    }
    const expected = fact.from ? changeOf(fact.from.value, fact.to.value) : { change: null, change_pct: null };
    if (!Object.is(expected.change, fact.change) || !Object.is(expected.change_pct, fact.change_pct)) {
      throw new TraceabilityError(fact.to.source, `fact "${fact.label}" change is not derived from its endpoints`);
    }
  }
}
