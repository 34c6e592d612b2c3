import { DecompositionError } from "@/lib/core/errors";
import type { DiagnosticNode, FactorContribution } from "./types";

export type DayCounts = {
  dt: string;
  uv: number;
  buyers: number;
  cart_users: number | null;
};

export type TwoFactorSplit = {
  traffic: number;
  efficiency: number | null;
};

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}

/**
 * buyers = uv * cr. Traffic holds cr at its prior value, efficiency takes the rest at
 * current uv, so traffic + efficiency is exactly buyers1 - buyers0. Without a prior or
 * current uv there is no rate, and the whole delta is left on traffic.
 */
export function splitTwoFactor(uv0: number, buyers0: number, uv1: number, buyers1: number): TwoFactorSplit {
  const cr0 = ratio(buyers0, uv0);
  const cr1 = ratio(buyers1, uv1);
  if (cr0 === null || cr1 === null) {
    return { traffic: buyers1 - buyers0, efficiency: null };
  }
  return { traffic: (uv1 - uv0) * cr0, efficiency: uv1 * (cr1 - cr0) };
}

function factor(name: string, value: number | null): FactorContribution {
  return value === null ? { factor: name, contribution: null, status: "undefined" } : { factor: name, contribution: value, status: "ok" };
}

function leaf(metric: string, prior: number | null, current: number | null): DiagnosticNode {
  return {
    metric,
    prior_value: prior,
    current_value: current,
    delta: prior === null || current === null ? null : current - prior,
    decomposition: [],
    children: [],
  };
}

// cr = uv_to_cart * cart_to_buyer, split the same way at current uv.
function efficiencyNode(prior: DayCounts, current: DayCounts, notes: string[]): DiagnosticNode {
  const cr0 = ratio(prior.buyers, prior.uv);
  const cr1 = ratio(current.buyers, current.uv);
  const node = leaf("uv_to_buyer", cr0, cr1);

  const a0 = prior.cart_users === null ? null : ratio(prior.cart_users, prior.uv);
  const a1 = current.cart_users === null ? null : ratio(current.cart_users, current.uv);
  const s0 = prior.cart_users === null ? null : ratio(prior.buyers, prior.cart_users);
  const s1 = current.cart_users === null ? null : ratio(current.buyers, current.cart_users);

  if (a0 === null || a1 === null || s0 === null || s1 === null) {
    if (prior.cart_users !== null && current.cart_users !== null) {
      notes.push(new DecompositionError("uv_to_cart, cart_to_buyer", "cart_users").message);
    }
    node.decomposition = [factor("uv_to_cart", null), factor("cart_to_buyer", null)];
    return node;
  }

  node.decomposition = [factor("uv_to_cart", current.uv * (a1 - a0) * s0), factor("cart_to_buyer", current.uv * a1 * (s1 - s0))];
  node.children = [leaf("uv_to_cart", a0, a1), leaf("cart_to_buyer", s0, s1)];
  return node;
}

/** Decomposes the buyers change between two days into traffic and efficiency. */
export function decomposeBuyers(prior: DayCounts, current: DayCounts): { root: DiagnosticNode; notes: string[] } {
  const notes: string[] = [];
  const split = splitTwoFactor(prior.uv, prior.buyers, current.uv, current.buyers);
  if (split.efficiency === null) {
    notes.push(new DecompositionError("efficiency", "uv").message);
  }

  const children = [leaf("uv", prior.uv, current.uv)];
  if (split.efficiency !== null) {
    children.push(efficiencyNode(prior, current, notes));
  }

  const root: DiagnosticNode = {
    metric: "buyers",
    prior_value: prior.buyers,
    current_value: current.buyers,
    delta: current.buyers - prior.buyers,
    decomposition: [factor("traffic", split.traffic), factor("efficiency", split.efficiency)],
    children,
  };
  return { root, notes };
}
