import { describe, it, expect } from "vitest";
import { decomposeBuyers, splitTwoFactor } from "@/lib/diagnostics/decomposition";

const DEC_02 = { dt: "2017-12-02", uv: 100, buyers: 10, cart_users: 40 };
const DEC_03 = { dt: "2017-12-03", uv: 80, buyers: 6, cart_users: 30 };

describe("splitTwoFactor", () => {
  it("splits a drop into traffic and efficiency that sum to the delta", () => {
    const split = splitTwoFactor(100, 10, 80, 6);
    expect(split.traffic).toBeCloseTo(-2, 10);
    expect(split.efficiency).toBeCloseTo(-2, 10);
    expect(split.traffic + (split.efficiency ?? 0)).toBeCloseTo(-4, 10);
  });

  it("puts the whole change on efficiency when traffic is flat", () => {
    const split = splitTwoFactor(100, 10, 100, 8);
    expect(split.traffic).toBe(0);
    expect(split.efficiency).toBeCloseTo(-2, 10);
  });

  it("leaves efficiency undefined when a day has no visitors", () => {
    expect(splitTwoFactor(100, 10, 0, 0)).toEqual({ traffic: -10, efficiency: null });
    expect(splitTwoFactor(0, 0, 50, 5)).toEqual({ traffic: 5, efficiency: null });
  });
});

describe("decomposeBuyers", () => {
  it("builds the buyers tree down to the funnel stages", () => {
    const { root, notes } = decomposeBuyers(DEC_02, DEC_03);

    expect(notes).toEqual([]);
    expect(root).toMatchObject({ metric: "buyers", prior_value: 10, current_value: 6, delta: -4 });
    expect(root.decomposition.map((entry) => [entry.factor, entry.status])).toEqual([
      ["traffic", "ok"],
      ["efficiency", "ok"],
    ]);

    const [uv, efficiency] = root.children;
    expect(uv).toEqual({ metric: "uv", prior_value: 100, current_value: 80, delta: -20, decomposition: [], children: [] });
    expect(efficiency.metric).toBe("uv_to_buyer");
    expect(efficiency.prior_value).toBeCloseTo(0.1, 10);
    expect(efficiency.current_value).toBeCloseTo(0.075, 10);

    const [toCart, toBuyer] = efficiency.decomposition;
    expect(toCart.factor).toBe("uv_to_cart");
    expect(toCart.contribution).toBeCloseTo(-0.5, 10);
    expect(toBuyer.factor).toBe("cart_to_buyer");
    expect(toBuyer.contribution).toBeCloseTo(-1.5, 10);
    expect(efficiency.children.map((child) => [child.metric, child.prior_value, child.current_value])).toEqual([
      ["uv_to_cart", 0.4, 0.375],
      ["cart_to_buyer", 0.25, 0.2],
    ]);
  });

  it("notes an undefined efficiency term instead of dividing by zero", () => {
    const { root, notes } = decomposeBuyers(DEC_02, { dt: "2017-12-03", uv: 0, buyers: 0, cart_users: 0 });
    expect(notes).toEqual(["Term efficiency is undefined: uv is zero"]);
    expect(root.decomposition).toEqual([
      { factor: "traffic", contribution: -10, status: "ok" },
      { factor: "efficiency", contribution: null, status: "undefined" },
    ]);
    expect(root.children.map((child) => child.metric)).toEqual(["uv"]);
  });

  it("notes undefined stage factors when a day has no cart users", () => {
    const { root, notes } = decomposeBuyers({ ...DEC_02, cart_users: 0 }, DEC_03);
    expect(notes).toEqual(["Term uv_to_cart, cart_to_buyer is undefined: cart_users is zero"]);
    const efficiency = root.children[1];
    expect(efficiency.decomposition.every((entry) => entry.status === "undefined")).toBe(true);
    expect(efficiency.children).toEqual([]);
  });

  it("skips the stage split silently when cart users were not fetched", () => {
    const { root, notes } = decomposeBuyers({ ...DEC_02, cart_users: null }, { ...DEC_03, cart_users: null });
    expect(notes).toEqual([]);
    expect(root.children[1].decomposition.map((entry) => entry.contribution)).toEqual([null, null]);
  });
});
