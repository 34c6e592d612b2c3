import { describe, it, expect } from "vitest";
import { CapabilityCatalog, createDefaultCatalog } from "@/lib/capabilities/registry";

describe("CapabilityCatalog", () => {
  const catalog = createDefaultCatalog();

  it("resolves metrics by key and synonym regardless of case and separators", () => {
    expect(catalog.resolveMetric("UV")?.key).toBe("uv");
    expect(catalog.resolveMetric("unique visitors")?.key).toBe("uv");
    expect(catalog.resolveMetric("conversion-rate")?.key).toBe("uv_to_buyer");
    expect(catalog.resolveMetric("cart users")?.key).toBe("cart_users");
  });

  it("reports monetary metrics as unsupported with the missing fields", () => {
    const gmv = catalog.resolveMetric("revenue");
    expect(gmv?.supported).toBe(false);
    if (gmv && !gmv.supported) {
      expect(gmv.key).toBe("gmv");
      expect(gmv.missing_fields).toEqual(["price", "amount"]);
    }
    expect(catalog.getSupportedMetric("gmv")).toBeUndefined();
  });

  it("returns undefined for unknown terms", () => {
    expect(catalog.resolveMetric("happiness")).toBeUndefined();
    expect(catalog.resolveDimension("weather")).toBeUndefined();
  });

  it("knows which intents and dimensions are supported", () => {
    expect(catalog.getIntent("diagnose")?.supported).toBe(true);
    expect(catalog.getIntent("forecast")?.supported).toBe(false);
    expect(catalog.resolveDimension("categories")?.key).toBe("category");
    expect(catalog.resolveDimension("city")?.supported).toBe(false);
  });

  it("exposes the core metrics and is frozen", () => {
    expect(catalog.coreMetrics).toEqual(["uv", "buyers"]);
    expect(Object.isFrozen(catalog)).toBe(true);
  });

  it("rejects a term registered twice", () => {
    expect(
      () =>
        new CapabilityCatalog({
          metrics: [
            { key: "uv", description: "", synonyms: ["visitors"], supported: true, source: "daily_metrics", column: "uv" },
            { key: "visits", description: "", synonyms: ["Visitors"], supported: true, source: "daily_metrics", column: "pv" },
          ],
          intents: [],
          dimensions: [],
          coreMetrics: ["uv"],
        })
    ).toThrow('term "Visitors" is registered twice');
  });

  it("rejects core metrics that are not supported", () => {
    expect(
      () =>
        new CapabilityCatalog({
          metrics: [{ key: "gmv", description: "", synonyms: [], supported: false, missing_reason: "none", missing_fields: [] }],
          intents: [],
          dimensions: [],
          coreMetrics: ["gmv"],
        })
    ).toThrow('core metric "gmv" must be a supported metric');
  });
});
