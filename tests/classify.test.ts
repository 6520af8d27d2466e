import { describe, expect, it } from "vitest";
import { classify } from "../src/catalog/classify.js";
import { loadCatalogRules, resolveCategoryRules } from "../src/rules/load.js";
import { makeGroup } from "./fixtures.js";

const ringRules = resolveCategoryRules(loadCatalogRules(), "RING");

const rows = [
  { skuId: "R-1", caratWeight: 1, metalCode: "14K", metalColor: "W", ringSize: "6", shapeCode: "RD", materialCode: "LGD" },
  { skuId: "R-2", caratWeight: 1, metalCode: "14K", metalColor: "Y", ringSize: "6", shapeCode: "RD", materialCode: "LGD" },
  { skuId: "R-3", caratWeight: 1, metalCode: "14K", metalColor: "W", ringSize: "7", shapeCode: "RD", materialCode: "LGD" },
];

describe("attribute classifier", () => {
  it("splits constant and variant dimensions in eligible key order", () => {
    const classified = classify(makeGroup("G1", rows), ringRules);

    expect([...classified.keys()]).toEqual(["carat_weight", "metal_type", "ring_size", "stone_shape", "stone_material"]);
    expect(classified.get("carat_weight")?.kind).toBe("constant");
    expect(classified.get("metal_type")).toMatchObject({ kind: "variant" });
    expect(classified.get("metal_type")?.values.map((value) => value.display)).toEqual([
      "14K White Gold",
      "14K Yellow Gold",
    ]);
    expect(classified.get("ring_size")?.values.map((value) => value.display)).toEqual(["6.0", "7.0"]);
    expect(classified.get("stone_material")?.values.map((value) => value.display)).toEqual(["Lab-Grown Diamond"]);
  });

  it("leaves out keys with no value on any row", () => {
    const classified = classify(makeGroup("G1", rows), ringRules);

    expect(classified.has("stone_length")).toBe(false);
    expect(classified.has("plating_type")).toBe(false);
  });

  it("gives the same result whatever the row order", () => {
    const forward = classify(makeGroup("G1", rows), ringRules);
    const reversed = classify(makeGroup("G1", [...rows].reverse()), ringRules);

    expect([...reversed.entries()]).toEqual([...forward.entries()]);
  });

  it("collapses raw codes that normalize to the same value", () => {
    const classified = classify(
      makeGroup("G1", [
        { skuId: "R-1", shapeCode: "RD" },
        { skuId: "R-2", shapeCode: "ROUND" },
      ]),
      ringRules,
    );

    expect(classified.get("stone_shape")).toMatchObject({ kind: "constant" });
    expect(classified.get("stone_shape")?.values).toHaveLength(1);
  });
});
