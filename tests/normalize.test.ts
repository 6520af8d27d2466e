import { describe, expect, it } from "vitest";
import { compareCanonicalValues, normalize } from "../src/catalog/normalize.js";
import type { CanonicalValue } from "../src/types.js";

function metal(code: string | null, color: string | null = null, stamp: string | null = null): CanonicalValue | null {
  return normalize("metal_type", { code, stamp, color });
}

describe("field normalizer", () => {
  it("formats carat weight with two decimals and a CTW suffix", () => {
    expect(normalize("carat_weight", 2.8)).toEqual({ display: "2.80 CTW", value: "2.80", sortKey: [0, 2.8] });
    expect(normalize("carat_weight", 0)).toBeNull();
    expect(normalize("carat_weight", null)).toBeNull();
  });

  it("composes metal type from karat, colour and family", () => {
    expect(metal("14K", "W")?.display).toBe("14K White Gold");
    expect(metal("10KT", "PINK")?.display).toBe("10K Rose Gold");
    expect(metal("14K", "TT")?.display).toBe("14K Two-Tone Gold");
    expect(metal("14K")?.display).toBe("14K Gold");
    expect(metal("SS")?.display).toBe("Silver");
    expect(metal("PT950", "WHITE")?.display).toBe("Platinum");
    expect(metal("XX", null, "925")?.display).toBe("Silver");
    expect(metal(null)).toBeNull();
  });

  it("names platinum, tantalum and titanium with their colour after the metal", () => {
    expect(metal("PT950", "ROSE")?.display).toBe("Platinum Rose");
    expect(metal("TA")?.display).toBe("Tantalum");
    expect(metal("TANTALUM", "BLACK")?.display).toBe("Tantalum Black");
    expect(metal("TI")?.display).toBe("Titanium");
    expect(metal("TITANIUM", "Y")?.display).toBe("Titanium Yellow");
  });

  it("renders gold karat from the parsed code rather than the raw stamp", () => {
    expect(metal("14KT", "W")?.display).toBe("14K White Gold");
    expect(metal(null, "Y", "14 KARAT")?.display).toBe("14K Yellow Gold");
    expect(metal("14KT", "W")?.value).toBe(metal("14K", "WHITE")?.value);
  });

  it("orders metals gold by karat then colour precedence, then silver, then platinum", () => {
    const values = [metal("PT"), metal("SS"), metal("14K", "Y"), metal("10K", "Y"), metal("14K", "W")].filter(
      (value): value is CanonicalValue => value !== null,
    );

    expect(values.sort(compareCanonicalValues).map((value) => value.display)).toEqual([
      "10K Yellow Gold",
      "14K White Gold",
      "14K Yellow Gold",
      "Silver",
      "Platinum",
    ]);
  });

  it("sorts numeric ring sizes numerically and text sizes after them", () => {
    const values = ["10", "6.5", "M", "7"]
      .map((size) => normalize("ring_size", size))
      .filter((value): value is CanonicalValue => value !== null);

    expect(values.sort(compareCanonicalValues).map((value) => value.display)).toEqual(["6.5", "7.0", "10.0", "M"]);
  });

  it("renders stone dimensions in millimetres", () => {
    expect(normalize("stone_length", 6.5)).toEqual({ display: "6.5mm", value: "6.5", sortKey: [0, 6.5] });
    expect(normalize("stone_width", 7.25)?.display).toBe("7.25mm");
    expect(normalize("stone_width", -1)).toBeNull();
  });

  it("maps codes through the tables and falls back to display case", () => {
    expect(normalize("stone_shape", "CU")?.display).toBe("Cushion");
    expect(normalize("stone_shape", "kite")?.display).toBe("Kite");
    expect(normalize("stone_material", "LGD")?.display).toBe("Lab-Grown Diamond");
    expect(normalize("plating_type", "rh")?.display).toBe("Rhodium");
    expect(normalize("stone_cut", "vg")?.display).toBe("Very Good");
    expect(normalize("stone_cut", "XYZ")?.display).toBe("Excellent");
    expect(normalize("setting_style", "HALO_SETTING")?.display).toBe("Halo Setting");
  });

  it("ranks clarity grades by the grade scale", () => {
    expect(normalize("stone_clarity", "vs 1")).toEqual({ display: "VS1", value: "VS1", sortKey: [4] });
    expect(normalize("stone_clarity", "SI-X")).toEqual({ display: "SI-X", value: "SI-X", sortKey: [12, "SI-X"] });
  });

  it("keeps letter colour ranges compact", () => {
    expect(normalize("stone_color", "g - h")?.display).toBe("G-H");
    expect(normalize("stone_color", "champagne")?.display).toBe("Champagne");
  });

  it("treats empty values as missing", () => {
    expect(normalize("collection", "   ")).toBeNull();
    expect(normalize("stone_count", 0)).toBeNull();
    expect(normalize("is_best_seller", false)).toEqual({ display: "false", value: "false", sortKey: [0] });
  });
});
