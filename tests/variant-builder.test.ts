import { describe, expect, it } from "vitest";
import { classify } from "../src/catalog/classify.js";
import {
  MISSING_OPTION_VALUE,
  build,
  buildCatalogEntity,
  buildHandle,
  buildTitle,
} from "../src/catalog/variant-builder.js";
import { loadCatalogRules, resolveCategoryRules } from "../src/rules/load.js";
import { SyncGroupError } from "../src/sync/errors.js";
import { makeGroup } from "./fixtures.js";

const rules = loadCatalogRules();
const ringRules = resolveCategoryRules(rules, "RING");
const entityOptions = { maxHandleLength: 255, vendor: null, status: "DRAFT" as const };

function captureError(run: () => unknown): SyncGroupError {
  try {
    run();
  } catch (error) {
    if (error instanceof SyncGroupError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a SyncGroupError.");
}

const moissaniteRing = makeGroup("ABC123", [
  {
    skuId: "M-1",
    caratWeight: 2.8,
    shapeCode: "CUSHION",
    materialCode: "MOISSANITE",
    subgroupCode: "HALO",
    metalCode: "14K",
    metalColor: "Y",
    price: 899,
  },
]);

describe("variant builder", () => {
  it("builds the title from constant attributes in fixed order", () => {
    const classified = classify(moissaniteRing, ringRules);

    expect(buildTitle(classified, ringRules)).toBe("2.80 CTW DEW Cushion Moissanite Halo Ring in 14K Yellow Gold");
  });

  it("derives a handle with the group id suffix", () => {
    const { entity } = buildCatalogEntity(moissaniteRing, [], entityOptions);

    expect(entity.handle).toBe("280-ctw-dew-cushion-moissanite-halo-ring-in-14k-yellow-gold-abc123");
  });

  it("truncates the slug before the suffix and trims trailing hyphens", () => {
    const title = "2.80 CTW DEW Cushion Moissanite Halo Ring in 14K Yellow Gold";

    expect(buildHandle(title, "ABC123", 27)).toBe("280-ctw-dew-cushion-abc123");
  });

  it("gives a single SKU without variation no options", () => {
    const { entity, warnings } = buildCatalogEntity(moissaniteRing, [], entityOptions);

    expect(entity.variantOptions).toEqual([]);
    expect(entity.variants).toEqual([
      {
        sku: "M-1",
        optionValues: [],
        price: 899,
        compareAtPrice: null,
        barcode: null,
        inventoryQuantity: null,
        weightGrams: null,
      },
    ]);
    expect(warnings).toEqual([]);
  });

  it("orders options by category priority and variants by option value order", () => {
    const group = makeGroup("G1", [
      { skuId: "R-2", caratWeight: 1, metalCode: "14K", metalColor: "Y", ringSize: "6", shapeCode: "RD", materialCode: "LGD" },
      { skuId: "R-3", caratWeight: 1, metalCode: "14K", metalColor: "W", ringSize: "7", shapeCode: "RD", materialCode: "LGD" },
      { skuId: "R-1", caratWeight: 1, metalCode: "14K", metalColor: "W", ringSize: "6", shapeCode: "RD", materialCode: "LGD" },
    ]);

    const { entity } = buildCatalogEntity(group, [], entityOptions);

    expect(entity.title).toBe("1.00 CTW Round Lab-Grown Diamond Ring");
    expect(entity.handle).toBe("100-ctw-round-lab-grown-diamond-ring-g1");
    expect(entity.variantOptions).toEqual([
      { key: "metal_type", displayName: "Metal Type", sortedValues: ["14K White Gold", "14K Yellow Gold"] },
      { key: "ring_size", displayName: "Size", sortedValues: ["6.0", "7.0"] },
    ]);
    expect(entity.variants.map((variant) => [variant.sku, ...variant.optionValues])).toEqual([
      ["R-1", "14K White Gold", "6.0"],
      ["R-3", "14K White Gold", "7.0"],
      ["R-2", "14K Yellow Gold", "6.0"],
    ]);
    expect(entity.metafields).toEqual([
      { namespace: "custom", key: "total_carat_weight", type: "number_decimal", value: "1.00" },
      { namespace: "custom", key: "stone_shape", type: "single_line_text_field", value: "Round" },
      { namespace: "custom", key: "stone_material", type: "single_line_text_field", value: "Lab-Grown Diamond" },
    ]);
    expect(entity.descriptionHtml).toBe("<p>Beautiful Lab-Grown Diamond jewelry, with 1.00 total carat weight.</p>");
  });

  it("fills a missing option value with a placeholder and warns", () => {
    const group = makeGroup("G1", [
      { skuId: "A", ringSize: "6" },
      { skuId: "B", ringSize: "7" },
      { skuId: "C", ringSize: null },
    ]);

    const { entity, warnings } = buildCatalogEntity(group, [], entityOptions);

    expect(entity.variantOptions[0]?.sortedValues).toEqual(["6.0", "7.0", MISSING_OPTION_VALUE]);
    expect(entity.variants.map((variant) => variant.optionValues)).toEqual([["6.0"], ["7.0"], ["Not Specified"]]);
    expect(warnings).toEqual(['SKU C has no Size; using "Not Specified".']);
  });

  it("rejects SKUs that share one option tuple", () => {
    const group = makeGroup("G1", [
      { skuId: "B", metalCode: "14K", metalColor: "W", ringSize: "6" },
      { skuId: "A", metalCode: "14K", metalColor: "W", ringSize: "6" },
      { skuId: "C", metalCode: "14K", metalColor: "W", ringSize: "7" },
    ]);

    const error = captureError(() => buildCatalogEntity(group, [], entityOptions));

    expect(error.kind).toBe("duplicate_variant");
    expect(error.message).toBe("Group G1 has SKUs sharing one option tuple: A, B (6.0)");
    expect(error.details).toEqual({ collisions: [{ option_values: ["6.0"], skus: ["A", "B"] }] });
  });

  it("rejects several SKUs that do not vary at all", () => {
    const group = makeGroup("G1", [
      { skuId: "A", metalCode: "14K" },
      { skuId: "B", metalCode: "14K" },
    ]);

    const error = captureError(() => buildCatalogEntity(group, [], entityOptions));

    expect(error.kind).toBe("duplicate_variant");
    expect(error.message).toBe("Group G1 has SKUs sharing one option tuple: A, B (no option values)");
  });

  it("fails validation when more dimensions vary than the category allows", () => {
    const group = makeGroup("G1", [
      { skuId: "A", caratWeight: 1, metalCode: "14K", ringSize: "6" },
      { skuId: "B", caratWeight: 2, metalCode: "18K", ringSize: "7" },
    ]);
    const narrowRules = { ...ringRules, maxOptions: 2 };

    const error = captureError(() =>
      build(classify(group, narrowRules), group, narrowRules, { maxHandleLength: 255, rules }),
    );

    expect(error.kind).toBe("validation");
    expect(error.message).toBe(
      "Group varies on 3 option dimensions (carat_weight, metal_type, ring_size); at most 2 are supported.",
    );
  });

  it("drops a varying descriptive attribute from the title with a warning", () => {
    const group = makeGroup("G1", [
      { skuId: "A", shapeCode: "RD", ringSize: "6" },
      { skuId: "B", shapeCode: "OV", ringSize: "7" },
    ]);

    const { entity, warnings } = buildCatalogEntity(group, [], entityOptions);

    expect(entity.title).toBe("Ring");
    expect(entity.metafields).toEqual([]);
    expect(warnings).toEqual(["stone_shape has 2 distinct values across the group; left out of the title and metafields."]);
  });

  it("uses the category code as product type for unknown categories", () => {
    const group = makeGroup("G9", [{ skuId: "X-1", caratWeight: 0.5 }], "ANKLET_CHAIN");

    const { entity } = buildCatalogEntity(group, [], entityOptions);

    expect(entity.productType).toBe("Anklet Chain");
    expect(entity.title).toBe("0.50 CTW Anklet Chain");
  });
});
