import { describe, expect, it } from "vitest";
import { buildBulkJsonl, buildProductSetInput } from "../src/platform/shopify-payload.js";
import { makeEntity, makeVariant } from "./fixtures.js";

describe("productSet payload", () => {
  it("uses the default Title option for a product without variant options", () => {
    const entity = makeEntity("G1", {
      variantOptions: [],
      variants: [makeVariant("G1-1", [], { price: 899, compareAtPrice: 1099.5, weightGrams: 3.2 })],
    });

    const input = buildProductSetInput({ entity, fingerprint: "fp-1" }, { locationId: null });

    expect(input.productOptions).toEqual([{ name: "Title", position: 1, values: [{ name: "Default Title" }] }]);
    expect(input.variants).toEqual([
      {
        optionValues: [{ optionName: "Title", name: "Default Title" }],
        price: "899.00",
        compareAtPrice: "1099.50",
        inventoryItem: {
          sku: "G1-1",
          tracked: false,
          measurement: { weight: { value: 3.2, unit: "GRAMS" } },
        },
      },
    ]);
  });

  it("names option values by option and sets stock only with a location", () => {
    const entity = makeEntity("G1", {
      variants: [makeVariant("G1-6", ["6.0"], { inventoryQuantity: 4 }), makeVariant("G1-7", ["7.0"])],
    });

    const input = buildProductSetInput({ entity, fingerprint: "fp-1" }, { locationId: "gid://shopify/Location/1" });

    expect(input.productOptions).toEqual([
      { name: "Size", position: 1, values: [{ name: "6.0" }, { name: "7.0" }] },
    ]);
    expect(input.variants[0]).toMatchObject({
      optionValues: [{ optionName: "Size", name: "6.0" }],
      inventoryItem: { sku: "G1-6", tracked: true },
      inventoryQuantities: [{ locationId: "gid://shopify/Location/1", name: "available", quantity: 4 }],
    });
    expect(input.variants[1]?.inventoryQuantities).toBeUndefined();
  });

  it("appends the sync metafields and media files", () => {
    const entity = makeEntity("G1", {
      vendor: "Test Jewelers",
      media: [
        { ref: "img-1", url: "https://cdn.example.test/img-1.jpg", alt: "Front" },
        { ref: "img-2", url: "https://cdn.example.test/img-2.jpg", alt: null },
      ],
    });

    const input = buildProductSetInput({ entity, fingerprint: "fp-1" }, { locationId: null });

    expect(input.vendor).toBe("Test Jewelers");
    expect(input.metafields.slice(-2)).toEqual([
      { namespace: "sync", key: "fingerprint", type: "single_line_text_field", value: "fp-1" },
      { namespace: "sync", key: "media_refs", type: "json", value: '["img-1","img-2"]' },
    ]);
    expect(input.files).toEqual([
      { originalSource: "https://cdn.example.test/img-1.jpg", alt: "Front", contentType: "IMAGE" },
      { originalSource: "https://cdn.example.test/img-2.jpg", contentType: "IMAGE" },
    ]);
  });

  it("writes one variables document per line in request order", () => {
    const jsonl = buildBulkJsonl(
      [
        { entity: makeEntity("G1"), fingerprint: "fp-1" },
        { entity: makeEntity("G2"), fingerprint: "fp-2" },
      ],
      { locationId: null },
    );

    const lines = jsonl.split("\n").map((line) => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0].identifier).toEqual({ handle: "test-ring-g1" });
    expect(lines[1].identifier).toEqual({ handle: "test-ring-g2" });
  });
});
