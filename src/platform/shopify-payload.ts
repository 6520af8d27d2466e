import type { CatalogEntity, CatalogMetafield, MetafieldType } from "../types.js";
import type { UpsertRequest } from "./platform.js";

export const SYNC_METAFIELD_NAMESPACE = "sync";
export const FINGERPRINT_METAFIELD_KEY = "fingerprint";
export const MEDIA_REFS_METAFIELD_KEY = "media_refs";

const DEFAULT_OPTION_NAME = "Title";
const DEFAULT_OPTION_VALUE = "Default Title";

export interface ProductSetOptionInput {
  name: string;
  position: number;
  values: Array<{ name: string }>;
}

export interface ProductSetVariantInput {
  optionValues: Array<{ optionName: string; name: string }>;
  price?: string;
  compareAtPrice?: string;
  barcode?: string;
  inventoryItem: {
    sku: string;
    tracked: boolean;
    measurement?: { weight: { value: number; unit: "GRAMS" } };
  };
  inventoryQuantities?: Array<{ locationId: string; name: "available"; quantity: number }>;
}

export interface ProductSetMetafieldInput {
  namespace: string;
  key: string;
  type: MetafieldType;
  value: string;
}

export interface ProductSetFileInput {
  originalSource: string;
  alt?: string;
  contentType: "IMAGE";
}

export interface ProductSetInput {
  title: string;
  handle: string;
  productType: string;
  vendor?: string;
  status: "ACTIVE" | "DRAFT";
  descriptionHtml: string;
  productOptions: ProductSetOptionInput[];
  variants: ProductSetVariantInput[];
  metafields: ProductSetMetafieldInput[];
  files: ProductSetFileInput[];
}

export interface ProductSetVariables {
  identifier: { handle: string };
  input: ProductSetInput;
}

export interface PayloadOptions {
  locationId: string | null;
}

function formatMoney(amount: number): string {
  return amount.toFixed(2);
}

function toMetafieldInput(metafield: CatalogMetafield): ProductSetMetafieldInput {
  return {
    namespace: metafield.namespace,
    key: metafield.key,
    type: metafield.type,
    value: metafield.value,
  };
}

function buildOptions(entity: CatalogEntity): ProductSetOptionInput[] {
  if (entity.variantOptions.length === 0) {
    return [{ name: DEFAULT_OPTION_NAME, position: 1, values: [{ name: DEFAULT_OPTION_VALUE }] }];
  }

  return entity.variantOptions.map((option, index) => ({
    name: option.displayName,
    position: index + 1,
    values: option.sortedValues.map((value) => ({ name: value })),
  }));
}

function buildVariants(entity: CatalogEntity, options: PayloadOptions): ProductSetVariantInput[] {
  return entity.variants.map((variant) => {
    const optionValues =
      entity.variantOptions.length === 0
        ? [{ optionName: DEFAULT_OPTION_NAME, name: DEFAULT_OPTION_VALUE }]
        : entity.variantOptions.map((option, index) => ({
            optionName: option.displayName,
            name: variant.optionValues[index] ?? "",
          }));

    const input: ProductSetVariantInput = {
      optionValues,
      inventoryItem: {
        sku: variant.sku,
        tracked: variant.inventoryQuantity !== null,
      },
    };

    if (variant.price !== null) {
      input.price = formatMoney(variant.price);
    }
    if (variant.compareAtPrice !== null) {
      input.compareAtPrice = formatMoney(variant.compareAtPrice);
    }
    if (variant.barcode !== null) {
      input.barcode = variant.barcode;
    }
    if (variant.weightGrams !== null) {
      input.inventoryItem.measurement = { weight: { value: variant.weightGrams, unit: "GRAMS" } };
    }
    if (options.locationId && variant.inventoryQuantity !== null) {
      input.inventoryQuantities = [
        { locationId: options.locationId, name: "available", quantity: variant.inventoryQuantity },
      ];
    }

    return input;
  });
}

/**
 * One productSet input carries the product, its options, variants, metafields and media, plus the sync
 * metafields that later runs read back as RemoteState.
 */
export function buildProductSetInput(request: UpsertRequest, options: PayloadOptions): ProductSetInput {
  const { entity } = request;
  const input: ProductSetInput = {
    title: entity.title,
    handle: entity.handle,
    productType: entity.productType,
    status: entity.status,
    descriptionHtml: entity.descriptionHtml,
    productOptions: buildOptions(entity),
    variants: buildVariants(entity, options),
    metafields: [
      ...entity.metafields.map(toMetafieldInput),
      {
        namespace: SYNC_METAFIELD_NAMESPACE,
        key: FINGERPRINT_METAFIELD_KEY,
        type: "single_line_text_field",
        value: request.fingerprint,
      },
      {
        namespace: SYNC_METAFIELD_NAMESPACE,
        key: MEDIA_REFS_METAFIELD_KEY,
        type: "json",
        value: JSON.stringify(entity.media.map((reference) => reference.ref)),
      },
    ],
    files: entity.media.map((reference) => ({
      originalSource: reference.url,
      ...(reference.alt ? { alt: reference.alt } : {}),
      contentType: "IMAGE",
    })),
  };

  if (entity.vendor) {
    input.vendor = entity.vendor;
  }

  return input;
}

export function buildProductSetVariables(request: UpsertRequest, options: PayloadOptions): ProductSetVariables {
  return {
    identifier: { handle: request.entity.handle },
    input: buildProductSetInput(request, options),
  };
}

/** One JSON document per line, in request order; the bulk result's __lineNumber indexes this list. */
export function buildBulkJsonl(requests: UpsertRequest[], options: PayloadOptions): string {
  return requests.map((request) => JSON.stringify(buildProductSetVariables(request, options))).join("\n");
}
