import { createHash } from "node:crypto";
import type { CatalogEntity, RemoteState, SyncDecision } from "../types.js";

function compareText(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Serialization hashed by `fingerprint`. Options, option values, variant tuples and media keep their
 * order; metafields are sorted by namespace.key and variants by SKU.
 */
export function canonicalEntityPayload(entity: CatalogEntity): Record<string, unknown> {
  return {
    group_id: entity.groupId,
    title: entity.title,
    handle: entity.handle,
    product_type: entity.productType,
    vendor: entity.vendor,
    status: entity.status,
    description_html: entity.descriptionHtml,
    options: entity.variantOptions.map((option) => ({
      key: option.key,
      name: option.displayName,
      values: option.sortedValues,
    })),
    variants: [...entity.variants]
      .sort((left, right) => compareText(left.sku, right.sku))
      .map((variant) => ({
        sku: variant.sku,
        option_values: variant.optionValues,
        price: variant.price,
        compare_at_price: variant.compareAtPrice,
        barcode: variant.barcode,
        inventory_quantity: variant.inventoryQuantity,
        weight_grams: variant.weightGrams,
      })),
    metafields: [...entity.metafields]
      .sort((left, right) =>
        compareText(`${left.namespace}.${left.key}`, `${right.namespace}.${right.key}`),
      )
      .map((metafield) => ({
        namespace: metafield.namespace,
        key: metafield.key,
        type: metafield.type,
        value: metafield.value,
      })),
    media: entity.media.map((reference) => ({
      ref: reference.ref,
      url: reference.url,
      alt: reference.alt,
    })),
  };
}

export function fingerprint(entity: CatalogEntity): string {
  return createHash("sha256").update(JSON.stringify(canonicalEntityPayload(entity))).digest("hex");
}

export function newMediaRefs(entity: CatalogEntity, remote: RemoteState | null): string[] {
  const existing = new Set(remote?.existingMediaRefs ?? []);
  return entity.media.map((reference) => reference.ref).filter((ref) => !existing.has(ref));
}

/** The only gate for issuing a mutation. */
export function decide(
  local: { entity: CatalogEntity; fingerprint: string },
  remote: RemoteState | null,
): SyncDecision {
  if (!remote) {
    return "create";
  }
  if (remote.lastFingerprint === local.fingerprint && newMediaRefs(local.entity, remote).length === 0) {
    return "no_op";
  }
  return "update";
}
