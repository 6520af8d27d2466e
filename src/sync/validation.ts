import type { CatalogEntity } from "../types.js";

const MAX_TITLE_LENGTH = 255;
const MAX_SKU_LENGTH = 255;

export interface ValidationIssue {
  field: string;
  message: string;
}

/** Structural checks run before any remote contact; an empty list means the entity may be dispatched. */
export function validateEntity(entity: CatalogEntity): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (entity.title.trim().length === 0) {
    issues.push({ field: "title", message: "Title is empty." });
  } else if (entity.title.length > MAX_TITLE_LENGTH) {
    issues.push({ field: "title", message: `Title exceeds ${MAX_TITLE_LENGTH} characters.` });
  }

  if (entity.handle.trim().length === 0) {
    issues.push({ field: "handle", message: "Handle is empty." });
  }

  if (entity.variants.length === 0) {
    issues.push({ field: "variants", message: "Entity has no variants." });
  }

  const seenSkus = new Set<string>();
  const seenTuples = new Set<string>();
  for (const [index, variant] of entity.variants.entries()) {
    const field = `variants[${index}]`;
    const sku = variant.sku.trim();
    if (sku.length === 0) {
      issues.push({ field: `${field}.sku`, message: "Variant has no SKU." });
    } else if (sku.length > MAX_SKU_LENGTH) {
      issues.push({ field: `${field}.sku`, message: `SKU ${sku} exceeds ${MAX_SKU_LENGTH} characters.` });
    } else if (seenSkus.has(sku)) {
      issues.push({ field: `${field}.sku`, message: `SKU ${sku} appears more than once.` });
    }
    seenSkus.add(sku);

    if (variant.optionValues.length !== entity.variantOptions.length) {
      issues.push({
        field: `${field}.optionValues`,
        message: `Variant ${sku} has ${variant.optionValues.length} option values for ${entity.variantOptions.length} options.`,
      });
    }

    const tuple = JSON.stringify(variant.optionValues);
    if (seenTuples.has(tuple)) {
      issues.push({ field: `${field}.optionValues`, message: `Variant ${sku} repeats an option tuple.` });
    }
    seenTuples.add(tuple);

    if (variant.price !== null && !(variant.price >= 0)) {
      issues.push({ field: `${field}.price`, message: `Variant ${sku} has a negative price.` });
    }
  }

  for (const [index, metafield] of entity.metafields.entries()) {
    const missing = (["namespace", "key", "type", "value"] as const).filter(
      (name) => metafield[name].trim().length === 0,
    );
    if (missing.length > 0) {
      issues.push({
        field: `metafields[${index}]`,
        message: `Metafield is missing ${missing.join(", ")}.`,
      });
    }
  }

  return issues;
}
