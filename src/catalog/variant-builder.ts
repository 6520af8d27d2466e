import type { CatalogRules, CategoryRules } from "../rules/load.js";
import { loadCatalogRules, resolveCategoryRules } from "../rules/load.js";
import { SyncGroupError } from "../sync/errors.js";
import type {
  AttributeKey,
  CatalogEntity,
  CatalogMetafield,
  CatalogVariant,
  ClassifiedAttributes,
  Group,
  MediaReference,
  OptionAttributeKey,
  ProductStatus,
  VariantOption,
} from "../types.js";
import { makeSlug } from "../utils/text.js";
import { classify } from "./classify.js";
import { canonicalAttributeOf } from "./normalize.js";

export const MISSING_OPTION_VALUE = "Not Specified";
const MOISSANITE = "Moissanite";

export interface VariantBuildResult {
  title: string;
  handle: string;
  variantOptions: VariantOption[];
  variants: CatalogVariant[];
  warnings: string[];
}

export interface BuildOptions {
  maxHandleLength: number;
  rules?: CatalogRules;
}

export interface CatalogEntityOptions extends BuildOptions {
  vendor: string | null;
  status: ProductStatus;
}

export interface CatalogEntityBuild {
  entity: CatalogEntity;
  warnings: string[];
}

function constantDisplay(classified: ClassifiedAttributes, key: AttributeKey): string | null {
  const attribute = classified.get(key);
  if (!attribute || attribute.kind !== "constant") {
    return null;
  }
  return attribute.values[0]?.display ?? null;
}

export function buildTitle(classified: ClassifiedAttributes, categoryRules: CategoryRules): string {
  const carat = constantDisplay(classified, "carat_weight");
  const material = constantDisplay(classified, "stone_material");
  const metal = constantDisplay(classified, "metal_type");

  const parts = [
    carat && material === MOISSANITE ? `${carat} DEW` : carat,
    constantDisplay(classified, "stone_shape"),
    material,
    constantDisplay(classified, "setting_style"),
    categoryRules.productType,
    metal ? `in ${metal}` : null,
  ];

  return parts
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0)
    .join(" ");
}

/**
 * The group id suffix is appended after truncation, so it survives any title length.
 */
export function buildHandle(title: string, groupId: string, maxHandleLength: number): string {
  const suffix = `-${groupId.trim().toLowerCase().replace(/[^a-z0-9-]+/g, "-")}`;
  const room = Math.max(0, maxHandleLength - suffix.length);
  const base = makeSlug(title).slice(0, room).replace(/-+$/, "");
  return base.length > 0 ? `${base}${suffix}` : suffix.slice(1);
}

function buildVariantOptions(
  classified: ClassifiedAttributes,
  categoryRules: CategoryRules,
  rules: CatalogRules,
): VariantOption[] {
  const variantKeys = categoryRules.optionKeys.filter((key) => classified.get(key)?.kind === "variant");
  if (variantKeys.length > categoryRules.maxOptions) {
    throw new SyncGroupError(
      "validation",
      `Group varies on ${variantKeys.length} option dimensions (${variantKeys.join(", ")}); at most ${categoryRules.maxOptions} are supported.`,
      { variant_keys: variantKeys, max_options: categoryRules.maxOptions },
    );
  }

  return variantKeys.map((key: OptionAttributeKey) => ({
    key,
    displayName: rules.optionDisplayNames.get(key) ?? key,
    sortedValues: classified.get(key)?.values.map((value) => value.display) ?? [],
  }));
}

function tupleKey(optionValues: string[]): string {
  return JSON.stringify(optionValues);
}

function compareTuples(
  left: CatalogVariant,
  right: CatalogVariant,
  variantOptions: VariantOption[],
): number {
  for (const [index, option] of variantOptions.entries()) {
    const a = option.sortedValues.indexOf(left.optionValues[index] ?? "");
    const b = option.sortedValues.indexOf(right.optionValues[index] ?? "");
    if (a !== b) {
      return a - b;
    }
  }
  return left.sku < right.sku ? -1 : left.sku > right.sku ? 1 : 0;
}

function buildVariants(
  group: Group,
  variantOptions: VariantOption[],
  rules: CatalogRules,
  warnings: string[],
): CatalogVariant[] {
  const variants: CatalogVariant[] = group.rows.map((row) => {
    const optionValues = variantOptions.map((option) => {
      const value = canonicalAttributeOf(row, option.key, rules.codeTables);
      if (value) {
        return value.display;
      }
      warnings.push(`SKU ${row.skuId} has no ${option.displayName}; using "${MISSING_OPTION_VALUE}".`);
      if (!option.sortedValues.includes(MISSING_OPTION_VALUE)) {
        option.sortedValues.push(MISSING_OPTION_VALUE);
      }
      return MISSING_OPTION_VALUE;
    });

    return {
      sku: row.skuId,
      optionValues,
      price: row.price,
      compareAtPrice: row.compareAtPrice,
      barcode: row.barcode,
      inventoryQuantity: row.inventoryQuantity,
      weightGrams: row.weightGrams,
    };
  });

  const byTuple = new Map<string, { option_values: string[]; skus: string[] }>();
  for (const variant of variants) {
    const key = tupleKey(variant.optionValues);
    const entry = byTuple.get(key) ?? { option_values: variant.optionValues, skus: [] };
    entry.skus.push(variant.sku);
    byTuple.set(key, entry);
  }

  const collisions = [...byTuple.values()]
    .filter((entry) => entry.skus.length > 1)
    .map((entry) => ({ ...entry, skus: [...entry.skus].sort() }));

  if (collisions.length > 0) {
    const described = collisions
      .map((collision) =>
        collision.option_values.length > 0
          ? `${collision.skus.join(", ")} (${collision.option_values.join(" / ")})`
          : `${collision.skus.join(", ")} (no option values)`,
      )
      .join("; ");
    throw new SyncGroupError(
      "duplicate_variant",
      `Group ${group.groupId} has SKUs sharing one option tuple: ${described}`,
      { collisions },
    );
  }

  return variants.sort((left, right) => compareTuples(left, right, variantOptions));
}

/**
 * Builds title, handle, option schema and per-SKU variants from a classified group. Throws
 * SyncGroupError (`validation` or `duplicate_variant`) when the group cannot become one product.
 */
export function build(
  classified: ClassifiedAttributes,
  group: Group,
  categoryRules: CategoryRules,
  options: BuildOptions,
): VariantBuildResult {
  const rules = options.rules ?? loadCatalogRules();
  const warnings: string[] = [];

  const optionKeys = new Set<AttributeKey>(categoryRules.optionKeys);
  for (const attribute of classified.values()) {
    if (attribute.kind === "variant" && !optionKeys.has(attribute.key)) {
      warnings.push(
        `${attribute.key} has ${attribute.values.length} distinct values across the group; left out of the title and metafields.`,
      );
    }
  }

  const title = buildTitle(classified, categoryRules);
  const variantOptions = buildVariantOptions(classified, categoryRules, rules);
  const variants = buildVariants(group, variantOptions, rules, warnings);

  return {
    title,
    handle: buildHandle(title, group.groupId, options.maxHandleLength),
    variantOptions,
    variants,
    warnings,
  };
}

export function buildMetafields(classified: ClassifiedAttributes, rules: CatalogRules): CatalogMetafield[] {
  const metafields: CatalogMetafield[] = [];
  for (const attribute of classified.values()) {
    const definition = rules.metafields.get(attribute.key);
    const value = attribute.values[0];
    if (attribute.kind !== "constant" || !definition || !value) {
      continue;
    }

    metafields.push({
      namespace: definition.namespace,
      key: definition.key,
      type: definition.type,
      value: definition.type === "single_line_text_field" ? value.display : value.value,
    });
  }
  return metafields;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function buildDescriptionHtml(classified: ClassifiedAttributes): string {
  const material = constantDisplay(classified, "stone_material");
  const metal = constantDisplay(classified, "metal_type");
  const carat = classified.get("carat_weight");

  const parts: string[] = [];
  if (material) {
    parts.push(`Beautiful ${material} jewelry`);
  }
  if (metal) {
    parts.push(`crafted in ${metal}`);
  }
  if (carat?.kind === "constant" && carat.values[0]) {
    parts.push(`with ${carat.values[0].value} total carat weight`);
  }

  if (parts.length === 0) {
    return "";
  }
  return `<p>${escapeHtml(parts.join(", "))}.</p>`;
}

export function buildCatalogEntity(
  group: Group,
  media: MediaReference[],
  options: CatalogEntityOptions,
): CatalogEntityBuild {
  const rules = options.rules ?? loadCatalogRules();
  const categoryRules = resolveCategoryRules(rules, group.category);
  const classified = classify(group, categoryRules, rules.codeTables);
  const built = build(classified, group, categoryRules, { ...options, rules });

  return {
    entity: {
      groupId: group.groupId,
      title: built.title,
      handle: built.handle,
      productType: categoryRules.productType,
      vendor: options.vendor,
      status: options.status,
      descriptionHtml: buildDescriptionHtml(classified),
      metafields: buildMetafields(classified, rules),
      variantOptions: built.variantOptions,
      variants: built.variants,
      media: [...media],
    },
    warnings: built.warnings,
  };
}
