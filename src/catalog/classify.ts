import type { CategoryRules, CodeTables } from "../rules/load.js";
import { loadCatalogRules } from "../rules/load.js";
import type { CanonicalValue, ClassifiedAttributes, Group } from "../types.js";
import { canonicalAttributeOf, compareCanonicalValues } from "./normalize.js";

/**
 * Partitions the eligible attributes of a group into constant (one canonical value) and variant
 * (two or more) dimensions. Keys without any non-empty value are left out. Keys come back in the
 * category's eligible order and values in canonical order, so row order never affects the result.
 */
export function classify(
  group: Group,
  categoryRules: CategoryRules,
  tables: CodeTables = loadCatalogRules().codeTables,
): ClassifiedAttributes {
  const classified: ClassifiedAttributes = new Map();

  for (const key of categoryRules.eligibleKeys) {
    const distinct = new Map<string, CanonicalValue>();
    for (const row of group.rows) {
      const value = canonicalAttributeOf(row, key, tables);
      if (value && !distinct.has(value.display)) {
        distinct.set(value.display, value);
      }
    }

    if (distinct.size === 0) {
      continue;
    }

    const values = [...distinct.values()].sort(compareCanonicalValues);
    classified.set(key, {
      key,
      kind: values.length === 1 ? "constant" : "variant",
      values,
    });
  }

  return classified;
}
