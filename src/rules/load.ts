import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  ATTRIBUTE_KEYS,
  OPTION_ATTRIBUTE_KEYS,
  type AttributeKey,
  type MetafieldType,
  type OptionAttributeKey,
} from "../types.js";
import { titleCase } from "../utils/text.js";

const metafieldDefinitionSchema = z.object({
  namespace: z.string().min(2),
  key: z.string().regex(/^[a-z0-9_]{2,64}$/),
  type: z.enum(["single_line_text_field", "number_decimal", "number_integer", "boolean", "json"]),
});

const categoryEntrySchema = z.object({
  code: z.string().min(1),
  product_type: z.string(),
  option_keys: z.array(z.enum(OPTION_ATTRIBUTE_KEYS)).min(1),
  descriptive_keys: z.array(z.enum(ATTRIBUTE_KEYS)).default([]),
});

const categoriesFileSchema = z.object({
  schema_version: z.string().min(1),
  max_options: z.number().int().positive(),
  option_display_names: z.record(z.enum(OPTION_ATTRIBUTE_KEYS), z.string().min(1)),
  common_descriptive_keys: z.array(z.enum(ATTRIBUTE_KEYS)),
  metafields: z.record(z.enum(ATTRIBUTE_KEYS), metafieldDefinitionSchema),
  categories: z.array(categoryEntrySchema).min(1),
  fallback_category: categoryEntrySchema,
});

const codeTablesFileSchema = z.object({
  schema_version: z.string().min(1),
  metal_colors: z.record(z.string(), z.string().min(1)),
  metal_color_precedence: z.array(z.string().min(1)),
  materials: z.record(z.string(), z.string().min(1)),
  shapes: z.record(z.string(), z.string().min(1)),
  clarity_grades: z.array(z.string().min(1)),
  cuts: z.record(z.string(), z.string().min(1)),
  cut_default: z.string().min(1),
  platings: z.record(z.string(), z.string().min(1)),
});

type CategoriesFile = z.infer<typeof categoriesFileSchema>;
type CategoryEntry = z.infer<typeof categoryEntrySchema>;
type CodeTablesFile = z.infer<typeof codeTablesFileSchema>;

export interface MetafieldDefinition {
  namespace: string;
  key: string;
  type: MetafieldType;
}

export interface CategoryRules {
  code: string;
  productType: string;
  /** Priority order in which variant dimensions become product options. */
  optionKeys: OptionAttributeKey[];
  /** Option keys first, then descriptive keys; no duplicates. */
  eligibleKeys: AttributeKey[];
  maxOptions: number;
}

export interface CodeTables {
  metalColors: Map<string, string>;
  metalColorPrecedence: string[];
  materials: Map<string, string>;
  shapes: Map<string, string>;
  clarityGrades: string[];
  cuts: Map<string, string>;
  cutDefault: string;
  platings: Map<string, string>;
}

export interface CatalogRules {
  version: string;
  maxOptions: number;
  optionDisplayNames: Map<OptionAttributeKey, string>;
  metafields: Map<AttributeKey, MetafieldDefinition>;
  categoriesByCode: Map<string, CategoryRules>;
  fallbackCategory: CategoryRules;
  codeTables: CodeTables;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

let cachedRules: CatalogRules | null = null;

function readJsonFile(fileName: string): unknown {
  const filePath = path.join(__dirname, fileName);
  return JSON.parse(readFileSync(filePath, "utf8"));
}

function parseFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid catalog rules file ${fileName}: ${errors}`);
  }
  return parsed.data;
}

function toUpperKeyMap(record: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(record).map(([code, display]) => [code.trim().toUpperCase(), display]));
}

function buildCategoryRules(
  entry: CategoryEntry,
  commonDescriptiveKeys: AttributeKey[],
  maxOptions: number,
): CategoryRules {
  const optionKeys = [...new Set(entry.option_keys)];
  if (optionKeys.length !== entry.option_keys.length) {
    throw new Error(`Category ${entry.code} lists an option key twice.`);
  }

  const optionKeySet = new Set<AttributeKey>(optionKeys);
  for (const key of entry.descriptive_keys) {
    if (optionKeySet.has(key)) {
      throw new Error(`Category ${entry.code} lists ${key} as both an option key and a descriptive key.`);
    }
  }

  const eligibleKeys: AttributeKey[] = [...optionKeys];
  for (const key of [...entry.descriptive_keys, ...commonDescriptiveKeys]) {
    if (!eligibleKeys.includes(key)) {
      eligibleKeys.push(key);
    }
  }

  return {
    code: entry.code.trim().toUpperCase(),
    productType: entry.product_type,
    optionKeys,
    eligibleKeys,
    maxOptions,
  };
}

function buildCodeTables(file: CodeTablesFile): CodeTables {
  return {
    metalColors: toUpperKeyMap(file.metal_colors),
    metalColorPrecedence: file.metal_color_precedence,
    materials: toUpperKeyMap(file.materials),
    shapes: toUpperKeyMap(file.shapes),
    clarityGrades: file.clarity_grades.map((grade) => grade.toUpperCase()),
    cuts: toUpperKeyMap(file.cuts),
    cutDefault: file.cut_default,
    platings: toUpperKeyMap(file.platings),
  };
}

export function buildCatalogRules(categoriesRaw: unknown, codeTablesRaw: unknown): CatalogRules {
  const categoriesFile: CategoriesFile = parseFile("categories.json", categoriesFileSchema, categoriesRaw);
  const codeTablesFile: CodeTablesFile = parseFile("code-tables.json", codeTablesFileSchema, codeTablesRaw);

  const optionDisplayNames = new Map<OptionAttributeKey, string>();
  for (const key of OPTION_ATTRIBUTE_KEYS) {
    const displayName = categoriesFile.option_display_names[key];
    if (!displayName) {
      throw new Error(`Catalog rules are missing an option display name for ${key}.`);
    }
    optionDisplayNames.set(key, displayName);
  }

  const metafields = new Map<AttributeKey, MetafieldDefinition>();
  for (const key of ATTRIBUTE_KEYS) {
    const definition = categoriesFile.metafields[key];
    if (definition) {
      metafields.set(key, definition);
    }
  }

  const categoriesByCode = new Map<string, CategoryRules>();
  for (const entry of categoriesFile.categories) {
    const rules = buildCategoryRules(
      entry,
      categoriesFile.common_descriptive_keys,
      categoriesFile.max_options,
    );
    if (categoriesByCode.has(rules.code)) {
      throw new Error(`Catalog rules define category ${rules.code} twice.`);
    }
    categoriesByCode.set(rules.code, rules);
  }

  return {
    version: `${categoriesFile.schema_version}|${codeTablesFile.schema_version}`,
    maxOptions: categoriesFile.max_options,
    optionDisplayNames,
    metafields,
    categoriesByCode,
    fallbackCategory: buildCategoryRules(
      categoriesFile.fallback_category,
      categoriesFile.common_descriptive_keys,
      categoriesFile.max_options,
    ),
    codeTables: buildCodeTables(codeTablesFile),
  };
}

export function loadCatalogRules(): CatalogRules {
  if (cachedRules) {
    return cachedRules;
  }

  cachedRules = buildCatalogRules(readJsonFile("categories.json"), readJsonFile("code-tables.json"));
  return cachedRules;
}

/** Unknown categories use the fallback rules with the category code as product type. */
export function resolveCategoryRules(rules: CatalogRules, categoryCode: string): CategoryRules {
  const code = categoryCode.trim().toUpperCase();
  const known = rules.categoriesByCode.get(code);
  if (known) {
    return known;
  }

  return {
    ...rules.fallbackCategory,
    code,
    productType: titleCase(code.toLowerCase().replace(/[_-]+/g, " ")),
  };
}
