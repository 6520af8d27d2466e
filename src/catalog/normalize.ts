import { loadCatalogRules, type CodeTables } from "../rules/load.js";
import type {
  AttributeKey,
  CanonicalValue,
  MetalTypeInput,
  RawAttributeInputs,
  RawComponentRow,
  SortKeyPart,
} from "../types.js";
import { displayCase, trimToNull } from "../utils/text.js";

type MetalFamily = "gold" | "silver" | "platinum" | "tantalum" | "titanium" | "other";

interface MetalClassification {
  family: MetalFamily;
  karat: number | null;
}

const METAL_FAMILY_RANK: Record<MetalFamily, number> = {
  gold: 0,
  silver: 1,
  platinum: 2,
  tantalum: 3,
  titanium: 3,
  other: 3,
};

const TWO_TONE = "Two-Tone";
const SILVER_CODES = new Set(["SILVER", "SS", "STERLING", "925", "AG925", "SV"]);
const PLATINUM_CODES = new Set(["PLAT", "PLATINUM", "PT"]);
const TANTALUM_CODES = new Set(["TANTALUM", "TA"]);
const TITANIUM_CODES = new Set(["TITANIUM", "TI"]);

function upperCode(value: string | null): string {
  return value?.trim().toUpperCase() ?? "";
}

function classifyMetalCode(code: string): MetalClassification | null {
  if (code.length === 0) {
    return null;
  }

  const karatMatch = code.match(/^(\d{1,2})\s*K(?:T|ARAT)?$/);
  if (karatMatch) {
    return { family: "gold", karat: Number(karatMatch[1]) };
  }
  if (SILVER_CODES.has(code)) {
    return { family: "silver", karat: null };
  }
  if (PLATINUM_CODES.has(code) || /^PT\d{3}$/.test(code)) {
    return { family: "platinum", karat: null };
  }
  if (TANTALUM_CODES.has(code)) {
    return { family: "tantalum", karat: null };
  }
  if (TITANIUM_CODES.has(code)) {
    return { family: "titanium", karat: null };
  }
  return null;
}

function classifyMetal(input: MetalTypeInput): MetalClassification {
  return (
    classifyMetalCode(upperCode(input.code)) ??
    classifyMetalCode(upperCode(input.stamp)) ?? { family: "other", karat: null }
  );
}

function canonicalMetalColor(raw: string | null, tables: CodeTables): string | null {
  const code = upperCode(raw);
  if (code.length === 0) {
    return null;
  }
  return tables.metalColors.get(code) ?? displayCase(code);
}

function metalColorRank(color: string | null, tables: CodeTables): number {
  if (color === null) {
    return -1;
  }
  if (color === TWO_TONE) {
    return tables.metalColorPrecedence.length + 1;
  }
  const index = tables.metalColorPrecedence.indexOf(color);
  return index >= 0 ? index : tables.metalColorPrecedence.length;
}

function composeMetalDisplay(
  metal: MetalClassification,
  color: string | null,
  stamp: string | null,
): string | null {
  switch (metal.family) {
    case "gold":
      // Rendered from the parsed karat, not the raw stamp: 14K, 14KT and 14 KARAT are one value.
      return [`${metal.karat}K`, color, "Gold"].filter(Boolean).join(" ");
    case "silver":
      return color ? `${color} Silver` : "Silver";
    case "platinum":
      return color && color !== "White" ? `Platinum ${color}` : "Platinum";
    case "tantalum":
      return color ? `Tantalum ${color}` : "Tantalum";
    case "titanium":
      return color ? `Titanium ${color}` : "Titanium";
    case "other": {
      const parts = [trimToNull(stamp)?.toUpperCase() ?? null, color].filter(Boolean);
      return parts.length > 0 ? parts.join(" ") : null;
    }
  }
}

function normalizeMetalType(input: MetalTypeInput, tables: CodeTables): CanonicalValue | null {
  const metal = classifyMetal(input);
  const color = canonicalMetalColor(input.color, tables);
  const display = composeMetalDisplay(metal, color, input.stamp);
  if (!display) {
    return null;
  }

  return {
    display,
    value: display,
    sortKey: [
      METAL_FAMILY_RANK[metal.family],
      metal.family === "other" ? display : metal.family,
      metal.karat ?? 0,
      metalColorRank(color, tables),
      color ?? "",
    ],
  };
}

function formatDecimal(value: number): string {
  return String(Number(value.toFixed(2)));
}

function positiveNumber(value: number | null): number | null {
  if (value === null || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value;
}

function normalizeCaratWeight(raw: number | null): CanonicalValue | null {
  const weight = positiveNumber(raw);
  if (weight === null) {
    return null;
  }
  const fixed = weight.toFixed(2);
  return { display: `${fixed} CTW`, value: fixed, sortKey: [0, Number(fixed)] };
}

function normalizeRingSize(raw: string | null): CanonicalValue | null {
  const trimmed = trimToNull(raw);
  if (trimmed === null) {
    return null;
  }

  const parsed = Number(trimmed);
  if (Number.isFinite(parsed)) {
    const fixed = parsed.toFixed(1);
    return { display: fixed, value: fixed, sortKey: [0, Number(fixed)] };
  }

  return { display: trimmed, value: trimmed, sortKey: [1, trimmed] };
}

function normalizeDimension(raw: number | null): CanonicalValue | null {
  const millimetres = positiveNumber(raw);
  if (millimetres === null) {
    return null;
  }
  const formatted = formatDecimal(millimetres);
  return { display: `${formatted}mm`, value: formatted, sortKey: [0, Number(formatted)] };
}

function textValue(display: string | null): CanonicalValue | null {
  if (display === null) {
    return null;
  }
  return { display, value: display, sortKey: [display] };
}

function lookupOrDisplayCase(raw: string | null, table: Map<string, string>): CanonicalValue | null {
  const trimmed = trimToNull(raw);
  if (trimmed === null) {
    return null;
  }
  return textValue(table.get(trimmed.toUpperCase()) ?? displayCase(trimmed));
}

function normalizeClarity(raw: string | null, tables: CodeTables): CanonicalValue | null {
  const trimmed = trimToNull(raw);
  if (trimmed === null) {
    return null;
  }

  const compact = trimmed.toUpperCase().replace(/[\s-]+/g, "");
  const index = tables.clarityGrades.indexOf(compact);
  if (index >= 0) {
    return { display: compact, value: compact, sortKey: [index] };
  }

  return { display: trimmed, value: trimmed, sortKey: [tables.clarityGrades.length, trimmed] };
}

function normalizeCut(raw: string | null, tables: CodeTables): CanonicalValue | null {
  const trimmed = trimToNull(raw);
  if (trimmed === null) {
    return null;
  }
  return textValue(tables.cuts.get(trimmed.toUpperCase()) ?? tables.cutDefault);
}

function normalizeStoneColor(raw: string | null): CanonicalValue | null {
  const trimmed = trimToNull(raw);
  if (trimmed === null) {
    return null;
  }
  if (/^[D-Z](\s*-\s*[D-Z])*$/i.test(trimmed)) {
    return textValue(trimmed.toUpperCase().replace(/\s+/g, ""));
  }
  return textValue(displayCase(trimmed));
}

function normalizeFreeText(raw: string | null): CanonicalValue | null {
  return textValue(trimToNull(raw));
}

function normalizeStoneCount(raw: number | null): CanonicalValue | null {
  if (raw === null || !Number.isInteger(raw) || raw <= 0) {
    return null;
  }
  return { display: String(raw), value: String(raw), sortKey: [raw] };
}

function normalizeFlag(raw: boolean | null): CanonicalValue | null {
  if (raw === null) {
    return null;
  }
  const value = raw ? "true" : "false";
  return { display: value, value, sortKey: [raw ? 1 : 0] };
}

type Normalizers = {
  [K in AttributeKey]: (raw: RawAttributeInputs[K], tables: CodeTables) => CanonicalValue | null;
};

const NORMALIZERS: Normalizers = {
  carat_weight: (raw) => normalizeCaratWeight(raw),
  metal_type: (raw, tables) => normalizeMetalType(raw, tables),
  ring_size: (raw) => normalizeRingSize(raw),
  stone_length: (raw) => normalizeDimension(raw),
  stone_width: (raw) => normalizeDimension(raw),
  plating_type: (raw, tables) => lookupOrDisplayCase(raw, tables.platings),
  stone_shape: (raw, tables) => lookupOrDisplayCase(raw, tables.shapes),
  stone_material: (raw, tables) => lookupOrDisplayCase(raw, tables.materials),
  stone_clarity: (raw, tables) => normalizeClarity(raw, tables),
  stone_color: (raw) => normalizeStoneColor(raw),
  stone_cut: (raw, tables) => normalizeCut(raw, tables),
  setting_style: (raw) => {
    const trimmed = trimToNull(raw);
    return trimmed === null ? null : textValue(displayCase(trimmed));
  },
  main_setting_type: (raw) => normalizeFreeText(raw),
  collection: (raw) => normalizeFreeText(raw),
  jewelry_brand: (raw) => normalizeFreeText(raw),
  gemstone_brand: (raw) => normalizeFreeText(raw),
  style_id: (raw) => normalizeFreeText(raw),
  web_descriptor: (raw) => normalizeFreeText(raw),
  stone_count: (raw) => normalizeStoneCount(raw),
  is_best_seller: (raw) => normalizeFlag(raw),
  is_high_roas: (raw) => normalizeFlag(raw),
  is_pinterest: (raw) => normalizeFlag(raw),
};

type RawReaders = {
  [K in AttributeKey]: (row: RawComponentRow) => RawAttributeInputs[K];
};

const RAW_READERS: RawReaders = {
  carat_weight: (row) => row.caratWeight,
  metal_type: (row) => ({ code: row.metalCode, stamp: row.metalStamp, color: row.metalColor }),
  ring_size: (row) => row.ringSize,
  stone_length: (row) => row.lengthMm,
  stone_width: (row) => row.widthMm,
  plating_type: (row) => row.platingCode,
  stone_shape: (row) => row.shapeCode,
  stone_material: (row) => row.materialCode,
  stone_clarity: (row) => row.clarityCode,
  stone_color: (row) => row.colorCode,
  stone_cut: (row) => row.cutCode,
  setting_style: (row) => row.subgroupCode,
  main_setting_type: (row) => row.mainSettingType,
  collection: (row) => row.collection,
  jewelry_brand: (row) => row.jewelryBrand,
  gemstone_brand: (row) => row.gemstoneBrand,
  style_id: (row) => row.styleId,
  web_descriptor: (row) => row.webDescriptor,
  stone_count: (row) => row.stoneCount,
  is_best_seller: (row) => row.isBestSeller,
  is_high_roas: (row) => row.isHighRoas,
  is_pinterest: (row) => row.isPinterest,
};

/**
 * Maps a raw database value to its canonical display string and sort key; `null` means the value is
 * empty. Unknown codes fall back instead of failing.
 */
export function normalize<K extends AttributeKey>(
  key: K,
  raw: RawAttributeInputs[K],
  tables: CodeTables = loadCatalogRules().codeTables,
): CanonicalValue | null {
  return NORMALIZERS[key](raw, tables);
}

export function readRawAttribute<K extends AttributeKey>(
  row: RawComponentRow,
  key: K,
): RawAttributeInputs[K] {
  return RAW_READERS[key](row);
}

export function canonicalAttributeOf(
  row: RawComponentRow,
  key: AttributeKey,
  tables: CodeTables = loadCatalogRules().codeTables,
): CanonicalValue | null {
  return normalize(key, readRawAttribute(row, key), tables);
}

export function compareSortKeys(left: SortKeyPart[], right: SortKeyPart[]): number {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const a = left[index];
    const b = right[index];
    if (a === b) {
      continue;
    }
    if (a === undefined) {
      return -1;
    }
    if (b === undefined) {
      return 1;
    }
    if (typeof a === "number" && typeof b === "number") {
      return a - b;
    }
    return String(a) < String(b) ? -1 : 1;
  }
  return 0;
}

export function compareCanonicalValues(left: CanonicalValue, right: CanonicalValue): number {
  const bySortKey = compareSortKeys(left.sortKey, right.sortKey);
  if (bySortKey !== 0) {
    return bySortKey;
  }
  if (left.display === right.display) {
    return 0;
  }
  return left.display < right.display ? -1 : 1;
}

