import { getWarrantyPool } from "../db/client.js";
import { SyncGroupError } from "../sync/errors.js";
import type { Group, RawComponentRow } from "../types.js";
import { trimToNull } from "../utils/text.js";

type DbNumber = number | string | null;
type DbFlag = boolean | number | string | null;

export interface WarrantyItemRow {
  sku_id: string;
  group_id: string;
  category: string | null;
  subgroup_code: string | null;
  metal_code: string | null;
  metal_stamp: string | null;
  metal_color: string | null;
  material_code: string | null;
  shape_code: string | null;
  clarity_code: string | null;
  color_code: string | null;
  cut_code: string | null;
  carat_weight: DbNumber;
  ring_size: string | number | null;
  length_mm: DbNumber;
  width_mm: DbNumber;
  plating_code: string | null;
  stone_count: DbNumber;
  image_sku: string | null;
  main_setting_type: string | null;
  collection: string | null;
  jewelry_brand: string | null;
  gemstone_brand: string | null;
  style_id: string | null;
  web_descriptor: string | null;
  is_best_seller: DbFlag;
  is_high_roas: DbFlag;
  is_pinterest: DbFlag;
  price: DbNumber;
  compare_at_price: DbNumber;
  barcode: string | null;
  inventory_quantity: DbNumber;
  weight_grams: DbNumber;
}

// The main stone is the lowest-ranked stone component (Metal_Type '0') of each item's bill of materials.
const ITEM_SELECT = `
  SELECT
    i."No_" AS sku_id,
    i."Web_Product_Group_ID" AS group_id,
    i."Item_Category_Code" AS category,
    i."Product_Subgroup_Code" AS subgroup_code,
    i."Metal_Code" AS metal_code,
    i."Metal_Stamp" AS metal_stamp,
    i."Metal_Color" AS metal_color,
    COALESCE(s."Primary_Gem_Material_Type", i."Primary_Gem_Material_Type") AS material_code,
    COALESCE(s."Primary_Gem_Shape", i."Primary_Gem_Shape") AS shape_code,
    s."Primary_Gem_Grade_Clarity" AS clarity_code,
    i."Primary_Gem_Color" AS color_code,
    s."Primary_Gem_Cut" AS cut_code,
    COALESCE(i."Stone_Weight__Carats_", s."Stone_DEW__Carats_") AS carat_weight,
    i."Ring_Size" AS ring_size,
    s."Primary_Gem_Diameter_Length_MM" AS length_mm,
    s."Primary_Gem_Width_MM" AS width_mm,
    i."Plating_Code" AS plating_code,
    s."Pieces_Per" AS stone_count,
    i."Image_SKU" AS image_sku,
    i."Main_Setting_Type" AS main_setting_type,
    i."Collection" AS collection,
    i."Jewelry_Brand" AS jewelry_brand,
    i."Gemstone_Brand" AS gemstone_brand,
    i."Style_ID" AS style_id,
    i."Web_Descriptor" AS web_descriptor,
    i."Is_Best_Seller" AS is_best_seller,
    i."Is_High_ROAS" AS is_high_roas,
    i."Is_Pinterest" AS is_pinterest,
    i."Unit_Price" AS price,
    i."Compare_At_Price" AS compare_at_price,
    i."GTIN" AS barcode,
    i."Inventory" AS inventory_quantity,
    i."Net_Weight_Grams" AS weight_grams
  FROM nav_items i
  LEFT JOIN LATERAL (
    SELECT b.*
    FROM nav_bom_components b
    WHERE b."Parent_Item_No_" = i."No_"
      AND b."Metal_Type" = '0'
    ORDER BY b."RANK" ASC
    LIMIT 1
  ) s ON true
`;

function parseNumber(value: DbNumber): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseInteger(value: DbNumber): number | null {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

function parseFlag(value: DbFlag): boolean | null {
  if (value === null) {
    return null;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "t", "yes", "y"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "f", "no", "n"].includes(normalized)) {
    return false;
  }
  return null;
}

export function mapWarrantyItemRow(row: WarrantyItemRow): RawComponentRow {
  return {
    skuId: row.sku_id.trim(),
    groupId: row.group_id.trim(),
    category: trimToNull(row.category)?.toUpperCase() ?? "",
    subgroupCode: trimToNull(row.subgroup_code),
    metalCode: trimToNull(row.metal_code),
    metalStamp: trimToNull(row.metal_stamp),
    metalColor: trimToNull(row.metal_color),
    materialCode: trimToNull(row.material_code),
    shapeCode: trimToNull(row.shape_code),
    clarityCode: trimToNull(row.clarity_code),
    colorCode: trimToNull(row.color_code),
    cutCode: trimToNull(row.cut_code),
    caratWeight: parseNumber(row.carat_weight),
    ringSize: typeof row.ring_size === "number" ? String(row.ring_size) : trimToNull(row.ring_size),
    lengthMm: parseNumber(row.length_mm),
    widthMm: parseNumber(row.width_mm),
    platingCode: trimToNull(row.plating_code),
    stoneCount: parseInteger(row.stone_count),
    imageSku: trimToNull(row.image_sku),
    mainSettingType: trimToNull(row.main_setting_type),
    collection: trimToNull(row.collection),
    jewelryBrand: trimToNull(row.jewelry_brand),
    gemstoneBrand: trimToNull(row.gemstone_brand),
    styleId: trimToNull(row.style_id),
    webDescriptor: trimToNull(row.web_descriptor),
    isBestSeller: parseFlag(row.is_best_seller),
    isHighRoas: parseFlag(row.is_high_roas),
    isPinterest: parseFlag(row.is_pinterest),
    price: parseNumber(row.price),
    compareAtPrice: parseNumber(row.compare_at_price),
    barcode: trimToNull(row.barcode),
    inventoryQuantity: parseInteger(row.inventory_quantity),
    weightGrams: parseNumber(row.weight_grams),
  };
}

/** Rows of one group must agree on a category; the product type and option rules come from it. */
export function toGroup(groupId: string, rows: RawComponentRow[]): Group {
  if (rows.length === 0) {
    throw new SyncGroupError("not_found", `Group ${groupId} has no SKUs in the warranty database.`, {
      group_id: groupId,
    });
  }

  const categories = [...new Set(rows.map((row) => row.category))].sort();
  if (categories.length > 1) {
    throw new SyncGroupError(
      "validation",
      `Group ${groupId} mixes categories: ${categories.join(", ")}.`,
      { group_id: groupId, categories },
    );
  }

  return { groupId, category: categories[0] ?? "", rows };
}

export async function fetchGroup(groupId: string): Promise<Group> {
  const pool = getWarrantyPool();
  const result = await pool.query<WarrantyItemRow>(
    `${ITEM_SELECT}
      WHERE i."Web_Product_Group_ID" = $1
      ORDER BY i."No_" ASC
    `,
    [groupId],
  );

  return toGroup(groupId, result.rows.map(mapWarrantyItemRow));
}

export async function fetchAllGroupIds(): Promise<string[]> {
  const pool = getWarrantyPool();
  const result = await pool.query<{ group_id: string }>(
    `
      SELECT DISTINCT "Web_Product_Group_ID" AS group_id
      FROM nav_items
      WHERE "Web_Product_Group_ID" IS NOT NULL
        AND "Web_Product_Group_ID" <> ''
      ORDER BY group_id ASC
    `,
  );

  return result.rows.map((row) => row.group_id);
}
