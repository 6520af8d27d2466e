export const OPTION_ATTRIBUTE_KEYS = [
  "carat_weight",
  "metal_type",
  "ring_size",
  "stone_length",
  "stone_width",
  "plating_type",
  "stone_shape",
] as const;

export const DESCRIPTIVE_ATTRIBUTE_KEYS = [
  "stone_material",
  "stone_clarity",
  "stone_color",
  "stone_cut",
  "setting_style",
  "main_setting_type",
  "collection",
  "jewelry_brand",
  "gemstone_brand",
  "style_id",
  "web_descriptor",
  "stone_count",
  "is_best_seller",
  "is_high_roas",
  "is_pinterest",
] as const;

export const ATTRIBUTE_KEYS = [...OPTION_ATTRIBUTE_KEYS, ...DESCRIPTIVE_ATTRIBUTE_KEYS] as const;

export type OptionAttributeKey = (typeof OPTION_ATTRIBUTE_KEYS)[number];
export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

export interface RawComponentRow {
  skuId: string;
  groupId: string;
  category: string;
  subgroupCode: string | null;
  metalCode: string | null;
  metalStamp: string | null;
  metalColor: string | null;
  materialCode: string | null;
  shapeCode: string | null;
  clarityCode: string | null;
  colorCode: string | null;
  cutCode: string | null;
  caratWeight: number | null;
  ringSize: string | null;
  lengthMm: number | null;
  widthMm: number | null;
  platingCode: string | null;
  stoneCount: number | null;
  imageSku: string | null;
  mainSettingType: string | null;
  collection: string | null;
  jewelryBrand: string | null;
  gemstoneBrand: string | null;
  styleId: string | null;
  webDescriptor: string | null;
  isBestSeller: boolean | null;
  isHighRoas: boolean | null;
  isPinterest: boolean | null;
  price: number | null;
  compareAtPrice: number | null;
  barcode: string | null;
  inventoryQuantity: number | null;
  weightGrams: number | null;
}

export interface Group {
  groupId: string;
  category: string;
  rows: RawComponentRow[];
}

export interface MetalTypeInput {
  code: string | null;
  stamp: string | null;
  color: string | null;
}

export interface RawAttributeInputs {
  carat_weight: number | null;
  metal_type: MetalTypeInput;
  ring_size: string | null;
  stone_length: number | null;
  stone_width: number | null;
  plating_type: string | null;
  stone_shape: string | null;
  stone_material: string | null;
  stone_clarity: string | null;
  stone_color: string | null;
  stone_cut: string | null;
  setting_style: string | null;
  main_setting_type: string | null;
  collection: string | null;
  jewelry_brand: string | null;
  gemstone_brand: string | null;
  style_id: string | null;
  web_descriptor: string | null;
  stone_count: number | null;
  is_best_seller: boolean | null;
  is_high_roas: boolean | null;
  is_pinterest: boolean | null;
}

export type SortKeyPart = number | string;

export interface CanonicalValue {
  /** Option value and title token. */
  display: string;
  /** Machine form written to metafields ("2.80", "6.5", "true"). */
  value: string;
  sortKey: SortKeyPart[];
}

export type AttributeKind = "constant" | "variant";

export interface ClassifiedAttribute {
  key: AttributeKey;
  kind: AttributeKind;
  values: CanonicalValue[];
}

export type ClassifiedAttributes = Map<AttributeKey, ClassifiedAttribute>;

export interface VariantOption {
  key: AttributeKey;
  displayName: string;
  sortedValues: string[];
}

export interface CatalogVariant {
  sku: string;
  optionValues: string[];
  price: number | null;
  compareAtPrice: number | null;
  barcode: string | null;
  inventoryQuantity: number | null;
  weightGrams: number | null;
}

export type MetafieldType =
  | "single_line_text_field"
  | "number_decimal"
  | "number_integer"
  | "boolean"
  | "json";

export interface CatalogMetafield {
  namespace: string;
  key: string;
  type: MetafieldType;
  value: string;
}

export interface MediaReference {
  ref: string;
  url: string;
  alt: string | null;
}

export type ProductStatus = "ACTIVE" | "DRAFT";

export interface CatalogEntity {
  groupId: string;
  title: string;
  handle: string;
  productType: string;
  vendor: string | null;
  status: ProductStatus;
  descriptionHtml: string;
  metafields: CatalogMetafield[];
  variantOptions: VariantOption[];
  variants: CatalogVariant[];
  media: MediaReference[];
}

export interface RemoteState {
  platformId: string;
  lastFingerprint: string | null;
  existingMediaRefs: string[];
}

export type SyncDecision = "create" | "update" | "no_op";

export type GroupSyncState =
  | "pending"
  | "validating"
  | "skipped"
  | "dispatching"
  | "succeeded"
  | "partial_failure"
  | "failed";

export type GroupOutcome = "created" | "updated" | "no_op" | "partial_failure" | "failed" | "dry_run";

export type SyncErrorKind =
  | "validation"
  | "duplicate_variant"
  | "not_found"
  | "transient_remote"
  | "remote_rejection"
  | "cancelled"
  | "unexpected";

export type DispatchMode = "individual" | "bulk" | "dry_run";

export interface RemoteFieldError {
  field: string[] | null;
  message: string;
  code: string | null;
}

export interface GroupSyncResult {
  groupId: string;
  outcome: GroupOutcome;
  platformId: string | null;
  handle: string | null;
  fingerprint: string | null;
  decision: SyncDecision | null;
  errorKind: SyncErrorKind | null;
  errorMessage: string | null;
  errorDetails: Record<string, unknown> | null;
  variantCount: number;
  metafieldCount: number;
  mediaCount: number;
  attempts: number;
  warnings: string[];
}

export type SyncRunStatus = "running" | "completed" | "completed_with_failures" | "cancelled" | "failed";

export interface SyncRunFailure {
  groupId: string;
  errorKind: SyncErrorKind;
  message: string;
}

export interface SyncRunSummary {
  runId: string;
  runLabel: string | null;
  dryRun: boolean;
  dispatchMode: DispatchMode;
  status: SyncRunStatus;
  groupCount: number;
  counts: Record<GroupOutcome, number>;
  failures: SyncRunFailure[];
  results: GroupSyncResult[];
  startedAt: string;
  finishedAt: string;
}

export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface SyncRunLogRow {
  runId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
  expiresAt: string;
}
