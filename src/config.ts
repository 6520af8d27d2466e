import "dotenv/config";
import { z } from "zod";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function envBoolean(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === "") {
      return defaultValue;
    }
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
    }
    return value;
  }, z.boolean());
}

function optionalString() {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
    z.string().trim().min(1).optional(),
  );
}

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  WARRANTY_DATABASE_URL: optionalString(),
  SHOPIFY_SHOP_DOMAIN: optionalString(),
  SHOPIFY_ACCESS_TOKEN: optionalString(),
  SHOPIFY_API_VERSION: z.string().regex(/^\d{4}-\d{2}$/, "SHOPIFY_API_VERSION must look like 2025-01").default("2025-01"),
  SHOPIFY_LOCATION_ID: optionalString(),
  SHOPIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SHOPIFY_MAX_RETRIES: z.coerce.number().int().nonnegative().default(4),
  SHOPIFY_RETRY_BASE_MS: z.coerce.number().int().positive().default(1_000),
  SHOPIFY_RETRY_MAX_MS: z.coerce.number().int().positive().default(16_000),
  SHOPIFY_PUBLISH_ON_CREATE: envBoolean(true),
  PRODUCT_VENDOR: optionalString(),
  PRODUCT_STATUS: z.enum(["ACTIVE", "DRAFT"]).default("DRAFT"),
  SYNC_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RATE_LIMIT_PER_SECOND: z.coerce.number().positive().default(2),
  RATE_LIMIT_BURST: z.coerce.number().int().positive().default(4),
  BULK_THRESHOLD: z.coerce.number().int().positive().default(10),
  BULK_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  BULK_POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  MAX_HANDLE_LENGTH: z.coerce.number().int().min(16).max(255).default(255),
  MEDIA_MANIFEST_PATH: optionalString(),
  TRACE_RETENTION_HOURS: z.coerce.number().int().positive().default(72),
  TRACE_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.SHOPIFY_RETRY_BASE_MS > parsed.data.SHOPIFY_RETRY_MAX_MS) {
    throw new Error(
      `Invalid environment configuration: SHOPIFY_RETRY_BASE_MS (${parsed.data.SHOPIFY_RETRY_BASE_MS}) must be <= SHOPIFY_RETRY_MAX_MS (${parsed.data.SHOPIFY_RETRY_MAX_MS})`,
    );
  }

  if (parsed.data.BULK_POLL_INTERVAL_MS > parsed.data.BULK_POLL_TIMEOUT_MS) {
    throw new Error(
      `Invalid environment configuration: BULK_POLL_INTERVAL_MS (${parsed.data.BULK_POLL_INTERVAL_MS}) must be <= BULK_POLL_TIMEOUT_MS (${parsed.data.BULK_POLL_TIMEOUT_MS})`,
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}

export interface ShopifyCredentials {
  shopDomain: string;
  accessToken: string;
}

/** Dry runs never reach Shopify, so only live runs need these. */
export function requireShopifyCredentials(config: AppConfig): ShopifyCredentials {
  const missing = [
    config.SHOPIFY_SHOP_DOMAIN ? null : "SHOPIFY_SHOP_DOMAIN",
    config.SHOPIFY_ACCESS_TOKEN ? null : "SHOPIFY_ACCESS_TOKEN",
  ].filter((name): name is string => name !== null);

  if (!config.SHOPIFY_SHOP_DOMAIN || !config.SHOPIFY_ACCESS_TOKEN) {
    throw new Error(`Invalid environment configuration: ${missing.join(", ")} required for a live sync.`);
  }

  return { shopDomain: config.SHOPIFY_SHOP_DOMAIN, accessToken: config.SHOPIFY_ACCESS_TOKEN };
}
