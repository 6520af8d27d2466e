import { RunLogger } from "../src/logging/run-logger.js";
import type {
  BulkLineResult,
  BulkOperationState,
  CatalogPlatform,
  UpsertRequest,
  UpsertResult,
} from "../src/platform/platform.js";
import { success, type Outcome } from "../src/sync/retry.js";
import type {
  CatalogEntity,
  CatalogVariant,
  Group,
  RawComponentRow,
  RemoteFieldError,
  RemoteState,
  SyncRunLogRow,
} from "../src/types.js";

export function makeRow(overrides: Partial<RawComponentRow> = {}): RawComponentRow {
  return {
    skuId: "SKU-1",
    groupId: "G1",
    category: "RING",
    subgroupCode: null,
    metalCode: null,
    metalStamp: null,
    metalColor: null,
    materialCode: null,
    shapeCode: null,
    clarityCode: null,
    colorCode: null,
    cutCode: null,
    caratWeight: null,
    ringSize: null,
    lengthMm: null,
    widthMm: null,
    platingCode: null,
    stoneCount: null,
    imageSku: null,
    mainSettingType: null,
    collection: null,
    jewelryBrand: null,
    gemstoneBrand: null,
    styleId: null,
    webDescriptor: null,
    isBestSeller: null,
    isHighRoas: null,
    isPinterest: null,
    price: null,
    compareAtPrice: null,
    barcode: null,
    inventoryQuantity: null,
    weightGrams: null,
    ...overrides,
  };
}

export function makeGroup(groupId: string, rows: Array<Partial<RawComponentRow>>, category = "RING"): Group {
  return {
    groupId,
    category,
    rows: rows.map((row) => makeRow({ groupId, category, ...row })),
  };
}

export function makeVariant(sku: string, optionValues: string[], overrides: Partial<CatalogVariant> = {}): CatalogVariant {
  return {
    sku,
    optionValues,
    price: 100,
    compareAtPrice: null,
    barcode: null,
    inventoryQuantity: null,
    weightGrams: null,
    ...overrides,
  };
}

export function makeEntity(groupId: string, overrides: Partial<CatalogEntity> = {}): CatalogEntity {
  return {
    groupId,
    title: `Test Ring ${groupId}`,
    handle: `test-ring-${groupId.toLowerCase()}`,
    productType: "Ring",
    vendor: null,
    status: "DRAFT",
    descriptionHtml: "",
    metafields: [{ namespace: "custom", key: "stone_shape", type: "single_line_text_field", value: "Round" }],
    variantOptions: [{ key: "ring_size", displayName: "Size", sortedValues: ["6.0", "7.0"] }],
    variants: [makeVariant(`${groupId}-6`, ["6.0"]), makeVariant(`${groupId}-7`, ["7.0"])],
    media: [],
    ...overrides,
  };
}

export function makeLogger(runId = "run-test"): { logger: RunLogger; rows: SyncRunLogRow[] } {
  const rows: SyncRunLogRow[] = [];
  const logger = new RunLogger({
    runId,
    traceRetentionHours: 1,
    flushBatchSize: 1000,
    insertBatch: async (batch) => {
      rows.push(...batch);
    },
    consoleWrite: () => undefined,
    now: () => new Date("2026-03-01T12:00:00.000Z"),
  });
  return { logger, rows };
}

interface StoredProduct {
  id: string;
  fingerprint: string | null;
  mediaRefs: string[];
}

/** In-memory catalog keyed by handle. Queued outcomes are returned before the default behaviour. */
export class FakePlatform implements CatalogPlatform {
  readonly products = new Map<string, StoredProduct>();
  readonly calls: string[] = [];
  readonly published: string[] = [];
  readonly upsertQueue: Array<Outcome<UpsertResult>> = [];
  readonly remoteStateQueue: Array<Outcome<RemoteState | null>> = [];
  /** Field errors for the next upserts; the product is still stored. */
  readonly fieldErrorQueue: RemoteFieldError[][] = [];
  clearFingerprintOutcome: Outcome<{ userErrors: RemoteFieldError[] }> = success({ userErrors: [] });
  onCall?: (call: string) => void;
  publishOutcome: Outcome<{ userErrors: RemoteFieldError[] }> = success({ userErrors: [] });
  bulkPollStatuses: Array<BulkOperationState["status"]> = ["RUNNING", "COMPLETED"];
  bulkRequests: UpsertRequest[] = [];
  private nextId = 1;

  async fetchRemoteState(handle: string): Promise<Outcome<RemoteState | null>> {
    this.record(`fetchRemoteState:${handle}`);
    const queued = this.remoteStateQueue.shift();
    if (queued) {
      return queued;
    }

    const product = this.products.get(handle);
    return success(
      product
        ? { platformId: product.id, lastFingerprint: product.fingerprint, existingMediaRefs: [...product.mediaRefs] }
        : null,
    );
  }

  async upsertEntity(request: UpsertRequest): Promise<Outcome<UpsertResult>> {
    this.record(`upsertEntity:${request.entity.handle}`);
    const queued = this.upsertQueue.shift();
    if (queued) {
      return queued;
    }
    return success({ platformId: this.store(request), userErrors: this.fieldErrorQueue.shift() ?? [] });
  }

  async startBulkUpsert(requests: UpsertRequest[]): Promise<Outcome<{ operationId: string }>> {
    this.record(`startBulkUpsert:${requests.length}`);
    this.bulkRequests = [...requests];
    return success({ operationId: "gid://shopify/BulkOperation/1" });
  }

  async getBulkOperation(operationId: string): Promise<Outcome<BulkOperationState>> {
    this.record(`getBulkOperation:${operationId}`);
    const status = this.bulkPollStatuses.shift() ?? "COMPLETED";
    return success({
      id: operationId,
      status,
      errorCode: null,
      objectCount: this.bulkRequests.length,
      url: status === "COMPLETED" ? "https://results.example.test/bulk.jsonl" : null,
      partialDataUrl: null,
    });
  }

  async fetchBulkResults(url: string): Promise<Outcome<BulkLineResult[]>> {
    this.record(`fetchBulkResults:${url}`);
    return success(
      this.bulkRequests.map((request, lineNumber) => ({
        lineNumber,
        platformId: this.store(request),
        userErrors: [],
      })),
    );
  }

  async publish(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>> {
    this.record(`publish:${platformId}`);
    this.published.push(platformId);
    return this.publishOutcome;
  }

  async clearFingerprint(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>> {
    this.record(`clearFingerprint:${platformId}`);
    if (this.clearFingerprintOutcome.kind === "success") {
      for (const product of this.products.values()) {
        if (product.id === platformId) {
          product.fingerprint = null;
        }
      }
    }
    return this.clearFingerprintOutcome;
  }

  private record(call: string): void {
    this.calls.push(call);
    this.onCall?.(call);
  }

  private store(request: UpsertRequest): string {
    const existing = this.products.get(request.entity.handle);
    const id = existing?.id ?? `gid://shopify/Product/${this.nextId++}`;
    this.products.set(request.entity.handle, {
      id,
      fingerprint: request.fingerprint,
      mediaRefs: request.entity.media.map((reference) => reference.ref),
    });
    return id;
  }
}
