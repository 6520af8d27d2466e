import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { ShopifyCatalogPlatform, normalizeShopDomain } from "../src/platform/shopify-client.js";
import { makeEntity } from "./fixtures.js";

interface RecordedRequest {
  url: string;
  baseURL: string | undefined;
  query: string;
  variables: Record<string, unknown>;
}

type Responder = (request: RecordedRequest) => { status?: number; data: unknown; headers?: Record<string, string> };

function stubAdapter(responder: Responder): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const body: { query?: string; variables?: Record<string, unknown> } =
      typeof config.data === "string" ? JSON.parse(config.data) : {};
    const request: RecordedRequest = {
      url: config.url ?? "",
      baseURL: config.baseURL,
      query: body.query ?? "",
      variables: body.variables ?? {},
    };
    requests.push(request);

    const reply = responder(request);
    return {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: "",
      headers: reply.headers ?? {},
      config,
    };
  };
  return { adapter, requests };
}

function createClient(adapter: AxiosAdapter): ShopifyCatalogPlatform {
  return new ShopifyCatalogPlatform({
    shopDomain: "example-store",
    accessToken: "test-token",
    apiVersion: "2025-01",
    timeoutMs: 1000,
    locationId: null,
    adapter,
    now: () => 0,
  });
}

describe("shopify catalog platform", () => {
  it("normalizes shop domains", () => {
    expect(normalizeShopDomain("example-store")).toBe("example-store.myshopify.com");
    expect(normalizeShopDomain("https://Example-Store.myshopify.com/admin")).toBe("example-store.myshopify.com");
  });

  it("reads remote sync state from the product metafields", async () => {
    const { adapter, requests } = stubAdapter(() => ({
      data: {
        data: {
          productByIdentifier: {
            id: "gid://shopify/Product/7",
            fingerprint: { value: "abc" },
            mediaRefs: { value: '["img-1","img-2"]' },
          },
        },
      },
    }));

    const outcome = await createClient(adapter).fetchRemoteState("test-ring-g1");

    expect(outcome).toEqual({
      kind: "success",
      value: { platformId: "gid://shopify/Product/7", lastFingerprint: "abc", existingMediaRefs: ["img-1", "img-2"] },
    });
    expect(requests[0]?.baseURL).toBe("https://example-store.myshopify.com/admin/api/2025-01");
    expect(requests[0]?.url).toBe("/graphql.json");
    expect(requests[0]?.variables).toEqual({ identifier: { handle: "test-ring-g1" } });
  });

  it("returns null when no product has the handle", async () => {
    const { adapter } = stubAdapter(() => ({ data: { data: { productByIdentifier: null } } }));

    expect(await createClient(adapter).fetchRemoteState("missing")).toEqual({ kind: "success", value: null });
  });

  it("sends one productSet keyed by handle and keeps the product id next to field errors", async () => {
    const { adapter, requests } = stubAdapter(() => ({
      data: {
        data: {
          productSet: {
            product: { id: "gid://shopify/Product/9" },
            userErrors: [{ field: ["input", "variants", "0", "price"], message: "Price is invalid", code: "INVALID" }],
          },
        },
      },
    }));

    const outcome = await createClient(adapter).upsertEntity({ entity: makeEntity("G1"), fingerprint: "fp-1" });

    expect(outcome).toEqual({
      kind: "success",
      value: {
        platformId: "gid://shopify/Product/9",
        userErrors: [{ field: ["input", "variants", "0", "price"], message: "Price is invalid", code: "INVALID" }],
      },
    });
    expect(requests[0]?.query).toContain("productSet(identifier: $identifier, input: $input, synchronous: true)");
    expect(requests[0]?.variables.identifier).toEqual({ handle: "test-ring-g1" });
  });

  it("deletes the fingerprint metafield of a product", async () => {
    const { adapter, requests } = stubAdapter(() => ({
      data: {
        data: {
          metafieldsDelete: {
            userErrors: [{ field: ["metafields", "0"], message: "Metafield not found" }],
          },
        },
      },
    }));

    const outcome = await createClient(adapter).clearFingerprint("gid://shopify/Product/1");

    expect(outcome).toEqual({
      kind: "success",
      value: { userErrors: [{ field: ["metafields", "0"], message: "Metafield not found", code: null }] },
    });
    expect(requests[0]?.query).toContain("metafieldsDelete(metafields: $metafields)");
    expect(requests[0]?.variables).toEqual({
      metafields: [{ ownerId: "gid://shopify/Product/1", namespace: "sync", key: "fingerprint" }],
    });
  });

  it("turns a 429 into a retryable outcome with the Retry-After wait", async () => {
    const { adapter } = stubAdapter(() => ({ status: 429, data: {}, headers: { "retry-after": "2" } }));
    const client = createClient(adapter);

    const outcome = await client.fetchRemoteState("test-ring-g1");

    expect(outcome).toEqual({ kind: "retryable", reason: "rate_limited", waitHintMs: 2000, details: { status: 429 } });
    expect(client.getStats()).toMatchObject({ request_count: 1, http_error_count: 1 });
  });

  it("turns a THROTTLED response into a retryable outcome with the bucket wait", async () => {
    const { adapter } = stubAdapter(() => ({
      data: {
        errors: [{ message: "Throttled", extensions: { code: "THROTTLED" } }],
        extensions: {
          cost: {
            requestedQueryCost: 100,
            throttleStatus: { maximumAvailable: 1000, currentlyAvailable: 40, restoreRate: 50 },
          },
        },
      },
    }));

    const outcome = await createClient(adapter).publish("gid://shopify/Product/1");

    expect(outcome).toMatchObject({ kind: "retryable", reason: "throttled", waitHintMs: 1200 });
  });

  it("treats a dropped connection as retryable", async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError("socket hang up", "ECONNRESET");
    };

    const outcome = await createClient(adapter).fetchRemoteState("test-ring-g1");

    expect(outcome).toMatchObject({ kind: "retryable", reason: "network_error_ECONNRESET" });
  });

  it("maps bulk result lines by line number", async () => {
    const lines = [
      JSON.stringify({ data: { productSet: { product: { id: "gid://shopify/Product/2" }, userErrors: [] } }, __lineNumber: 1 }),
      JSON.stringify({
        data: { productSet: { product: null, userErrors: [{ field: ["input", "handle"], message: "Handle taken" }] } },
        __lineNumber: 0,
      }),
    ].join("\n");
    const { adapter, requests } = stubAdapter(() => ({ data: `${lines}\n` }));

    const outcome = await createClient(adapter).fetchBulkResults("https://storage.example.test/results.jsonl");

    expect(requests[0]?.url).toBe("https://storage.example.test/results.jsonl");
    expect(outcome).toEqual({
      kind: "success",
      value: [
        { lineNumber: 1, platformId: "gid://shopify/Product/2", userErrors: [] },
        {
          lineNumber: 0,
          platformId: null,
          userErrors: [{ field: ["input", "handle"], message: "Handle taken", code: null }],
        },
      ],
    });
  });

  it("reads bulk operation status", async () => {
    const { adapter } = stubAdapter(() => ({
      data: {
        data: {
          node: {
            id: "gid://shopify/BulkOperation/5",
            status: "COMPLETED",
            errorCode: null,
            objectCount: "12",
            url: "https://storage.example.test/results.jsonl",
            partialDataUrl: null,
          },
        },
      },
    }));

    const outcome = await createClient(adapter).getBulkOperation("gid://shopify/BulkOperation/5");

    expect(outcome).toEqual({
      kind: "success",
      value: {
        id: "gid://shopify/BulkOperation/5",
        status: "COMPLETED",
        errorCode: null,
        objectCount: 12,
        url: "https://storage.example.test/results.jsonl",
        partialDataUrl: null,
      },
    });
  });
});
