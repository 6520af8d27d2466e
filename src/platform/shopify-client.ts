import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import { fatal, retryable, success, type FailedOutcome, type Outcome } from "../sync/retry.js";
import type { RemoteFieldError, RemoteState } from "../types.js";
import type {
  BulkLineResult,
  BulkOperationState,
  CatalogPlatform,
  UpsertRequest,
  UpsertResult,
} from "./platform.js";
import {
  classifyGraphQLErrors,
  classifyHttpStatus,
  classifyTransportError,
  graphQLErrorSchema,
  throttleExtensionsSchema,
  toRemoteFieldErrors,
  userErrorSchema,
} from "./shopify-errors.js";
import {
  FINGERPRINT_METAFIELD_KEY,
  MEDIA_REFS_METAFIELD_KEY,
  SYNC_METAFIELD_NAMESPACE,
  buildBulkJsonl,
  buildProductSetVariables,
} from "./shopify-payload.js";

const PRODUCT_SYNC_STATE_QUERY = `
  query ProductSyncState($identifier: ProductIdentifierInput!) {
    productByIdentifier(identifier: $identifier) {
      id
      fingerprint: metafield(namespace: "${SYNC_METAFIELD_NAMESPACE}", key: "${FINGERPRINT_METAFIELD_KEY}") {
        value
      }
      mediaRefs: metafield(namespace: "${SYNC_METAFIELD_NAMESPACE}", key: "${MEDIA_REFS_METAFIELD_KEY}") {
        value
      }
    }
  }
`;

const PRODUCT_SET_MUTATION = `
  mutation ProductSet($identifier: ProductSetIdentifiers, $input: ProductSetInput!) {
    productSet(identifier: $identifier, input: $input, synchronous: true) {
      product {
        id
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

const BULK_PRODUCT_SET_MUTATION = `mutation call($identifier: ProductSetIdentifiers, $input: ProductSetInput!) { productSet(identifier: $identifier, input: $input) { product { id } userErrors { field message code } } }`;

const STAGED_UPLOADS_CREATE_MUTATION = `
  mutation StagedUploadsCreate($input: [StagedUploadInput!]!) {
    stagedUploadsCreate(input: $input) {
      stagedTargets {
        url
        resourceUrl
        parameters {
          name
          value
        }
      }
      userErrors {
        field
        message
      }
    }
  }
`;

const BULK_OPERATION_RUN_MUTATION = `
  mutation BulkProductSet($mutation: String!, $stagedUploadPath: String!) {
    bulkOperationRunMutation(mutation: $mutation, stagedUploadPath: $stagedUploadPath) {
      bulkOperation {
        id
        status
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

const BULK_OPERATION_STATUS_QUERY = `
  query BulkOperationStatus($id: ID!) {
    node(id: $id) {
      ... on BulkOperation {
        id
        status
        errorCode
        objectCount
        url
        partialDataUrl
      }
    }
  }
`;

const PUBLISH_MUTATION = `
  mutation PublishToCurrentChannel($id: ID!) {
    publishablePublishToCurrentChannel(id: $id) {
      userErrors {
        field
        message
      }
    }
  }
`;

const CLEAR_FINGERPRINT_MUTATION = `
  mutation ClearSyncFingerprint($metafields: [MetafieldIdentifierInput!]!) {
    metafieldsDelete(metafields: $metafields) {
      userErrors {
        field
        message
      }
    }
  }
`;

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphQLErrorSchema).optional(),
  extensions: throttleExtensionsSchema.optional(),
});

const remoteStateDataSchema = z.object({
  productByIdentifier: z
    .object({
      id: z.string(),
      fingerprint: z.object({ value: z.string() }).nullable(),
      mediaRefs: z.object({ value: z.string() }).nullable(),
    })
    .nullable(),
});

const productSetPayloadSchema = z.object({
  product: z.object({ id: z.string() }).nullable(),
  userErrors: z.array(userErrorSchema),
});

const productSetDataSchema = z.object({
  productSet: productSetPayloadSchema.nullable(),
});

const stagedUploadsDataSchema = z.object({
  stagedUploadsCreate: z
    .object({
      stagedTargets: z.array(
        z.object({
          url: z.string(),
          resourceUrl: z.string().nullable(),
          parameters: z.array(z.object({ name: z.string(), value: z.string() })),
        }),
      ),
      userErrors: z.array(userErrorSchema),
    })
    .nullable(),
});

const bulkRunDataSchema = z.object({
  bulkOperationRunMutation: z
    .object({
      bulkOperation: z.object({ id: z.string(), status: z.string() }).nullable(),
      userErrors: z.array(userErrorSchema),
    })
    .nullable(),
});

const bulkStatusSchema = z.enum(["CREATED", "RUNNING", "COMPLETED", "CANCELING", "CANCELED", "FAILED", "EXPIRED"]);

const bulkStatusDataSchema = z.object({
  node: z
    .object({
      id: z.string(),
      status: bulkStatusSchema,
      errorCode: z.string().nullable(),
      objectCount: z.union([z.string(), z.number()]).transform((value) => Number(value)),
      url: z.string().nullable(),
      partialDataUrl: z.string().nullable(),
    })
    .nullable(),
});

const publishDataSchema = z.object({
  publishablePublishToCurrentChannel: z
    .object({
      userErrors: z.array(userErrorSchema),
    })
    .nullable(),
});

const clearFingerprintDataSchema = z.object({
  metafieldsDelete: z
    .object({
      userErrors: z.array(userErrorSchema),
    })
    .nullable(),
});

const bulkResultLineSchema = z.object({
  data: z.object({ productSet: productSetPayloadSchema.nullable() }).optional(),
  errors: z.array(graphQLErrorSchema).optional(),
  __lineNumber: z.number().int().nonnegative(),
});

const mediaRefsSchema = z.array(z.string());

export interface ShopifyClientOptions {
  shopDomain: string;
  accessToken: string;
  apiVersion: string;
  timeoutMs: number;
  locationId: string | null;
  adapter?: AxiosAdapter;
  now?: () => number;
}

export interface ShopifyClientStats {
  request_count: number;
  http_error_count: number;
  graphql_error_count: number;
  transport_error_count: number;
}

export function normalizeShopDomain(shopDomain: string): string {
  const cleaned = shopDomain
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/.*$/, "")
    .toLowerCase();
  return cleaned.includes(".") ? cleaned : `${cleaned}.myshopify.com`;
}

function parseMediaRefs(value: string | null): string[] {
  if (value === null) {
    return [];
  }
  try {
    const parsed = mediaRefsSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export class ShopifyCatalogPlatform implements CatalogPlatform {
  private readonly http: AxiosInstance;
  private readonly uploadHttp: AxiosInstance;
  private readonly locationId: string | null;
  private readonly now: () => number;

  private readonly stats: ShopifyClientStats = {
    request_count: 0,
    http_error_count: 0,
    graphql_error_count: 0,
    transport_error_count: 0,
  };

  constructor(options: ShopifyClientOptions) {
    const adapterConfig = options.adapter ? { adapter: options.adapter } : {};

    this.http = axios.create({
      baseURL: `https://${normalizeShopDomain(options.shopDomain)}/admin/api/${options.apiVersion}`,
      headers: {
        "X-Shopify-Access-Token": options.accessToken,
        "Content-Type": "application/json",
      },
      timeout: options.timeoutMs,
      validateStatus: () => true,
      ...adapterConfig,
    });
    this.uploadHttp = axios.create({
      timeout: options.timeoutMs,
      validateStatus: () => true,
      ...adapterConfig,
    });
    this.locationId = options.locationId;
    this.now = options.now ?? (() => Date.now());
  }

  getStats(): ShopifyClientStats {
    return { ...this.stats };
  }

  private httpFailure(response: AxiosResponse<unknown>): FailedOutcome | null {
    const failure = classifyHttpStatus(response.status, response.headers["retry-after"], this.now());
    if (failure) {
      this.stats.http_error_count += 1;
    }
    return failure;
  }

  private async graphql<T>(
    query: string,
    variables: Record<string, unknown>,
    dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Outcome<T>> {
    this.stats.request_count += 1;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>("/graphql.json", { query, variables });
    } catch (error) {
      this.stats.transport_error_count += 1;
      return classifyTransportError(error);
    }

    const httpFailure = this.httpFailure(response);
    if (httpFailure) {
      return httpFailure;
    }

    const envelope = envelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      return fatal(`invalid_graphql_response: ${describeIssues(envelope.error)}`);
    }

    const graphQLFailure = classifyGraphQLErrors(envelope.data.errors ?? [], envelope.data.extensions);
    if (graphQLFailure) {
      this.stats.graphql_error_count += 1;
      return graphQLFailure;
    }

    const data = dataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      return fatal(`unexpected_response_shape: ${describeIssues(data.error)}`);
    }
    return success(data.data);
  }

  async fetchRemoteState(handle: string): Promise<Outcome<RemoteState | null>> {
    const outcome = await this.graphql(
      PRODUCT_SYNC_STATE_QUERY,
      { identifier: { handle } },
      remoteStateDataSchema,
    );
    if (outcome.kind !== "success") {
      return outcome;
    }

    const product = outcome.value.productByIdentifier;
    if (!product) {
      return success(null);
    }
    return success({
      platformId: product.id,
      lastFingerprint: product.fingerprint?.value ?? null,
      existingMediaRefs: parseMediaRefs(product.mediaRefs?.value ?? null),
    });
  }

  async upsertEntity(request: UpsertRequest): Promise<Outcome<UpsertResult>> {
    const variables = buildProductSetVariables(request, { locationId: this.locationId });
    const outcome = await this.graphql(
      PRODUCT_SET_MUTATION,
      { identifier: variables.identifier, input: variables.input },
      productSetDataSchema,
    );
    if (outcome.kind !== "success") {
      return outcome;
    }

    const payload = outcome.value.productSet;
    if (!payload) {
      return fatal("product_set_missing");
    }
    return success({
      platformId: payload.product?.id ?? null,
      userErrors: toRemoteFieldErrors(payload.userErrors),
    });
  }

  private async stageBulkVariables(jsonl: string): Promise<Outcome<string>> {
    const staged = await this.graphql(
      STAGED_UPLOADS_CREATE_MUTATION,
      {
        input: [
          {
            resource: "BULK_MUTATION_VARIABLES",
            filename: "product-set.jsonl",
            mimeType: "text/jsonl",
            httpMethod: "POST",
          },
        ],
      },
      stagedUploadsDataSchema,
    );
    if (staged.kind !== "success") {
      return staged;
    }

    const payload = staged.value.stagedUploadsCreate;
    if (!payload || payload.userErrors.length > 0) {
      return fatal("staged_upload_rejected", {
        user_errors: toRemoteFieldErrors(payload?.userErrors ?? []),
      });
    }

    const target = payload.stagedTargets[0];
    const key = target?.parameters.find((parameter) => parameter.name === "key")?.value;
    if (!target || !key) {
      return fatal("staged_upload_target_missing");
    }

    const form = new FormData();
    for (const parameter of target.parameters) {
      form.append(parameter.name, parameter.value);
    }
    form.append("file", new Blob([jsonl], { type: "text/jsonl" }), "product-set.jsonl");

    this.stats.request_count += 1;
    let response: AxiosResponse<unknown>;
    try {
      response = await this.uploadHttp.post<unknown>(target.url, form);
    } catch (error) {
      this.stats.transport_error_count += 1;
      return classifyTransportError(error);
    }

    const httpFailure = this.httpFailure(response);
    if (httpFailure) {
      return httpFailure;
    }
    if (!isSuccessStatus(response.status)) {
      return fatal(`staged_upload_failed_${response.status}`);
    }
    return success(key);
  }

  async startBulkUpsert(requests: UpsertRequest[]): Promise<Outcome<{ operationId: string }>> {
    const staged = await this.stageBulkVariables(buildBulkJsonl(requests, { locationId: this.locationId }));
    if (staged.kind !== "success") {
      return staged;
    }

    const outcome = await this.graphql(
      BULK_OPERATION_RUN_MUTATION,
      { mutation: BULK_PRODUCT_SET_MUTATION, stagedUploadPath: staged.value },
      bulkRunDataSchema,
    );
    if (outcome.kind !== "success") {
      return outcome;
    }

    const payload = outcome.value.bulkOperationRunMutation;
    const userErrors: RemoteFieldError[] = toRemoteFieldErrors(payload?.userErrors ?? []);
    if (userErrors.some((error) => error.code === "OPERATION_IN_PROGRESS")) {
      return retryable("bulk_operation_in_progress", null, { user_errors: userErrors });
    }
    if (!payload?.bulkOperation || userErrors.length > 0) {
      return fatal("bulk_operation_rejected", { user_errors: userErrors });
    }
    return success({ operationId: payload.bulkOperation.id });
  }

  async getBulkOperation(operationId: string): Promise<Outcome<BulkOperationState>> {
    const outcome = await this.graphql(BULK_OPERATION_STATUS_QUERY, { id: operationId }, bulkStatusDataSchema);
    if (outcome.kind !== "success") {
      return outcome;
    }

    const node = outcome.value.node;
    if (!node) {
      return fatal(`bulk_operation_not_found: ${operationId}`);
    }
    return success({
      id: node.id,
      status: node.status,
      errorCode: node.errorCode,
      objectCount: Number.isFinite(node.objectCount) ? node.objectCount : 0,
      url: node.url,
      partialDataUrl: node.partialDataUrl,
    });
  }

  async fetchBulkResults(url: string): Promise<Outcome<BulkLineResult[]>> {
    this.stats.request_count += 1;
    let response: AxiosResponse<unknown>;
    try {
      response = await this.uploadHttp.get<unknown>(url, { responseType: "text" });
    } catch (error) {
      this.stats.transport_error_count += 1;
      return classifyTransportError(error);
    }

    const httpFailure = this.httpFailure(response);
    if (httpFailure) {
      return httpFailure;
    }
    if (typeof response.data !== "string") {
      return fatal("bulk_results_not_text");
    }

    const results: BulkLineResult[] = [];
    const lines = response.data.split("\n").filter((line) => line.trim().length > 0);
    for (const [index, line] of lines.entries()) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        return fatal("invalid_bulk_result_line", {
          line_index: index,
          message: error instanceof Error ? error.message : String(error),
        });
      }

      const parsed = bulkResultLineSchema.safeParse(raw);
      if (!parsed.success) {
        return fatal(`invalid_bulk_result_line: ${describeIssues(parsed.error)}`, { line_index: index });
      }

      const payload = parsed.data.data?.productSet ?? null;
      const lineErrors: RemoteFieldError[] = (parsed.data.errors ?? []).map((error) => ({
        field: null,
        message: error.message,
        code: error.extensions?.code ?? "GRAPHQL_ERROR",
      }));

      results.push({
        lineNumber: parsed.data.__lineNumber,
        platformId: payload?.product?.id ?? null,
        userErrors: [...toRemoteFieldErrors(payload?.userErrors ?? []), ...lineErrors],
      });
    }

    return success(results);
  }

  async publish(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>> {
    const outcome = await this.graphql(PUBLISH_MUTATION, { id: platformId }, publishDataSchema);
    if (outcome.kind !== "success") {
      return outcome;
    }
    return success({
      userErrors: toRemoteFieldErrors(outcome.value.publishablePublishToCurrentChannel?.userErrors ?? []),
    });
  }

  async clearFingerprint(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>> {
    const outcome = await this.graphql(
      CLEAR_FINGERPRINT_MUTATION,
      { metafields: [{ ownerId: platformId, namespace: SYNC_METAFIELD_NAMESPACE, key: FINGERPRINT_METAFIELD_KEY }] },
      clearFingerprintDataSchema,
    );
    if (outcome.kind !== "success") {
      return outcome;
    }
    return success({
      userErrors: toRemoteFieldErrors(outcome.value.metafieldsDelete?.userErrors ?? []),
    });
  }
}
