import type { Outcome } from "../sync/retry.js";
import type { CatalogEntity, RemoteFieldError, RemoteState } from "../types.js";

export interface UpsertRequest {
  entity: CatalogEntity;
  fingerprint: string;
}

export interface UpsertResult {
  /** Present whenever the platform holds a product for the handle, even alongside field errors. */
  platformId: string | null;
  userErrors: RemoteFieldError[];
}

export type BulkOperationStatus =
  | "CREATED"
  | "RUNNING"
  | "COMPLETED"
  | "CANCELING"
  | "CANCELED"
  | "FAILED"
  | "EXPIRED";

export interface BulkOperationState {
  id: string;
  status: BulkOperationStatus;
  errorCode: string | null;
  objectCount: number;
  url: string | null;
  partialDataUrl: string | null;
}

export interface BulkLineResult {
  /** Zero-based index into the requests passed to `startBulkUpsert`. */
  lineNumber: number;
  platformId: string | null;
  userErrors: RemoteFieldError[];
}

/**
 * Remote catalog seen by the orchestrator. Every method reports through an Outcome so the caller's
 * retry loop decides what happens next.
 */
export interface CatalogPlatform {
  fetchRemoteState(handle: string): Promise<Outcome<RemoteState | null>>;
  upsertEntity(request: UpsertRequest): Promise<Outcome<UpsertResult>>;
  startBulkUpsert(requests: UpsertRequest[]): Promise<Outcome<{ operationId: string }>>;
  getBulkOperation(operationId: string): Promise<Outcome<BulkOperationState>>;
  fetchBulkResults(url: string): Promise<Outcome<BulkLineResult[]>>;
  publish(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>>;
  /** Drops the stored sync fingerprint so the next run sees the product as changed. */
  clearFingerprint(platformId: string): Promise<Outcome<{ userErrors: RemoteFieldError[] }>>;
}

export const TERMINAL_BULK_STATUSES: ReadonlySet<BulkOperationStatus> = new Set([
  "COMPLETED",
  "CANCELED",
  "FAILED",
  "EXPIRED",
]);
