import type { SyncErrorKind } from "../types.js";

export class SyncGroupError extends Error {
  readonly kind: SyncErrorKind;
  readonly details: Record<string, unknown> | null;

  constructor(kind: SyncErrorKind, message: string, details: Record<string, unknown> | null = null) {
    super(message);
    this.name = "SyncGroupError";
    this.kind = kind;
    this.details = details;
  }
}

export function isSyncGroupError(error: unknown): error is SyncGroupError {
  return error instanceof SyncGroupError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
