import axios from "axios";
import { z } from "zod";
import { fatal, retryable, type FailedOutcome } from "../sync/retry.js";
import type { RemoteFieldError } from "../types.js";

const RETRYABLE_NETWORK_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EAI_AGAIN", "ERR_NETWORK"]);

export const graphQLErrorSchema = z.object({
  message: z.string(),
  extensions: z.object({ code: z.string().optional() }).passthrough().optional(),
});

export const throttleExtensionsSchema = z
  .object({
    cost: z
      .object({
        requestedQueryCost: z.number().optional(),
        throttleStatus: z
          .object({
            maximumAvailable: z.number(),
            currentlyAvailable: z.number(),
            restoreRate: z.number(),
          })
          .optional(),
      })
      .optional(),
  })
  .passthrough();

export const userErrorSchema = z.object({
  field: z.array(z.string()).nullable().optional(),
  message: z.string(),
  code: z.string().nullable().optional(),
});

export type GraphQLError = z.infer<typeof graphQLErrorSchema>;
export type ThrottleExtensions = z.infer<typeof throttleExtensionsSchema>;

export function toRemoteFieldErrors(errors: Array<z.infer<typeof userErrorSchema>>): RemoteFieldError[] {
  return errors.map((error) => ({
    field: error.field ?? null,
    message: error.message,
    code: error.code ?? null,
  }));
}

/** `Retry-After` in seconds or as an HTTP date; null when absent or unreadable. */
export function parseRetryAfterMs(value: unknown, now: number = Date.now()): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, Math.round(value * 1000));
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

/** Time until the leaky bucket holds enough points for the rejected query. */
export function throttleWaitMs(extensions: ThrottleExtensions | undefined): number | null {
  const requested = extensions?.cost?.requestedQueryCost;
  const status = extensions?.cost?.throttleStatus;
  if (requested === undefined || !status || status.restoreRate <= 0) {
    return null;
  }

  const deficit = requested - status.currentlyAvailable;
  if (deficit <= 0) {
    return 0;
  }
  return Math.ceil((deficit / status.restoreRate) * 1000);
}

export function classifyHttpStatus(status: number, retryAfter: unknown, now?: number): FailedOutcome | null {
  if (status === 429) {
    return retryable("rate_limited", parseRetryAfterMs(retryAfter, now), { status });
  }
  if (status >= 500) {
    return retryable(`server_error_${status}`, parseRetryAfterMs(retryAfter, now), { status });
  }
  if (status >= 400) {
    return fatal(`http_error_${status}`, { status });
  }
  return null;
}

export function classifyGraphQLErrors(
  errors: GraphQLError[],
  extensions: ThrottleExtensions | undefined,
): FailedOutcome | null {
  if (errors.length === 0) {
    return null;
  }

  const messages = errors.map((error) => error.message);
  if (errors.some((error) => error.extensions?.code === "THROTTLED")) {
    return retryable("throttled", throttleWaitMs(extensions), { messages });
  }
  if (errors.some((error) => error.extensions?.code === "INTERNAL_SERVER_ERROR")) {
    return retryable("graphql_internal_error", null, { messages });
  }
  return fatal(`graphql_error: ${messages.join("; ")}`, { messages });
}

/**
 * Axios is configured never to reject on status, so anything thrown here is a transport failure.
 * Errors that did not come from axios are rethrown.
 */
export function classifyTransportError(error: unknown): FailedOutcome {
  if (axios.isAxiosError(error)) {
    const code = error.code ?? "UNKNOWN";
    if (RETRYABLE_NETWORK_CODES.has(code) || !error.response) {
      return retryable(`network_error_${code}`, null, { code, message: error.message });
    }
    return fatal(`transport_error_${code}`, { code, message: error.message });
  }
  throw error;
}
