import type { RunLogLevel } from "../types.js";

export type Outcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; reason: string; waitHintMs: number | null; details?: Record<string, unknown> }
  | { kind: "fatal"; reason: string; details?: Record<string, unknown> };

export type FailedOutcome = Exclude<Outcome<never>, { kind: "success" }>;

export function success<T>(value: T): Outcome<T> {
  return { kind: "success", value };
}

export function retryable(
  reason: string,
  waitHintMs: number | null = null,
  details?: Record<string, unknown>,
): FailedOutcome {
  return { kind: "retryable", reason, waitHintMs, details };
}

export function fatal(reason: string, details?: Record<string, unknown>): FailedOutcome {
  return { kind: "fatal", reason, details };
}

export interface RetryPolicy {
  maxRetries: number;
  baseMs: number;
  maxMs: number;
}

export interface RetryTelemetryEvent {
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload?: Record<string, unknown>;
}

export type RetryTelemetryCallback = (event: RetryTelemetryEvent) => void;

export interface RetryResult<T> {
  outcome: Outcome<T>;
  attempts: number;
  /** True when the last outcome was retryable but no attempts were left. */
  exhausted: boolean;
}

interface RunWithRetryInput<T> {
  stage: string;
  callKind: string;
  policy: RetryPolicy;
  operation: (attempt: number) => Promise<Outcome<T>>;
  telemetry?: RetryTelemetryCallback;
  context?: Record<string, unknown>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export function computeBackoffMs(attempt: number, policy: RetryPolicy, random: () => number): number {
  const baseDelay = Math.min(policy.maxMs, policy.baseMs * 2 ** (attempt - 1));
  return Math.round(baseDelay * (0.8 + random() * 0.4));
}

/** An explicit wait hint from the remote side replaces the computed backoff. */
export function retryDelayMs(
  attempt: number,
  waitHintMs: number | null,
  policy: RetryPolicy,
  random: () => number,
): number {
  if (waitHintMs !== null && Number.isFinite(waitHintMs) && waitHintMs >= 0) {
    return Math.round(waitHintMs);
  }
  return computeBackoffMs(attempt, policy, random);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function runWithRetry<T>(input: RunWithRetryInput<T>): Promise<RetryResult<T>> {
  const totalAttempts = input.policy.maxRetries + 1;
  const sleep = input.sleep ?? defaultSleep;
  const random = input.random ?? Math.random;
  const now = input.now ?? Date.now;
  const emit = (event: RetryTelemetryEvent): void => input.telemetry?.(event);
  const context = input.context ?? {};

  emit({
    level: "debug",
    stage: input.stage,
    event: `${input.stage}.call.started`,
    message: `Remote call started (${input.callKind}).`,
    payload: { call_kind: input.callKind, total_attempts: totalAttempts, ...context },
  });

  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    const attemptStartedAt = now();
    const outcome = await input.operation(attempt);

    if (outcome.kind === "success") {
      emit({
        level: "debug",
        stage: input.stage,
        event: `${input.stage}.call.succeeded`,
        message: `Remote call succeeded (${input.callKind}).`,
        payload: {
          call_kind: input.callKind,
          attempt,
          elapsed_ms: now() - attemptStartedAt,
          ...context,
        },
      });
      return { outcome, attempts: attempt, exhausted: false };
    }

    emit({
      level: "warn",
      stage: input.stage,
      event: `${input.stage}.attempt.failed`,
      message: `Remote attempt failed (${input.callKind}): ${outcome.reason}`,
      payload: {
        call_kind: input.callKind,
        attempt,
        total_attempts: totalAttempts,
        retryable: outcome.kind === "retryable",
        elapsed_ms: now() - attemptStartedAt,
        details: outcome.details ?? null,
        ...context,
      },
    });

    if (outcome.kind === "fatal" || attempt === totalAttempts) {
      emit({
        level: "error",
        stage: input.stage,
        event: `${input.stage}.call.failed`,
        message: `Remote call failed (${input.callKind}).`,
        payload: {
          call_kind: input.callKind,
          attempt,
          total_attempts: totalAttempts,
          reason: outcome.reason,
          ...context,
        },
      });
      return { outcome, attempts: attempt, exhausted: outcome.kind === "retryable" };
    }

    const delayMs = retryDelayMs(attempt, outcome.waitHintMs, input.policy, random);
    emit({
      level: "warn",
      stage: input.stage,
      event: `${input.stage}.retry.scheduled`,
      message: `Remote retry scheduled (${input.callKind}).`,
      payload: {
        call_kind: input.callKind,
        attempt,
        total_attempts: totalAttempts,
        delay_ms: delayMs,
        wait_hint_ms: outcome.waitHintMs,
        ...context,
      },
    });

    await sleep(delayMs);
  }

  throw new Error("unreachable_retry_state");
}
