import pLimit from "p-limit";
import type { CatalogEntityBuild } from "../catalog/variant-builder.js";
import type { RunLogger } from "../logging/run-logger.js";
import {
  TERMINAL_BULK_STATUSES,
  type BulkLineResult,
  type BulkOperationState,
  type CatalogPlatform,
  type UpsertRequest,
} from "../platform/platform.js";
import type {
  CatalogEntity,
  DispatchMode,
  GroupOutcome,
  GroupSyncResult,
  GroupSyncState,
  RemoteFieldError,
  RemoteState,
  SyncDecision,
  SyncErrorKind,
  SyncRunFailure,
  SyncRunStatus,
} from "../types.js";
import { errorMessage, isSyncGroupError } from "./errors.js";
import { decide, fingerprint } from "./fingerprint.js";
import type { TokenBucket } from "./rate-limiter.js";
import { runWithRetry, type Outcome, type RetryPolicy, type RetryResult } from "./retry.js";
import { validateEntity } from "./validation.js";

const ALLOWED_TRANSITIONS: Record<GroupSyncState, GroupSyncState[]> = {
  pending: ["validating", "failed"],
  validating: ["skipped", "dispatching", "failed"],
  dispatching: ["succeeded", "partial_failure", "failed"],
  skipped: [],
  succeeded: [],
  partial_failure: [],
  failed: [],
};

export interface OrchestratorOptions {
  /** Null for dry runs, which never reach the remote platform. */
  platform: CatalogPlatform | null;
  limiter: TokenBucket;
  logger: RunLogger;
  prepare: (groupId: string) => Promise<CatalogEntityBuild>;
  retryPolicy: RetryPolicy;
  concurrency: number;
  bulkThreshold: number;
  bulkPollIntervalMs: number;
  bulkPollTimeoutMs: number;
  publishOnCreate: boolean;
  dryRun: boolean;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface OrchestrationResult {
  dispatchMode: DispatchMode;
  results: GroupSyncResult[];
  cancelled: boolean;
}

interface FailureInfo {
  kind: SyncErrorKind;
  message: string;
  details: Record<string, unknown> | null;
}

class GroupRun {
  state: GroupSyncState = "pending";
  entity: CatalogEntity | null = null;
  fingerprint: string | null = null;
  decision: SyncDecision | null = null;
  remote: RemoteState | null = null;
  platformId: string | null = null;
  attempts = 0;
  warnings: string[] = [];
  result: GroupSyncResult | null = null;

  constructor(
    readonly groupId: string,
    private readonly logger: RunLogger,
  ) {}

  transition(next: GroupSyncState, payload: Record<string, unknown> = {}): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal group state transition ${this.state} -> ${next} for ${this.groupId}`);
    }
    this.logger.debug("sync", "group.state", `Group ${this.groupId}: ${this.state} -> ${next}.`, {
      group_id: this.groupId,
      from: this.state,
      to: next,
      ...payload,
    });
    this.state = next;
  }

  finish(outcome: GroupOutcome, failure: FailureInfo | null = null): GroupSyncResult {
    this.result = {
      groupId: this.groupId,
      outcome,
      platformId: this.platformId ?? this.remote?.platformId ?? null,
      handle: this.entity?.handle ?? null,
      fingerprint: this.fingerprint,
      decision: this.decision,
      errorKind: failure?.kind ?? null,
      errorMessage: failure?.message ?? null,
      errorDetails: failure?.details ?? null,
      variantCount: this.entity?.variants.length ?? 0,
      metafieldCount: this.entity?.metafields.length ?? 0,
      mediaCount: this.entity?.media.length ?? 0,
      attempts: this.attempts,
      warnings: [...this.warnings],
    };
    return this.result;
  }

  fail(failure: FailureInfo): GroupSyncResult {
    if (ALLOWED_TRANSITIONS[this.state].includes("failed")) {
      this.transition("failed", { error_kind: failure.kind });
    }
    const level = failure.kind === "cancelled" ? "warn" : "error";
    this.logger.log(level, "sync", "group.failed", `Group ${this.groupId} failed: ${failure.message}`, {
      group_id: this.groupId,
      error_kind: failure.kind,
      error_details: failure.details,
    });
    return this.finish("failed", failure);
  }
}

function failureFromOutcome<T>(retry: RetryResult<T>, callKind: string): FailureInfo | null {
  const { outcome } = retry;
  if (outcome.kind === "success") {
    return null;
  }
  if (outcome.kind === "retryable") {
    return {
      kind: "transient_remote",
      message: `${callKind} still failing after ${retry.attempts} attempts: ${outcome.reason}`,
      details: { reason: outcome.reason, attempts: retry.attempts, ...(outcome.details ?? {}) },
    };
  }
  return {
    kind: "remote_rejection",
    message: `${callKind} rejected: ${outcome.reason}`,
    details: { reason: outcome.reason, ...(outcome.details ?? {}) },
  };
}

function describeUserErrors(userErrors: RemoteFieldError[]): string {
  return userErrors
    .map((error) => (error.field && error.field.length > 0 ? `${error.field.join(".")}: ${error.message}` : error.message))
    .join("; ");
}

export function summarizeOutcomes(results: GroupSyncResult[]): Record<GroupOutcome, number> {
  const counts: Record<GroupOutcome, number> = {
    created: 0,
    updated: 0,
    no_op: 0,
    partial_failure: 0,
    failed: 0,
    dry_run: 0,
  };
  for (const result of results) {
    counts[result.outcome] += 1;
  }
  return counts;
}

export function listFailures(results: GroupSyncResult[]): SyncRunFailure[] {
  return results
    .filter((result) => result.errorKind !== null)
    .map((result) => ({
      groupId: result.groupId,
      errorKind: result.errorKind ?? "unexpected",
      message: result.errorMessage ?? "",
    }));
}

export function resolveRunStatus(
  results: GroupSyncResult[],
  cancelled: boolean,
): Exclude<SyncRunStatus, "running"> {
  if (cancelled) {
    return "cancelled";
  }
  return results.some((result) => result.outcome === "failed" || result.outcome === "partial_failure")
    ? "completed_with_failures"
    : "completed";
}

/**
 * Drives every group through validating and dispatching. Groups never throw out of here: each ends as
 * a GroupSyncResult, in the order the ids were given.
 */
export class SyncOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? (() => Date.now());
  }

  selectDispatchMode(groupCount: number): DispatchMode {
    if (this.options.dryRun) {
      return "dry_run";
    }
    return groupCount >= this.options.bulkThreshold ? "bulk" : "individual";
  }

  private get platform(): CatalogPlatform {
    if (!this.options.platform) {
      throw new Error("No remote platform is configured for this run.");
    }
    return this.options.platform;
  }

  private isCancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private async callRemote<T>(
    group: GroupRun | null,
    callKind: string,
    context: Record<string, unknown>,
    operation: () => Promise<Outcome<T>>,
  ): Promise<RetryResult<T>> {
    const { logger, limiter } = this.options;
    const result = await runWithRetry<T>({
      stage: "shopify",
      callKind,
      policy: this.options.retryPolicy,
      context,
      telemetry: (event) => logger.log(event.level, event.stage, event.event, event.message, event.payload),
      sleep: this.sleep,
      random: this.options.random,
      now: this.now,
      operation: async () => {
        await limiter.acquire();
        return operation();
      },
    });
    if (group) {
      group.attempts += result.attempts;
    }
    return result;
  }

  async run(groupIds: string[]): Promise<OrchestrationResult> {
    const { logger } = this.options;
    const dispatchMode = this.selectDispatchMode(groupIds.length);
    const groups = groupIds.map((groupId) => new GroupRun(groupId, logger));
    const bulkQueue: GroupRun[] = [];

    logger.info("sync", "orchestrator.started", "Sync orchestration started.", {
      group_count: groupIds.length,
      dispatch_mode: dispatchMode,
      concurrency: this.options.concurrency,
    });

    const limit = pLimit(this.options.concurrency);
    await Promise.all(
      groups.map((group) =>
        limit(async () => {
          try {
            await this.processGroup(group, dispatchMode, bulkQueue);
          } catch (error) {
            if (!group.result) {
              group.fail({ kind: "unexpected", message: errorMessage(error), details: null });
            }
          }
        }),
      ),
    );

    if (bulkQueue.length > 0) {
      await this.dispatchBulk(bulkQueue);
    }

    const results = groups.map(
      (group) =>
        group.result ?? group.fail({ kind: "unexpected", message: "Group finished without a result.", details: null }),
    );
    const cancelled = this.isCancelled();

    logger.info("sync", "orchestrator.completed", "Sync orchestration completed.", {
      dispatch_mode: dispatchMode,
      cancelled,
      counts: summarizeOutcomes(results),
    });

    return { dispatchMode, results, cancelled };
  }

  private async processGroup(group: GroupRun, mode: DispatchMode, bulkQueue: GroupRun[]): Promise<void> {
    if (this.isCancelled()) {
      group.fail({ kind: "cancelled", message: "Run was cancelled before the group started.", details: null });
      return;
    }

    group.transition("validating");
    let built: CatalogEntityBuild;
    try {
      built = await this.options.prepare(group.groupId);
    } catch (error) {
      if (isSyncGroupError(error)) {
        group.fail({ kind: error.kind, message: error.message, details: error.details });
        return;
      }
      throw error;
    }

    const entityFingerprint = fingerprint(built.entity);
    group.entity = built.entity;
    group.fingerprint = entityFingerprint;
    group.warnings.push(...built.warnings);
    for (const warning of built.warnings) {
      this.options.logger.warn("build", "group.warning", warning, { group_id: group.groupId });
    }

    const issues = validateEntity(built.entity);
    if (issues.length > 0) {
      group.fail({
        kind: "validation",
        message: issues.map((issue) => `${issue.field}: ${issue.message}`).join("; "),
        details: { issues },
      });
      return;
    }

    if (mode === "dry_run") {
      group.transition("skipped", { reason: "dry_run" });
      group.finish("dry_run");
      return;
    }

    const stateRead = await this.callRemote(group, "fetch_remote_state", { group_id: group.groupId }, () =>
      this.platform.fetchRemoteState(built.entity.handle),
    );
    if (stateRead.outcome.kind !== "success") {
      group.fail(failureFromOutcome(stateRead, "fetch_remote_state") ?? unexpectedFailure());
      return;
    }

    group.remote = stateRead.outcome.value;
    group.decision = decide({ entity: built.entity, fingerprint: entityFingerprint }, group.remote);

    if (group.decision === "no_op") {
      group.transition("skipped", { reason: "no_op" });
      group.finish("no_op");
      return;
    }

    if (this.isCancelled()) {
      group.fail({ kind: "cancelled", message: "Run was cancelled before the group was dispatched.", details: null });
      return;
    }

    group.transition("dispatching", { decision: group.decision, mode });
    if (mode === "bulk") {
      bulkQueue.push(group);
      return;
    }

    const upsert = await this.callRemote(group, "product_set", { group_id: group.groupId, decision: group.decision }, () =>
      this.platform.upsertEntity({ entity: built.entity, fingerprint: entityFingerprint }),
    );
    if (upsert.outcome.kind !== "success") {
      group.fail(failureFromOutcome(upsert, "product_set") ?? unexpectedFailure());
      return;
    }

    await this.completeDispatch(group, upsert.outcome.value.platformId, upsert.outcome.value.userErrors);
  }

  private async completeDispatch(
    group: GroupRun,
    platformId: string | null,
    userErrors: RemoteFieldError[],
  ): Promise<void> {
    const { logger } = this.options;

    if (userErrors.length > 0) {
      const failure: FailureInfo = {
        kind: "remote_rejection",
        message: describeUserErrors(userErrors),
        details: { user_errors: userErrors },
      };
      if (!platformId) {
        group.fail(failure);
        return;
      }

      group.platformId = platformId;
      group.transition("partial_failure", { platform_id: platformId });
      logger.warn("sync", "group.partial_failure", `Group ${group.groupId} was saved with field errors.`, {
        group_id: group.groupId,
        platform_id: platformId,
        user_errors: userErrors,
      });
      await this.clearFingerprint(group, platformId);
      group.finish("partial_failure", failure);
      return;
    }

    if (!platformId) {
      group.fail({ kind: "unexpected", message: "Platform returned no product id.", details: null });
      return;
    }

    group.platformId = platformId;
    group.transition("succeeded", { platform_id: platformId });
    const outcome: GroupOutcome = group.decision === "create" ? "created" : "updated";

    if (outcome === "created" && this.options.publishOnCreate) {
      await this.publish(group, platformId);
    }

    logger.info("sync", "group.succeeded", `Group ${group.groupId} ${outcome}.`, {
      group_id: group.groupId,
      platform_id: platformId,
      handle: group.entity?.handle ?? null,
    });
    group.finish(outcome);
  }

  private async publish(group: GroupRun, platformId: string): Promise<void> {
    const published = await this.callRemote(group, "publish", { group_id: group.groupId, platform_id: platformId }, () =>
      this.platform.publish(platformId),
    );

    let problem: string | null = null;
    if (published.outcome.kind !== "success") {
      problem = published.outcome.reason;
    } else if (published.outcome.value.userErrors.length > 0) {
      problem = describeUserErrors(published.outcome.value.userErrors);
    }

    if (problem !== null) {
      group.warnings.push(`Publishing to the current channel failed: ${problem}`);
      this.options.logger.warn("sync", "group.publish.failed", `Group ${group.groupId} could not be published.`, {
        group_id: group.groupId,
        platform_id: platformId,
        reason: problem,
      });
    }
  }

  /**
   * A product saved with field errors may already carry the new fingerprint; without it the next run
   * reads the product as changed and sends the full payload again.
   */
  private async clearFingerprint(group: GroupRun, platformId: string): Promise<void> {
    const cleared = await this.callRemote(
      group,
      "clear_fingerprint",
      { group_id: group.groupId, platform_id: platformId },
      () => this.platform.clearFingerprint(platformId),
    );

    let problem: string | null = null;
    if (cleared.outcome.kind !== "success") {
      problem = cleared.outcome.reason;
    } else if (cleared.outcome.value.userErrors.length > 0) {
      problem = describeUserErrors(cleared.outcome.value.userErrors);
    }

    if (problem !== null) {
      group.warnings.push(`Clearing the sync fingerprint failed: ${problem}`);
      this.options.logger.warn("sync", "group.fingerprint_clear.failed", `Group ${group.groupId} keeps its stored fingerprint.`, {
        group_id: group.groupId,
        platform_id: platformId,
        reason: problem,
      });
    }
  }

  private failAll(groups: GroupRun[], failure: FailureInfo): void {
    for (const group of groups) {
      if (!group.result) {
        group.fail(failure);
      }
    }
  }

  private async dispatchBulk(queue: GroupRun[]): Promise<void> {
    const { logger } = this.options;
    const platform = this.platform;

    if (this.isCancelled()) {
      this.failAll(queue, {
        kind: "cancelled",
        message: "Run was cancelled before the bulk operation started.",
        details: null,
      });
      return;
    }

    const entries: Array<{ group: GroupRun; request: UpsertRequest }> = [];
    for (const group of queue) {
      if (group.entity && group.fingerprint) {
        entries.push({ group, request: { entity: group.entity, fingerprint: group.fingerprint } });
      }
    }
    const requests = entries.map((entry) => entry.request);

    const started = await this.callRemote(null, "bulk_start", { group_count: requests.length }, () =>
      platform.startBulkUpsert(requests),
    );
    for (const group of queue) {
      group.attempts += started.attempts;
    }
    if (started.outcome.kind !== "success") {
      this.failAll(queue, failureFromOutcome(started, "bulk_start") ?? unexpectedFailure());
      return;
    }

    const operationId = started.outcome.value.operationId;
    logger.info("sync", "bulk.started", "Bulk operation started.", {
      operation_id: operationId,
      group_count: requests.length,
    });

    const finalState = await this.pollBulkOperation(queue, operationId);
    if (!finalState) {
      return;
    }

    const resultUrl = finalState.url ?? finalState.partialDataUrl;
    let lines: BulkLineResult[] = [];
    if (resultUrl) {
      const fetched = await this.callRemote(null, "bulk_results", { operation_id: operationId }, () =>
        platform.fetchBulkResults(resultUrl),
      );
      if (fetched.outcome.kind !== "success") {
        this.failAll(queue, failureFromOutcome(fetched, "bulk_results") ?? unexpectedFailure());
        return;
      }
      lines = fetched.outcome.value;
    }

    const byLine = new Map(lines.map((line) => [line.lineNumber, line]));
    for (const [index, { group }] of entries.entries()) {
      const line = byLine.get(index);
      if (line) {
        await this.completeDispatch(group, line.platformId, line.userErrors);
        continue;
      }

      const transient = finalState.errorCode === "INTERNAL_SERVER_ERROR" || finalState.errorCode === "TIMEOUT";
      group.fail({
        kind: finalState.status === "COMPLETED" ? "unexpected" : transient ? "transient_remote" : "remote_rejection",
        message: `Bulk operation ${operationId} ended ${finalState.status} without a result for this group.`,
        details: { operation_id: operationId, status: finalState.status, error_code: finalState.errorCode },
      });
    }
  }

  private async pollBulkOperation(queue: GroupRun[], operationId: string): Promise<BulkOperationState | null> {
    const { logger, bulkPollIntervalMs, bulkPollTimeoutMs } = this.options;
    const platform = this.platform;
    const deadline = this.now() + bulkPollTimeoutMs;

    for (;;) {
      const polled = await this.callRemote(null, "bulk_status", { operation_id: operationId }, () =>
        platform.getBulkOperation(operationId),
      );
      if (polled.outcome.kind !== "success") {
        this.failAll(queue, failureFromOutcome(polled, "bulk_status") ?? unexpectedFailure());
        return null;
      }

      const state = polled.outcome.value;
      logger.debug("sync", "bulk.polled", `Bulk operation ${state.status}.`, {
        operation_id: operationId,
        status: state.status,
        object_count: state.objectCount,
      });
      if (TERMINAL_BULK_STATUSES.has(state.status)) {
        return state;
      }

      const remainingMs = deadline - this.now();
      if (remainingMs <= 0) {
        this.failAll(queue, {
          kind: "transient_remote",
          message: `Bulk operation ${operationId} did not finish within ${bulkPollTimeoutMs}ms.`,
          details: { operation_id: operationId, status: state.status },
        });
        return null;
      }
      await this.sleep(Math.min(bulkPollIntervalMs, remainingMs));
    }
  }
}

function unexpectedFailure(): FailureInfo {
  return { kind: "unexpected", message: "Remote call ended without an outcome.", details: null };
}
