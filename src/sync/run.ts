import { getConfig, requireShopifyCredentials, type AppConfig } from "../config.js";
import { buildCatalogEntity } from "../catalog/variant-builder.js";
import { runMigrations } from "../db/migrate.js";
import { RunLogger } from "../logging/run-logger.js";
import { ManifestMediaSource, NoMediaSource, type MediaSource } from "../media/media-source.js";
import { ShopifyCatalogPlatform } from "../platform/shopify-client.js";
import { loadCatalogRules } from "../rules/load.js";
import { fetchAllGroupIds, fetchGroup } from "../source/warranty-repository.js";
import type { DispatchMode, GroupSyncResult, SyncRunSummary } from "../types.js";
import { errorMessage } from "./errors.js";
import { listFailures, resolveRunStatus, summarizeOutcomes, SyncOrchestrator } from "./orchestrator.js";
import {
  cleanupExpiredRunLogs,
  createSyncRun,
  finalizeSyncRun,
  insertGroupResults,
  insertRunLogBatch,
} from "./persist.js";
import { TokenBucket } from "./rate-limiter.js";

export interface RunSyncInput {
  groupIds?: string[];
  all?: boolean;
  dryRun?: boolean;
  runLabel?: string | null;
  mediaManifestPath?: string | null;
  signal?: AbortSignal;
}

function uniqueGroupIds(groupIds: string[]): string[] {
  return [...new Set(groupIds.map((groupId) => groupId.trim()).filter((groupId) => groupId.length > 0))];
}

async function resolveGroupIds(input: RunSyncInput): Promise<string[]> {
  const groupIds = input.all ? await fetchAllGroupIds() : uniqueGroupIds(input.groupIds ?? []);
  if (groupIds.length === 0) {
    throw new Error(input.all ? "The warranty database has no product groups." : "No group ids were given.");
  }
  return groupIds;
}

async function createMediaSource(manifestPath: string | null): Promise<MediaSource> {
  return manifestPath ? ManifestMediaSource.fromFile(manifestPath) : new NoMediaSource();
}

function createPlatform(config: AppConfig, dryRun: boolean): ShopifyCatalogPlatform | null {
  if (dryRun) {
    return null;
  }
  const credentials = requireShopifyCredentials(config);
  return new ShopifyCatalogPlatform({
    shopDomain: credentials.shopDomain,
    accessToken: credentials.accessToken,
    apiVersion: config.SHOPIFY_API_VERSION,
    timeoutMs: config.SHOPIFY_TIMEOUT_MS,
    locationId: config.SHOPIFY_LOCATION_ID ?? null,
  });
}

/**
 * One sync pass: resolve the groups, build and dispatch each one, record every result in the run ledger.
 * Group failures end up in the summary; only run-level failures (configuration, database) reject.
 */
export async function runSync(input: RunSyncInput): Promise<SyncRunSummary> {
  const config = getConfig();
  const dryRun = Boolean(input.dryRun);
  const runLabel = input.runLabel ?? null;

  await runMigrations();
  await cleanupExpiredRunLogs();

  const rules = loadCatalogRules();
  const groupIds = await resolveGroupIds(input);
  const { runId, startedAt } = await createSyncRun({
    runLabel,
    dryRun,
    groupCount: groupIds.length,
    rulesVersion: rules.version,
  });

  const logger = new RunLogger({
    runId,
    traceRetentionHours: config.TRACE_RETENTION_HOURS,
    flushBatchSize: config.TRACE_FLUSH_BATCH_SIZE,
    insertBatch: insertRunLogBatch,
  });

  logger.info("run", "run.started", "Sync run started.", {
    group_count: groupIds.length,
    dry_run: dryRun,
    run_label: runLabel,
    rules_version: rules.version,
  });

  let dispatchMode: DispatchMode | null = null;
  let results: GroupSyncResult[] = [];

  try {
    const platform = createPlatform(config, dryRun);
    const media = await createMediaSource(input.mediaManifestPath ?? config.MEDIA_MANIFEST_PATH ?? null);
    const limiter = new TokenBucket({
      ratePerSecond: config.RATE_LIMIT_PER_SECOND,
      burst: config.RATE_LIMIT_BURST,
    });

    const orchestrator = new SyncOrchestrator({
      platform,
      limiter,
      logger,
      prepare: async (groupId) => {
        const group = await fetchGroup(groupId);
        const references = await media.getValidatedMedia(group);
        return buildCatalogEntity(group, references, {
          maxHandleLength: config.MAX_HANDLE_LENGTH,
          vendor: config.PRODUCT_VENDOR ?? null,
          status: config.PRODUCT_STATUS,
          rules,
        });
      },
      retryPolicy: {
        maxRetries: config.SHOPIFY_MAX_RETRIES,
        baseMs: config.SHOPIFY_RETRY_BASE_MS,
        maxMs: config.SHOPIFY_RETRY_MAX_MS,
      },
      concurrency: config.SYNC_CONCURRENCY,
      bulkThreshold: config.BULK_THRESHOLD,
      bulkPollIntervalMs: config.BULK_POLL_INTERVAL_MS,
      bulkPollTimeoutMs: config.BULK_POLL_TIMEOUT_MS,
      publishOnCreate: config.SHOPIFY_PUBLISH_ON_CREATE,
      dryRun,
      signal: input.signal,
    });

    const orchestration = await orchestrator.run(groupIds);
    dispatchMode = orchestration.dispatchMode;
    results = orchestration.results;
    await insertGroupResults(runId, results);

    const status = resolveRunStatus(results, orchestration.cancelled);
    const counts = summarizeOutcomes(results);
    const failures = listFailures(results);

    logger.info("run", "run.completed", "Sync run completed.", {
      status,
      dispatch_mode: dispatchMode,
      counts,
      failure_count: failures.length,
      limiter: limiter.getStats(),
      shopify: platform?.getStats() ?? null,
      logger: logger.getStats(),
    });
    await logger.flush("run_completed");

    const finishedAt = await finalizeSyncRun({
      runId,
      status,
      dispatchMode,
      groupCount: groupIds.length,
      counts,
      failures,
      errorMessage: null,
    });

    return {
      runId,
      runLabel,
      dryRun,
      dispatchMode,
      status,
      groupCount: groupIds.length,
      counts,
      failures,
      results,
      startedAt,
      finishedAt,
    };
  } catch (error) {
    logger.error("run", "run.failed", `Sync run failed: ${errorMessage(error)}`, {
      dispatch_mode: dispatchMode,
      result_count: results.length,
    });
    await logger.flush("run_failed");
    await finalizeSyncRun({
      runId,
      status: "failed",
      dispatchMode,
      groupCount: groupIds.length,
      counts: summarizeOutcomes(results),
      failures: listFailures(results),
      errorMessage: errorMessage(error),
    });
    throw error;
  }
}
