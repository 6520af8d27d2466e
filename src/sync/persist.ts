import type { Pool } from "pg";
import { getPool } from "../db/client.js";
import { chunk } from "../utils/collections.js";
import type {
  DispatchMode,
  GroupOutcome,
  GroupSyncResult,
  SyncDecision,
  SyncErrorKind,
  SyncRunFailure,
  SyncRunLogRow,
  SyncRunStatus,
} from "../types.js";

export interface SyncRunListItem {
  runId: string;
  runLabel: string | null;
  dryRun: boolean;
  dispatchMode: DispatchMode | null;
  status: SyncRunStatus;
  groupCount: number;
  counts: Partial<Record<GroupOutcome, number>>;
  failureCount: number;
  rulesVersion: string | null;
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
}

interface SyncRunRow {
  id: string;
  run_label: string | null;
  dry_run: boolean;
  dispatch_mode: DispatchMode | null;
  status: SyncRunStatus;
  group_count: number;
  counts: Partial<Record<GroupOutcome, number>> | null;
  failures: SyncRunFailure[] | null;
  rules_version: string | null;
  error_message: string | null;
  started_at: Date | string;
  finished_at: Date | string | null;
}

interface GroupResultRow {
  group_id: string;
  outcome: GroupOutcome;
  platform_id: string | null;
  handle: string | null;
  fingerprint: string | null;
  decision: SyncDecision | null;
  error_kind: SyncErrorKind | null;
  error_message: string | null;
  error_details: Record<string, unknown> | null;
  variant_count: number;
  metafield_count: number;
  media_count: number;
  attempts: number;
  warnings: string[] | null;
}

const GROUP_RESULT_COLUMN_COUNT = 15;
const RUN_LOG_COLUMN_COUNT = 9;
// Postgres caps one statement at 65535 bind parameters.
const GROUP_RESULT_BATCH_SIZE = 1000;
const RUN_LOG_BATCH_SIZE = 1000;

function toIsoString(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  return date.toISOString();
}

function placeholderRows(rowCount: number, columnCount: number, jsonColumns: Set<number>): string[] {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const cells: string[] = [];
    for (let column = 0; column < columnCount; column += 1) {
      const index = row * columnCount + column + 1;
      cells.push(jsonColumns.has(column) ? `$${index}::jsonb` : `$${index}`);
    }
    rows.push(`(${cells.join(", ")})`);
  }
  return rows;
}

function mapRunRow(row: SyncRunRow): SyncRunListItem {
  return {
    runId: row.id,
    runLabel: row.run_label,
    dryRun: row.dry_run,
    dispatchMode: row.dispatch_mode,
    status: row.status,
    groupCount: row.group_count,
    counts: row.counts ?? {},
    failureCount: row.failures?.length ?? 0,
    rulesVersion: row.rules_version,
    errorMessage: row.error_message,
    startedAt: toIsoString(row.started_at),
    finishedAt: row.finished_at ? toIsoString(row.finished_at) : null,
  };
}

export async function createSyncRun(input: {
  runLabel: string | null;
  dryRun: boolean;
  groupCount: number;
  rulesVersion: string;
}): Promise<{ runId: string; startedAt: string }> {
  const pool = getPool();
  const result = await pool.query<{ id: string; started_at: Date | string }>(
    `
      INSERT INTO sync_runs (run_label, dry_run, group_count, rules_version, status)
      VALUES ($1, $2, $3, $4, 'running')
      RETURNING id, started_at
    `,
    [input.runLabel, input.dryRun, input.groupCount, input.rulesVersion],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error("Failed to create sync run.");
  }
  return { runId: row.id, startedAt: toIsoString(row.started_at) };
}

export async function insertGroupResults(runId: string, results: GroupSyncResult[]): Promise<void> {
  const pool = getPool();
  for (const batch of chunk(results, GROUP_RESULT_BATCH_SIZE)) {
    await insertGroupResultBatch(pool, runId, batch);
  }
}

async function insertGroupResultBatch(
  pool: Pool,
  runId: string,
  results: GroupSyncResult[],
): Promise<void> {
  const values: unknown[] = [];
  for (const result of results) {
    values.push(
      runId,
      result.groupId,
      result.outcome,
      result.platformId,
      result.handle,
      result.fingerprint,
      result.decision,
      result.errorKind,
      result.errorMessage,
      result.errorDetails === null ? null : JSON.stringify(result.errorDetails),
      result.variantCount,
      result.metafieldCount,
      result.mediaCount,
      result.attempts,
      JSON.stringify(result.warnings),
    );
  }

  await pool.query(
    `
      INSERT INTO sync_group_results (
        run_id,
        group_id,
        outcome,
        platform_id,
        handle,
        fingerprint,
        decision,
        error_kind,
        error_message,
        error_details,
        variant_count,
        metafield_count,
        media_count,
        attempts,
        warnings
      )
      VALUES ${placeholderRows(results.length, GROUP_RESULT_COLUMN_COUNT, new Set([9, 14])).join(", ")}
      ON CONFLICT (run_id, group_id) DO UPDATE SET
        outcome = EXCLUDED.outcome,
        platform_id = EXCLUDED.platform_id,
        handle = EXCLUDED.handle,
        fingerprint = EXCLUDED.fingerprint,
        decision = EXCLUDED.decision,
        error_kind = EXCLUDED.error_kind,
        error_message = EXCLUDED.error_message,
        error_details = EXCLUDED.error_details,
        variant_count = EXCLUDED.variant_count,
        metafield_count = EXCLUDED.metafield_count,
        media_count = EXCLUDED.media_count,
        attempts = EXCLUDED.attempts,
        warnings = EXCLUDED.warnings
    `,
    values,
  );
}

export async function finalizeSyncRun(input: {
  runId: string;
  status: Exclude<SyncRunStatus, "running">;
  dispatchMode: DispatchMode | null;
  groupCount: number;
  counts: Record<GroupOutcome, number>;
  failures: SyncRunFailure[];
  errorMessage: string | null;
}): Promise<string> {
  const pool = getPool();
  const result = await pool.query<{ finished_at: Date | string }>(
    `
      UPDATE sync_runs
      SET status = $2,
          dispatch_mode = $3,
          group_count = $4,
          counts = $5::jsonb,
          failures = $6::jsonb,
          error_message = $7,
          finished_at = NOW()
      WHERE id = $1
      RETURNING finished_at
    `,
    [
      input.runId,
      input.status,
      input.dispatchMode,
      input.groupCount,
      JSON.stringify(input.counts),
      JSON.stringify(input.failures),
      input.errorMessage,
    ],
  );

  const row = result.rows[0];
  return row ? toIsoString(row.finished_at) : new Date().toISOString();
}

export async function insertRunLogBatch(rows: SyncRunLogRow[]): Promise<void> {
  const pool = getPool();
  for (const batch of chunk(rows, RUN_LOG_BATCH_SIZE)) {
    await insertRunLogRows(pool, batch);
  }
}

async function insertRunLogRows(pool: Pool, rows: SyncRunLogRow[]): Promise<void> {
  const values: unknown[] = [];
  for (const row of rows) {
    values.push(
      row.runId,
      row.seq,
      row.level,
      row.stage,
      row.event,
      row.message,
      JSON.stringify(row.payload),
      row.timestamp,
      row.expiresAt,
    );
  }

  await pool.query(
    `
      INSERT INTO sync_run_logs (run_id, seq, level, stage, event, message, payload, logged_at, expires_at)
      VALUES ${placeholderRows(rows.length, RUN_LOG_COLUMN_COUNT, new Set([6])).join(", ")}
      ON CONFLICT (run_id, seq) DO NOTHING
    `,
    values,
  );
}

export async function cleanupExpiredRunLogs(): Promise<number> {
  const pool = getPool();
  const result = await pool.query("DELETE FROM sync_run_logs WHERE expires_at <= NOW()");
  return result.rowCount ?? 0;
}

export async function listSyncRuns(limit: number): Promise<SyncRunListItem[]> {
  const pool = getPool();
  const result = await pool.query<SyncRunRow>(
    `
      SELECT
        id,
        run_label,
        dry_run,
        dispatch_mode,
        status,
        group_count,
        counts,
        failures,
        rules_version,
        error_message,
        started_at,
        finished_at
      FROM sync_runs
      ORDER BY started_at DESC
      LIMIT $1
    `,
    [limit],
  );

  return result.rows.map(mapRunRow);
}

export async function getSyncRunResults(
  runId: string,
): Promise<{ run: SyncRunListItem; results: GroupSyncResult[] } | null> {
  const pool = getPool();
  const runResult = await pool.query<SyncRunRow>(
    `
      SELECT
        id,
        run_label,
        dry_run,
        dispatch_mode,
        status,
        group_count,
        counts,
        failures,
        rules_version,
        error_message,
        started_at,
        finished_at
      FROM sync_runs
      WHERE id = $1
    `,
    [runId],
  );

  const runRow = runResult.rows[0];
  if (!runRow) {
    return null;
  }

  const groupResult = await pool.query<GroupResultRow>(
    `
      SELECT
        group_id,
        outcome,
        platform_id,
        handle,
        fingerprint,
        decision,
        error_kind,
        error_message,
        error_details,
        variant_count,
        metafield_count,
        media_count,
        attempts,
        warnings
      FROM sync_group_results
      WHERE run_id = $1
      ORDER BY group_id ASC
    `,
    [runId],
  );

  return {
    run: mapRunRow(runRow),
    results: groupResult.rows.map((row) => ({
      groupId: row.group_id,
      outcome: row.outcome,
      platformId: row.platform_id,
      handle: row.handle,
      fingerprint: row.fingerprint,
      decision: row.decision,
      errorKind: row.error_kind,
      errorMessage: row.error_message,
      errorDetails: row.error_details,
      variantCount: row.variant_count,
      metafieldCount: row.metafield_count,
      mediaCount: row.media_count,
      attempts: row.attempts,
      warnings: row.warnings ?? [],
    })),
  };
}
