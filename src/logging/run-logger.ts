import type { RunLogLevel, SyncRunLogRow } from "../types.js";

export interface RunLoggerStats {
  trace_event_count: number;
  trace_remote_event_count: number;
  trace_warn_count: number;
  trace_error_count: number;
  trace_flush_error_count: number;
}

interface RunLoggerOptions {
  runId: string;
  traceRetentionHours: number;
  flushBatchSize: number;
  insertBatch: (rows: SyncRunLogRow[]) => Promise<void>;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
}

const MAX_PAYLOAD_BYTES = 16_000;
const MAX_PAYLOAD_DEPTH = 5;
const MAX_ARRAY_ITEMS = 25;
const MAX_OBJECT_KEYS = 40;
const MAX_STRING_CHARS = 500;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function limitValue(value: unknown, depth: number): unknown {
  if (typeof value === "string") {
    return value.length <= MAX_STRING_CHARS ? value : `${value.slice(0, MAX_STRING_CHARS)}…`;
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (depth >= MAX_PAYLOAD_DEPTH) {
    return "[truncated_depth_limit]";
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((entry) => limitValue(entry, depth + 1));
    if (value.length > MAX_ARRAY_ITEMS) {
      items.push(`[truncated_items:${value.length - MAX_ARRAY_ITEMS}]`);
    }
    return items;
  }

  const entries = Object.entries(value);
  const output: Record<string, unknown> = {};
  for (const [key, entry] of entries.slice(0, MAX_OBJECT_KEYS)) {
    output[key] = limitValue(entry, depth + 1);
  }
  if (entries.length > MAX_OBJECT_KEYS) {
    output.__truncated_keys = entries.length - MAX_OBJECT_KEYS;
  }
  return output;
}

/** JSON-safe copy of a payload, shrunk when its serialized form is too large for one log row. */
function toLogPayload(payload: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!payload) {
    return {};
  }

  let serialized: string;
  try {
    serialized = JSON.stringify(payload);
  } catch {
    return { payload_serialization_error: true };
  }

  const parsed: unknown = JSON.parse(serialized);
  const normalized = isPlainRecord(parsed) ? parsed : { value: parsed };
  const sizeBytes = Buffer.byteLength(serialized, "utf8");
  if (sizeBytes <= MAX_PAYLOAD_BYTES) {
    return normalized;
  }

  const limited = limitValue(normalized, 0);
  return {
    __payload_truncated: true,
    __original_size_bytes: sizeBytes,
    ...(isPlainRecord(limited) ? limited : { value: limited }),
  };
}

/**
 * Writes one JSON line per event to the console and buffers the same rows for the run ledger. Ledger
 * writes are chained so at most one batch is in flight; a failed batch is reported, never rethrown.
 */
export class RunLogger {
  private readonly runId: string;
  private readonly retentionMs: number;
  private readonly flushBatchSize: number;
  private readonly insertBatch: (rows: SyncRunLogRow[]) => Promise<void>;
  private readonly consoleWrite: (line: string) => void;
  private readonly now: () => Date;

  private buffer: SyncRunLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();

  private readonly stats: RunLoggerStats = {
    trace_event_count: 0,
    trace_remote_event_count: 0,
    trace_warn_count: 0,
    trace_error_count: 0,
    trace_flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.runId = options.runId;
    this.retentionMs = options.traceRetentionHours * 60 * 60 * 1000;
    this.flushBatchSize = Math.max(1, options.flushBatchSize);
    this.insertBatch = options.insertBatch;
    // eslint-disable-next-line no-console
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row = this.record(level, stage, event, message, payload);
    this.buffer.push(row);

    if (this.buffer.length >= this.flushBatchSize) {
      this.scheduleFlush("threshold");
    }
  }

  debug(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("debug", stage, event, message, payload);
  }

  info(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("info", stage, event, message, payload);
  }

  warn(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("warn", stage, event, message, payload);
  }

  error(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("error", stage, event, message, payload);
  }

  /** Resolves once every row logged so far has been handed to the ledger (or reported as failed). */
  async flush(reason = "manual"): Promise<void> {
    do {
      this.scheduleFlush(reason);
      await this.flushChain;
    } while (this.buffer.length > 0);
  }

  private scheduleFlush(reason: string): void {
    this.flushChain = this.flushChain
      .then(() => this.writeBatch(reason))
      .catch(() => {
        this.stats.trace_flush_error_count += 1;
      });
  }

  private record(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): SyncRunLogRow {
    const createdAt = this.now();

    this.stats.trace_event_count += 1;
    if (event.startsWith("shopify.")) {
      this.stats.trace_remote_event_count += 1;
    }
    if (level === "warn") {
      this.stats.trace_warn_count += 1;
    } else if (level === "error") {
      this.stats.trace_error_count += 1;
    }

    const row: SyncRunLogRow = {
      runId: this.runId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: toLogPayload(payload),
      timestamp: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.retentionMs).toISOString(),
    };

    this.consoleWrite(
      JSON.stringify({
        timestamp: row.timestamp,
        run_id: row.runId,
        seq: row.seq,
        level: row.level,
        stage: row.stage,
        event: row.event,
        message: row.message,
        payload: row.payload,
      }),
    );
    return row;
  }

  private async writeBatch(reason: string): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }

    const rows = this.buffer;
    this.buffer = [];

    try {
      await this.insertBatch(rows);
    } catch (error) {
      this.stats.trace_flush_error_count += 1;
      const failedRow = this.record(
        "error",
        "ledger",
        "ledger.flush.failed",
        "Failed to write buffered run logs; the sync continues.",
        {
          reason,
          row_count: rows.length,
          first_seq: rows[0]?.seq ?? null,
          error_message: error instanceof Error ? error.message : String(error),
        },
      );

      try {
        await this.insertBatch([failedRow]);
      } catch {
        this.stats.trace_flush_error_count += 1;
      }
    }
  }
}
