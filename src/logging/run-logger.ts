import type { RunLogLevel, RunLogRow } from "../types.js";

export interface RunLoggerStats {
  trace_event_count: number;
  trace_warning_count: number;
  trace_flush_error_count: number;
}

export type RunLogSink = (rows: RunLogRow[]) => Promise<void>;

export interface RunLoggerOptions {
  runId: string;
  traceRetentionHours: number;
  flushBatchSize: number;
  writeBatch: RunLogSink;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
}

const MAX_LOG_PAYLOAD_BYTES = 24_000;
const MAX_LOG_PAYLOAD_DEPTH = 4;
const MAX_LOG_ARRAY_ITEMS = 20;
const MAX_LOG_OBJECT_KEYS = 40;
const MAX_LOG_STRING_CHARS = 700;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function truncateForLog(value: unknown, depth: number): unknown {
  if (depth >= MAX_LOG_PAYLOAD_DEPTH) {
    return "[truncated_depth_limit]";
  }

  if (typeof value === "string") {
    return value.length <= MAX_LOG_STRING_CHARS ? value : `${value.slice(0, MAX_LOG_STRING_CHARS)}…`;
  }

  if (Array.isArray(value)) {
    const kept = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((entry) => truncateForLog(entry, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      kept.push(`[truncated_items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return kept;
  }

  if (isRecord(value)) {
    const keys = Object.keys(value);
    const output: Record<string, unknown> = {};
    for (const key of keys.slice(0, MAX_LOG_OBJECT_KEYS)) {
      output[key] = truncateForLog(value[key], depth + 1);
    }
    if (keys.length > MAX_LOG_OBJECT_KEYS) {
      output.__truncated_keys = keys.length - MAX_LOG_OBJECT_KEYS;
    }
    return output;
  }

  return value;
}

function safePayload(value: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!value) {
    return {};
  }

  let serialized: string;
  try {
    serialized = JSON.stringify(value);
  } catch (error) {
    return { payload_serialization_error: errorMessage(error) };
  }

  const parsed: unknown = JSON.parse(serialized);
  const normalized = isRecord(parsed) ? parsed : { value: parsed };
  const sizeBytes = Buffer.byteLength(serialized, "utf8");
  if (sizeBytes <= MAX_LOG_PAYLOAD_BYTES) {
    return normalized;
  }

  const truncated = truncateForLog(normalized, 0);
  return {
    __payload_truncated: true,
    __original_size_bytes: sizeBytes,
    ...(isRecord(truncated) ? truncated : { value: truncated }),
  };
}

/**
 * Structured run log. Every event is echoed as one JSON line and buffered;
 * the buffer is handed to the sink in batches. Sink failures are counted in
 * the stats and never interrupt the run.
 */
export class RunLogger {
  private readonly runId: string;
  private readonly retentionMs: number;
  private readonly flushBatchSize: number;
  private readonly writeBatch: RunLogSink;
  private readonly consoleWrite: (line: string) => void;
  private readonly now: () => Date;

  private readonly buffer: RunLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();
  private isFlushing = false;
  private lastFlushError: string | null = null;

  private readonly stats: RunLoggerStats = {
    trace_event_count: 0,
    trace_warning_count: 0,
    trace_flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.runId = options.runId;
    this.retentionMs = options.traceRetentionHours * 60 * 60 * 1000;
    this.flushBatchSize = Math.max(1, options.flushBatchSize);
    this.writeBatch = options.writeBatch;
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  getRunId(): string {
    return this.runId;
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  getLastFlushError(): string | null {
    return this.lastFlushError;
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row = this.createRow(level, stage, event, message, payload);
    this.writeLine(row);
    this.buffer.push(row);

    if (this.buffer.length >= this.flushBatchSize && !this.isFlushing) {
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

  async flush(reason = "manual"): Promise<void> {
    this.scheduleFlush(reason);
    await this.flushChain;

    while (this.buffer.length > 0) {
      this.scheduleFlush(`${reason}_drain`);
      await this.flushChain;
    }
  }

  private recordFlushError(error: unknown): void {
    this.stats.trace_flush_error_count += 1;
    this.lastFlushError = errorMessage(error);
  }

  private scheduleFlush(reason: string): void {
    this.flushChain = this.flushChain
      .then(() => this.flushInternal(reason))
      .catch((error: unknown) => this.recordFlushError(error));
  }

  private createRow(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): RunLogRow {
    const createdAt = this.now();

    this.stats.trace_event_count += 1;
    if (level === "warn" || level === "error") {
      this.stats.trace_warning_count += 1;
    }

    return {
      runId: this.runId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: safePayload(payload),
      timestamp: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.retentionMs).toISOString(),
    };
  }

  private writeLine(row: RunLogRow): void {
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
  }

  private async flushInternal(reason: string): Promise<void> {
    if (this.isFlushing || this.buffer.length === 0) {
      return;
    }

    this.isFlushing = true;
    const rows = this.buffer.splice(0, this.buffer.length);

    try {
      await this.writeBatch(rows);
    } catch (error) {
      this.recordFlushError(error);

      const failedRow = this.createRow(
        "error",
        "logging",
        "sink.flush.failed",
        "Failed to write buffered run logs; continuing execution.",
        {
          reason,
          row_count: rows.length,
          error_message: errorMessage(error),
        },
      );
      this.writeLine(failedRow);
    } finally {
      this.isFlushing = false;
      if (this.buffer.length >= this.flushBatchSize) {
        this.scheduleFlush("post_flush_threshold");
      }
    }
  }
}
