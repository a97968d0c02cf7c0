import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { RunLogRow } from "../types.js";
import type { RunLogSink } from "./run-logger.js";

export function runLogFilePath(outputDir: string, runId: string): string {
  return path.join(outputDir, `run_logs_${runId}.jsonl`);
}

/** Appends log rows as JSON lines to `<outputDir>/run_logs_<runId>.jsonl`. */
export function createJsonlLogSink(outputDir: string, runId: string): RunLogSink {
  const filePath = runLogFilePath(outputDir, runId);
  let ready: Promise<string | undefined> | null = null;

  return async (rows: RunLogRow[]) => {
    if (rows.length === 0) {
      return;
    }
    if (!ready) {
      ready = mkdir(outputDir, { recursive: true });
    }
    await ready;
    await appendFile(filePath, `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`, "utf8");
  };
}

export function createMemoryLogSink(): { sink: RunLogSink; rows: RunLogRow[] } {
  const rows: RunLogRow[] = [];
  return {
    rows,
    sink: async (batch) => {
      rows.push(...batch);
    },
  };
}
