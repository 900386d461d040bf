/**
 * Run Log — one JSON line per finished pipeline run, in a file per UTC day
 * (`pipeline-YYYY-MM-DD.jsonl`). Enabled by RUN_LOG_DIR.
 *
 * Writing never fails the run: errors are logged and dropped.
 */

import fs from "fs";
import path from "path";
import type {
  AnalysisReport,
  Complexity,
  Degradation,
  ResponseFraming,
  ValidationOutcome,
  ValidationStatus,
} from "@shared/pipelineSchemas";
import { errorMessage } from "../_core/errors";

export interface RunLogQuery {
  subTaskId: number;
  originalQuery: string;
  finalQuery: string;
  status: ValidationStatus;
  retryCount: number;
  rowCount: number;
  executionTimeMs: number | null;
  errorMessage?: string;
}

export interface RunLogEntry {
  timestamp: string;
  runId: string;
  sessionId: string;
  question: string;
  complexity: Complexity;
  framing: ResponseFraming;
  queries: RunLogQuery[];
  degradations: Degradation[];
  summary: string;
  durationMs: number;
}

export function toRunLogQueries(outcomes: readonly ValidationOutcome[]): RunLogQuery[] {
  return outcomes.map(outcome => ({
    subTaskId: outcome.subTaskId,
    originalQuery: outcome.originalQuery,
    finalQuery: outcome.finalQuery,
    status: outcome.status,
    retryCount: outcome.retryCount,
    rowCount: outcome.rows?.length ?? 0,
    executionTimeMs: outcome.executionTimeMs ?? null,
    ...(outcome.errorMessage ? { errorMessage: outcome.errorMessage } : {}),
  }));
}

export function runLogEntry(fields: Omit<RunLogEntry, "timestamp" | "queries" | "summary"> & {
  outcomes: readonly ValidationOutcome[];
  report: AnalysisReport;
  finishedAt?: Date;
}): RunLogEntry {
  const { outcomes, report, finishedAt, ...rest } = fields;
  return {
    timestamp: (finishedAt ?? new Date()).toISOString(),
    ...rest,
    queries: toRunLogQueries(outcomes),
    summary: report.summary,
  };
}

export class RunLog {
  private dirReady: Promise<void> | null = null;

  constructor(readonly directory: string) {}

  fileFor(timestamp: string): string {
    return path.join(this.directory, `pipeline-${timestamp.substring(0, 10)}.jsonl`);
  }

  /** Resolves once the line is written or the failure has been logged. */
  async record(entry: RunLogEntry): Promise<void> {
    try {
      if (!this.dirReady) {
        this.dirReady = fs.promises.mkdir(this.directory, { recursive: true }).then(() => undefined);
      }
      await this.dirReady;
      await fs.promises.appendFile(this.fileFor(entry.timestamp), `${JSON.stringify(entry)}\n`, "utf8");
    } catch (err) {
      this.dirReady = null;
      console.warn(`[RunLog] Could not record run ${entry.runId}: ${errorMessage(err)}`);
    }
  }
}
