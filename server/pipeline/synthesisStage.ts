/**
 * Synthesis Stage — validated results → AnalysisReport.
 *
 * When no valid query returned any rows the report is built locally and the
 * synthesizer role is never called. Otherwise the synthesizer sees per
 * sub-task results with large row sets sampled down, plus statistics computed
 * over every row; if it fails, a row-count summary is returned instead.
 */

import {
  analysisReportSchema,
  type AnalysisReport,
  type QueryPlan,
  type Row,
  type ValidationOutcome,
} from "@shared/pipelineSchemas";
import { computeStatistics, formatStatistics } from "../analysis/datasetStatistics";
import { PipelineAbortedError, errorMessage } from "../_core/errors";
import type { ModelGateway, StructuredTarget } from "../llm/modelGateway";

export interface SynthesisStageDeps {
  gateway: ModelGateway;
  rowSampleThreshold: number;
  signal?: AbortSignal;
}

export interface SynthesisResult {
  report: AnalysisReport;
  /** Whether the synthesizer role produced the report */
  synthesized: boolean;
  degradedReason?: string;
}

/** Serialized length above which a single row is truncated in the prompt */
export const MAX_ROW_CHARS = 500;

export const REPORT_OUTPUT_SCHEMA = {
  type: "object",
  properties: {
    summary: { type: "string" },
    insights: {
      type: "array",
      items: {
        type: "object",
        properties: {
          title: { type: "string" },
          description: { type: "string" },
          importance: { type: "string", enum: ["high", "medium", "low"] },
        },
        required: ["title", "description", "importance"],
      },
    },
    recommendations: {
      type: "array",
      items: {
        type: "object",
        properties: {
          action: { type: "string" },
          rationale: { type: "string" },
          priority: { type: "integer", minimum: 1, maximum: 5 },
        },
        required: ["action", "rationale", "priority"],
      },
    },
    followUpQuestions: { type: "array", items: { type: "string" } },
    visualizationHints: {
      type: "array",
      items: {
        type: "object",
        properties: {
          type: { type: "string", enum: ["table", "map", "chart", "stats"] },
          dataKey: { type: "string" },
          config: { type: "object" },
        },
        required: ["type"],
      },
    },
    dataQualityNotes: { type: "array", items: { type: "string" } },
  },
  required: ["summary", "insights", "recommendations", "followUpQuestions"],
} as const;

const REPORT_TARGET: StructuredTarget<AnalysisReport> = {
  name: "AnalysisReport",
  schema: analysisReportSchema,
  jsonSchema: REPORT_OUTPUT_SCHEMA,
};

// ── Row sampling ────────────────────────────────────────────────────────────

/**
 * Evenly spaced sample of `threshold` rows; the first row is always kept.
 */
export function sampleRows(rows: readonly Row[], threshold: number): Row[] {
  if (rows.length <= threshold) return [...rows];
  const sample: Row[] = [];
  for (let i = 0; i < threshold; i++) {
    sample.push(rows[Math.floor((i * rows.length) / threshold)]);
  }
  return sample;
}

export function truncateRow(row: Row, maxChars = MAX_ROW_CHARS): string {
  const serialized = JSON.stringify(row);
  return serialized.length > maxChars ? `${serialized.substring(0, maxChars)}…` : serialized;
}

function totalRows(outcomes: readonly ValidationOutcome[]): number {
  return outcomes.reduce((sum, o) => sum + (o.status === "VALID" ? (o.rows?.length ?? 0) : 0), 0);
}

// ── Deterministic reports ───────────────────────────────────────────────────

function describeSubTask(plan: QueryPlan, subTaskId: number): string {
  const task = plan.subTasks.find(t => t.id === subTaskId);
  return task ? `Sub-task ${subTaskId} (${task.description})` : `Sub-task ${subTaskId}`;
}

/**
 * Report for a run in which no valid query returned rows. One data note per sub-task.
 */
export function noDataReport(question: string, plan: QueryPlan, outcomes: readonly ValidationOutcome[]): AnalysisReport {
  const failed = outcomes.filter(o => o.status !== "VALID");
  const notes = outcomes.map(o =>
    o.status === "VALID"
      ? `${describeSubTask(plan, o.subTaskId)}: the query ran but matched no records.`
      : `${describeSubTask(plan, o.subTaskId)}: ${o.status} after ${o.retryCount} retries — ${o.errorMessage ?? "no error message"}`
  );

  const summary =
    failed.length === 0
      ? `No matching data was found for "${question}".`
      : failed.length === outcomes.length
        ? `No data could be retrieved for "${question}": none of the ${outcomes.length} queries could be completed.`
        : `No matching data was found for "${question}". ${failed.length} of ${outcomes.length} queries could not be completed.`;

  return {
    summary,
    insights: [],
    recommendations: [
      {
        action: "Rephrase the question using names as they appear in the data",
        rationale: "The entity names or filters in the question did not match any records.",
        priority: 2,
      },
    ],
    followUpQuestions: [],
    visualizationHints: [],
    dataQualityNotes: notes,
  };
}

/**
 * Report used when the synthesizer role fails.
 */
export function rowCountReport(outcomes: readonly ValidationOutcome[], reason: string): AnalysisReport {
  const valid = outcomes.filter(o => o.status === "VALID");
  return {
    summary: `Retrieved ${totalRows(outcomes)} records from ${valid.length} of ${outcomes.length} queries.`,
    insights: valid.map(o => ({
      title: `Sub-task ${o.subTaskId}`,
      description: `${o.rows?.length ?? 0} records returned.`,
      importance: "medium" as const,
    })),
    recommendations: [],
    followUpQuestions: [],
    visualizationHints: [{ type: "table", dataKey: "results", config: {} }],
    dataQualityNotes: [`Automatic analysis was unavailable: ${reason}`],
  };
}

// ── Prompt ──────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You are a data analyst. You receive a user's question, the plan used to answer it, and the results of the graph queries that were run.
Write an analysis grounded ONLY in the given results. Never invent records or numbers.
When a result carries Statistics, they were computed over ALL of its rows: use them for counts, ranges, averages, outliers and risk distribution instead of the row sample.

## Output
- summary: 2-4 sentences that directly answer the question, citing counts and names from the results.
- insights: notable findings, each with a short title, a description and importance (high/medium/low).
- recommendations: concrete next steps with a rationale and a priority from 1 (most urgent) to 5.
- followUpQuestions: 2-3 natural next questions.
- visualizationHints: how the results are best shown (table, map, chart or stats).
- dataQualityNotes: caveats such as sampled results or sub-tasks that failed.`;

function buildUserPrompt(
  question: string,
  plan: QueryPlan,
  outcomes: readonly ValidationOutcome[],
  threshold: number
): string {
  const sections = outcomes.map(outcome => {
    const heading = `### ${describeSubTask(plan, outcome.subTaskId)}`;
    if (outcome.status !== "VALID") {
      return `${heading}\nStatus: ${outcome.status} — this part of the question could not be answered (${outcome.errorMessage ?? "unknown error"}).`;
    }
    const rows = outcome.rows ?? [];
    const sample = sampleRows(rows, threshold);
    const sampledNote = sample.length < rows.length ? ` (showing ${sample.length} evenly sampled)` : "";
    const rowLines = sample.map(row => truncateRow(row));
    const stats = computeStatistics(rows);
    const statsLine = stats ? `\nStatistics: ${formatStatistics(stats)}` : "";
    return `${heading}\nQuery: ${outcome.finalQuery}\nRows: ${rows.length}${sampledNote}${statsLine}\n${rowLines.join("\n") || "(no rows)"}`;
  });

  return `## Question\n${question}\n\n## Plan (${plan.complexity})\n${plan.rationale || "(no rationale)"}\n\n## Results\n${sections.join("\n\n")}`;
}

// ── Stage ───────────────────────────────────────────────────────────────────

export async function synthesize(
  question: string,
  plan: QueryPlan,
  outcomes: readonly ValidationOutcome[],
  deps: SynthesisStageDeps
): Promise<SynthesisResult> {
  if (totalRows(outcomes) === 0) {
    console.log("[Synthesizer] No rows retrieved, emitting no-data report");
    return { report: noDataReport(question, plan, outcomes), synthesized: false };
  }

  try {
    const report = await deps.gateway.generateStructured(
      "synthesizer",
      buildUserPrompt(question, plan, outcomes, deps.rowSampleThreshold),
      { system: SYSTEM_PROMPT, signal: deps.signal },
      REPORT_TARGET
    );
    console.log(
      `[Synthesizer] Report with ${report.insights.length} insight(s), ${report.recommendations.length} recommendation(s)`
    );
    return { report, synthesized: true };
  } catch (err) {
    if (err instanceof PipelineAbortedError) throw err;
    const reason = errorMessage(err);
    console.warn(`[Synthesizer] Falling back to row-count summary: ${reason}`);
    return { report: rowCountReport(outcomes, reason), synthesized: false, degradedReason: reason };
  }
}
