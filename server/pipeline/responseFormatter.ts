/**
 * Markdown rendering of a finished run.
 */

import type { AnalysisReport, PipelineTrace, ResponseFraming, ValidationOutcome } from "@shared/pipelineSchemas";

export interface FormatInput {
  report: AnalysisReport;
  framing: ResponseFraming;
  outcomes: readonly ValidationOutcome[];
  detailedMode: boolean;
  trace?: PipelineTrace;
}

const IMPORTANCE_MARK: Record<AnalysisReport["insights"][number]["importance"], string> = {
  high: "🔴",
  medium: "🟡",
  low: "🟢",
};

export function failureNotice(outcomes: readonly ValidationOutcome[]): string | null {
  const failed = outcomes.filter(o => o.status !== "VALID");
  if (failed.length === 0) return null;
  const lines = failed.map(o => `- Sub-task ${o.subTaskId}: ${o.status}${o.errorMessage ? ` — ${o.errorMessage}` : ""}`);
  return `> ⚠️ **${failed.length} of ${outcomes.length} queries could not be completed.** The answer may be incomplete.\n\n${lines.join("\n")}`;
}

function renderReport(report: AnalysisReport): string {
  const parts = [`## Summary\n\n${report.summary}`];

  if (report.insights.length > 0) {
    const lines = report.insights.map(
      i => `- ${IMPORTANCE_MARK[i.importance]} **${i.title}**${i.description ? `: ${i.description}` : ""}`
    );
    parts.push(`## Key Insights\n\n${lines.join("\n")}`);
  }

  if (report.recommendations.length > 0) {
    const sorted = [...report.recommendations].sort((a, b) => a.priority - b.priority);
    const lines = sorted.map(
      (r, i) => `${i + 1}. **[P${r.priority}]** ${r.action}${r.rationale ? ` — ${r.rationale}` : ""}`
    );
    parts.push(`## Recommendations\n\n${lines.join("\n")}`);
  }

  if (report.followUpQuestions.length > 0) {
    parts.push(`## You might also want to ask\n\n${report.followUpQuestions.map(q => `- ${q}`).join("\n")}`);
  }

  if (report.dataQualityNotes.length > 0) {
    parts.push(`## Data Notes\n\n${report.dataQualityNotes.map(n => `- ${n}`).join("\n")}`);
  }

  return parts.join("\n\n");
}

function renderDetails(trace: PipelineTrace): string {
  const rows = trace.subTaskOutcomes.map(
    o =>
      `| ${o.subTaskId} | ${o.status} | ${o.retryCount} | ${o.rowCount} | ${o.executionTimeMs === null ? "—" : `${o.executionTimeMs}ms`} |`
  );
  const queries = trace.subTaskOutcomes.map(o => `**Sub-task ${o.subTaskId}**\n\n\`\`\`cypher\n${o.finalQuery}\n\`\`\``);
  return [
    "## Execution Details",
    `Complexity: ${trace.plan.complexity} · Sub-tasks: ${trace.plan.subTasks.length} · Retries: ${trace.totalRetries} · Duration: ${trace.durationMs}ms`,
    "| Sub-task | Status | Retries | Rows | Time |\n|---|---|---|---|---|\n" + rows.join("\n"),
    ...queries,
  ].join("\n\n");
}

/**
 * Render the answer. The failure notice leads when failures are not a
 * minority and follows the report otherwise.
 */
export function formatResponse(input: FormatInput): string {
  const parts: string[] = [];
  const notice = failureNotice(input.outcomes);

  if (notice && input.framing === "failure-foreground") parts.push(notice);
  parts.push(renderReport(input.report));
  if (notice && input.framing !== "failure-foreground") parts.push(notice);

  if (input.detailedMode && input.trace) {
    parts.push(renderDetails(input.trace));
  }

  return parts.join("\n\n");
}
