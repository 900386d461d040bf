/**
 * PipelineRun — the shared execution state of one request.
 *
 * Created at request entry with only the question and session context; each
 * stage writes its own section. Discarded once the response is returned.
 */

import { nanoid } from "nanoid";
import type {
  AnalysisReport,
  CandidateQuery,
  Degradation,
  PipelineStage,
  PipelineStep,
  PipelineTrace,
  QueryPlan,
  ResponseFraming,
  ValidationOutcome,
} from "@shared/pipelineSchemas";
import type { ConversationPair } from "../sessions/sessionStore";

export interface PipelineRun {
  readonly runId: string;
  readonly question: string;
  readonly detailedMode: boolean;
  readonly startedAt: number;
  readonly sessionId: string;
  history: ConversationPair[];
  plan?: QueryPlan;
  candidates: CandidateQuery[];
  /** Same length and order as `candidates` */
  outcomes: ValidationOutcome[];
  report?: AnalysisReport;
  errorCount: number;
  shouldEscalate: boolean;
  totalRetries: number;
  framing: ResponseFraming;
  degradations: Degradation[];
  steps: PipelineStep[];
}

export function createPipelineRun(input: { question: string; sessionId: string; detailedMode: boolean }): PipelineRun {
  return {
    runId: nanoid(12),
    question: input.question,
    detailedMode: input.detailedMode,
    startedAt: Date.now(),
    sessionId: input.sessionId,
    history: [],
    candidates: [],
    outcomes: [],
    errorCount: 0,
    shouldEscalate: false,
    totalRetries: 0,
    framing: "standard",
    degradations: [],
    steps: [],
  };
}

/**
 * Push a running step onto the activity feed; the returned function closes it.
 */
export function beginStep(
  run: PipelineRun,
  stage: PipelineStage,
  action: string,
  detail: string
): (status: Exclude<PipelineStep["status"], "running">, finalDetail?: string) => void {
  const step: PipelineStep = { stage, action, detail, status: "running", timestamp: Date.now() };
  run.steps.push(step);
  return (status, finalDetail) => {
    step.status = status;
    step.durationMs = Date.now() - step.timestamp;
    if (finalDetail !== undefined) step.detail = finalDetail;
  };
}

export function recordDegradation(run: PipelineRun, degradation: Degradation): void {
  run.degradations.push(degradation);
  const where = "subTaskId" in degradation ? ` (sub-task ${degradation.subTaskId})` : "";
  console.warn(`[Orchestrator] ${run.runId} ${degradation.kind}${where}: ${degradation.reason}`);
}

const FAILURE_CATEGORY = {
  SYNTAX_ERROR: "Syntax",
  SCHEMA_ERROR: "Schema",
  EXECUTION_ERROR: "Execution",
} as const;

export interface RouteDecision {
  framing: ResponseFraming;
  shouldEscalate: boolean;
}

/**
 * Branch after validation. Synthesis always runs; the outcome mix only decides
 * how the answer is framed and whether the run escalates.
 */
export function routeAfterValidation(outcomes: readonly ValidationOutcome[]): RouteDecision {
  const failed = outcomes.filter(o => o.status !== "VALID").length;
  const valid = outcomes.length - failed;

  if (failed === 0) return { framing: "standard", shouldEscalate: false };
  if (failed < valid) return { framing: "partial", shouldEscalate: true };
  return { framing: "failure-foreground", shouldEscalate: true };
}

/**
 * Store validation outcomes and derive the control fields.
 */
export function recordOutcomes(run: PipelineRun, outcomes: ValidationOutcome[]): RouteDecision {
  run.outcomes = outcomes;
  run.errorCount = outcomes.filter(o => o.status !== "VALID").length;
  run.totalRetries = outcomes.reduce((sum, o) => sum + o.retryCount, 0);

  for (const outcome of outcomes) {
    if (outcome.status !== "VALID") {
      recordDegradation(run, {
        kind: "ValidationFailed",
        subTaskId: outcome.subTaskId,
        category: FAILURE_CATEGORY[outcome.status],
        reason: outcome.errorMessage ?? outcome.status,
      });
    }
  }

  const decision = routeAfterValidation(outcomes);
  run.framing = decision.framing;
  run.shouldEscalate = decision.shouldEscalate;
  return decision;
}

export function buildTrace(run: PipelineRun, plan: QueryPlan): PipelineTrace {
  return {
    plan,
    subTaskOutcomes: run.outcomes.map(outcome => ({
      subTaskId: outcome.subTaskId,
      description: plan.subTasks.find(t => t.id === outcome.subTaskId)?.description ?? "",
      query: outcome.originalQuery,
      finalQuery: outcome.finalQuery,
      status: outcome.status,
      retryCount: outcome.retryCount,
      executionTimeMs: outcome.executionTimeMs ?? null,
      rowCount: outcome.rows?.length ?? 0,
      ...(outcome.errorMessage ? { errorMessage: outcome.errorMessage } : {}),
    })),
    totalRetries: run.totalRetries,
    steps: run.steps.map(step => ({ ...step })),
    durationMs: Date.now() - run.startedAt,
  };
}
