/**
 * Pipeline Orchestrator — one question in, one answer out.
 *
 *   plan → generate (per sub-task) → validate & heal (per candidate)
 *        → route → synthesize → format → persist
 *
 * Runs for the same session are serialized by the SessionQueue. The caller's
 * AbortSignal reaches every gateway and graph call; a cancelled run persists
 * nothing. The question/answer pair is appended exactly once, after the answer
 * has been formatted; the session summary is refreshed and the run log
 * written after that.
 */

import { nanoid } from "nanoid";
import type { PipelineResponse, SubTask, ValidationOutcome } from "@shared/pipelineSchemas";
import type { AppConfig } from "../_core/config";
import { SessionNotFoundError, errorMessage, throwIfAborted } from "../_core/errors";
import type { GraphStore } from "../graph/graphStore";
import type { ModelGateway } from "../llm/modelGateway";
import { refreshSummary } from "../sessions/conversationSummary";
import { titleFromQuestion, type SessionStore } from "../sessions/sessionStore";
import { planQuestion } from "./planStage";
import { beginStep, buildTrace, createPipelineRun, recordDegradation, recordOutcomes } from "./pipelineState";
import { generateCandidate, type GenerationResult } from "./queryGenerationStage";
import { formatResponse } from "./responseFormatter";
import { runLogEntry, type RunLog } from "./runLog";
import type { SessionQueue } from "./sessionQueue";
import { runWithDependencies } from "./subtaskScheduler";
import { synthesize } from "./synthesisStage";
import { validateCandidate } from "./validationStage";

export interface PipelineServices {
  gateway: ModelGateway;
  graphStore: GraphStore;
  sessionStore: SessionStore;
  sessionQueue: SessionQueue;
  config: AppConfig;
  /** Set when RUN_LOG_DIR is configured */
  runLog?: RunLog;
}

export interface PipelineRequest {
  question: string;
  /** Omit to start a new session */
  sessionId?: string;
  detailedMode?: boolean;
}

/**
 * Answer a question. Throws SessionNotFoundError for an unknown session id,
 * SessionBusyError under the reject policy, and PipelineAbortedError when the
 * signal fires; every other failure degrades inside the run.
 */
export async function runPipeline(
  services: PipelineServices,
  request: PipelineRequest,
  signal?: AbortSignal
): Promise<PipelineResponse> {
  throwIfAborted(signal);

  let sessionId = request.sessionId;
  let sessionTitle: string | undefined;
  if (sessionId) {
    const session = await services.sessionStore.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
  } else {
    // Created by the final append, so an abandoned run leaves no empty session behind
    sessionId = nanoid();
    sessionTitle = titleFromQuestion(request.question);
  }

  const target = sessionId;
  if (services.sessionQueue.isBusy(target)) {
    console.log(`[Orchestrator] Session ${target} busy (${services.sessionQueue.depth(target)} in line)`);
  }
  return services.sessionQueue.run(
    target,
    async () => {
      // The session may have been deleted while this run waited
      if (request.sessionId && !(await services.sessionStore.getSession(target))) {
        throw new SessionNotFoundError(target);
      }
      return executeRun(
        services,
        { question: request.question, sessionId: target, sessionTitle, detailedMode: request.detailedMode ?? false },
        signal
      );
    },
    signal
  );
}

async function executeRun(
  services: PipelineServices,
  input: { question: string; sessionId: string; sessionTitle?: string; detailedMode: boolean },
  signal?: AbortSignal
): Promise<PipelineResponse> {
  const { gateway, graphStore, sessionStore } = services;
  const settings = services.config.pipeline;
  const run = createPipelineRun(input);
  console.log(`[Orchestrator] ${run.runId} started (session ${run.sessionId}): "${run.question.substring(0, 120)}"`);

  run.history = await sessionStore.recentExchanges(run.sessionId, settings.historyPairs);
  const conversationSummary = await sessionStore.getSummary(run.sessionId);
  const vocabulary = await graphStore.schemaVocabulary();
  throwIfAborted(signal);

  // ── Plan ──────────────────────────────────────────────────────────────────
  let closeStep = beginStep(run, "plan", "Planning", "Breaking the question into sub-tasks");
  const planned = await planQuestion(run.question, run.history, {
    gateway,
    vocabulary,
    conversationSummary: conversationSummary?.text,
    signal,
  });
  const plan = planned.plan;
  run.plan = plan;
  if (planned.degradedReason) {
    recordDegradation(run, { kind: "PlanningDegraded", reason: planned.degradedReason });
    closeStep("degraded", "Using a single-step plan");
  } else {
    closeStep("complete", `${plan.complexity} plan with ${plan.subTasks.length} sub-task(s)`);
  }

  // ── Generate ──────────────────────────────────────────────────────────────
  closeStep = beginStep(run, "generate", "Writing queries", `${plan.subTasks.length} sub-task(s)`);
  const generated = await runWithDependencies<SubTask, GenerationResult>(
    plan.subTasks,
    (subTask, dependencies) =>
      generateCandidate(
        subTask,
        plan,
        dependencies.map(d => d.candidate),
        { gateway, vocabulary, readOnly: settings.readOnlyQueries, signal }
      ),
    { maxConcurrent: settings.maxConcurrentSubtasks, signal }
  );
  run.candidates = generated.map(g => g.candidate);
  for (const result of generated) {
    if (result.degradedReason) {
      recordDegradation(run, {
        kind: "GenerationDegraded",
        subTaskId: result.candidate.subTaskId,
        reason: result.degradedReason,
      });
    }
  }
  const fallbacks = run.candidates.filter(c => c.origin === "fallback").length;
  closeStep(
    fallbacks > 0 ? "degraded" : "complete",
    fallbacks > 0
      ? `${run.candidates.length} queries (${fallbacks} default)`
      : `${run.candidates.length} queries`
  );

  // ── Validate & heal ───────────────────────────────────────────────────────
  closeStep = beginStep(run, "validate", "Validating queries", `${run.candidates.length} candidate(s)`);
  const subTasksById = new Map(plan.subTasks.map(t => [t.id, t]));
  const validationTasks = run.candidates.map(candidate => ({
    id: candidate.subTaskId,
    dependsOn: subTasksById.get(candidate.subTaskId)?.dependsOn ?? [],
    candidate,
  }));
  const outcomes: ValidationOutcome[] = await runWithDependencies(
    validationTasks,
    task =>
      validateCandidate(task.candidate, subTasksById.get(task.id), {
        gateway,
        graphStore,
        vocabulary,
        config: settings,
        signal,
      }),
    { maxConcurrent: settings.maxConcurrentSubtasks, signal }
  );
  const route = recordOutcomes(run, outcomes);
  const validCount = outcomes.length - run.errorCount;
  closeStep(
    run.errorCount > 0 ? "degraded" : "complete",
    `${validCount}/${outcomes.length} valid, ${run.totalRetries} retr${run.totalRetries === 1 ? "y" : "ies"}`
  );
  console.log(
    `[Orchestrator] ${run.runId} route: ${route.framing}${route.shouldEscalate ? " (escalate)" : ""}`
  );

  // ── Synthesize ────────────────────────────────────────────────────────────
  closeStep = beginStep(run, "synthesize", "Analyzing results", "Writing the report");
  const synthesis = await synthesize(run.question, plan, outcomes, {
    gateway,
    rowSampleThreshold: settings.rowSampleThreshold,
    signal,
  });
  run.report = synthesis.report;
  if (synthesis.degradedReason) {
    recordDegradation(run, { kind: "SynthesisDegraded", reason: synthesis.degradedReason });
    closeStep("degraded", "Row-count summary");
  } else {
    closeStep("complete", synthesis.synthesized ? "Report written" : "No data found");
  }

  // ── Format & persist ──────────────────────────────────────────────────────
  const trace = run.detailedMode ? buildTrace(run, plan) : undefined;
  const answerText = formatResponse({
    report: synthesis.report,
    framing: run.framing,
    outcomes,
    detailedMode: run.detailedMode,
    trace,
  });

  throwIfAborted(signal);
  await sessionStore.appendExchange(run.sessionId, {
    question: run.question,
    answerText,
    trace,
    sessionTitle: input.sessionTitle,
  });

  try {
    await refreshSummary(sessionStore, gateway, run.sessionId, settings, signal);
  } catch (err) {
    console.warn(`[Sessions] Summary refresh failed for ${run.sessionId}: ${errorMessage(err)}`);
  }

  const durationMs = Date.now() - run.startedAt;
  console.log(
    `[Orchestrator] ${run.runId} finished in ${durationMs}ms (${validCount}/${outcomes.length} valid, ${run.degradations.length} degradation(s))`
  );
  if (services.runLog) {
    void services.runLog.record(
      runLogEntry({
        runId: run.runId,
        sessionId: run.sessionId,
        question: run.question,
        complexity: plan.complexity,
        framing: run.framing,
        degradations: [...run.degradations],
        durationMs,
        outcomes,
        report: synthesis.report,
      })
    );
  }

  return {
    sessionId: run.sessionId,
    answerText,
    report: synthesis.report,
    ...(trace ? { trace } : {}),
    metadata: {
      runId: run.runId,
      complexity: plan.complexity,
      framing: run.framing,
      queriesExecuted: outcomes.length,
      validQueries: validCount,
      totalRetries: run.totalRetries,
      shouldEscalate: run.shouldEscalate,
      degradations: [...run.degradations],
      durationMs,
    },
  };
}
