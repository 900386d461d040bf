/**
 * Validation & Healing Stage — the driver around healingMachine.ts.
 *
 * Per candidate: static check → schema check → execute. A failure is sent to
 * the healer role together with the schema and every earlier attempt, and
 * the repaired text is checked again, until the query runs or the retry
 * ceiling is reached. This is the only place the loop touches the gateway or
 * the graph store.
 */

import type {
  CandidateQuery,
  SubTask,
  ValidationAttempt,
  ValidationOutcome,
} from "@shared/pipelineSchemas";
import type { PipelineConfig } from "../_core/config";
import { PipelineAbortedError, errorMessage, throwIfAborted } from "../_core/errors";
import { describeVocabulary, type GraphStore, type SchemaVocabulary } from "../graph/graphStore";
import type { ModelGateway } from "../llm/modelGateway";
import { initialState, transition, type Failure, type HealingEvent, type HealingState } from "./healingMachine";
import { checkSchema, checkSyntax, cleanQueryText } from "./queryChecks";

export interface ValidationStageDeps {
  gateway: ModelGateway;
  graphStore: GraphStore;
  vocabulary: SchemaVocabulary;
  config: Pick<PipelineConfig, "maxRetries" | "timeouts" | "readOnlyQueries">;
  signal?: AbortSignal;
}

// ── One attempt ─────────────────────────────────────────────────────────────

/**
 * Check and execute one query text. Resolves to the event the state machine
 * consumes; rejects only on cancellation.
 */
export async function runAttempt(queryText: string, deps: ValidationStageDeps): Promise<HealingEvent> {
  const syntax = checkSyntax(queryText, { readOnly: deps.config.readOnlyQueries });
  if (!syntax.ok) {
    return { type: "attempt-failed", failure: { status: syntax.status, message: syntax.message } };
  }

  const schema = checkSchema(queryText, deps.vocabulary);
  if (!schema.ok) {
    return { type: "attempt-failed", failure: { status: schema.status, message: schema.message } };
  }

  try {
    const { rows, executionTimeMs } = await deps.graphStore.execute(queryText, {
      timeoutMs: deps.config.timeouts.query,
      signal: deps.signal,
      readOnly: deps.config.readOnlyQueries,
    });
    return { type: "attempt-succeeded", rows, executionTimeMs };
  } catch (err) {
    if (err instanceof PipelineAbortedError) throw err;
    throwIfAborted(deps.signal);
    // Timeouts land here too and are healed like any other execution error
    return { type: "attempt-failed", failure: { status: "EXECUTION_ERROR", message: errorMessage(err) } };
  }
}

// ── Healing ─────────────────────────────────────────────────────────────────

const HEALER_SYSTEM_PROMPT = `You repair Cypher queries for a Neo4j graph database.
You receive a query, the error it produced, and the graph schema.
Return ONLY the corrected Cypher query: no explanation, no markdown fences.
Keep the intent of the original query. Use only labels, relationship types and properties from the schema, spelled exactly as shown.`;

function buildHealPrompt(
  queryText: string,
  failure: Failure,
  subTask: SubTask | undefined,
  attempts: readonly ValidationAttempt[],
  vocabulary: SchemaVocabulary
): string {
  const sections = [
    `## Graph schema\n${describeVocabulary(vocabulary)}`,
    ...(subTask ? [`## What the query must retrieve\n${subTask.description}`] : []),
    `## Query\n${queryText}`,
    `## Error (${failure.status})\n${failure.message}`,
  ];

  const earlier = attempts.slice(0, -1);
  if (earlier.length > 0) {
    const lines = earlier.map(
      a => `Attempt ${a.attempt} (${a.status}${a.errorMessage ? `: ${a.errorMessage}` : ""}):\n${a.queryText}`
    );
    sections.push(`## Earlier attempts that also failed — do not repeat them\n${lines.join("\n\n")}`);
  }
  return sections.join("\n\n");
}

/**
 * Ask the healer role for a replacement query. Any failure becomes a
 * `heal-failed` event so the attempt still counts.
 */
async function requestHeal(
  state: Extract<HealingState, { tag: "healing" }>,
  subTask: SubTask | undefined,
  attempts: readonly ValidationAttempt[],
  deps: ValidationStageDeps
): Promise<HealingEvent> {
  try {
    const reply = await deps.gateway.generate(
      "healer",
      buildHealPrompt(state.queryText, state.failure, subTask, attempts, deps.vocabulary),
      { system: HEALER_SYSTEM_PROMPT, signal: deps.signal }
    );
    const queryText = cleanQueryText(reply);
    if (!queryText) {
      return { type: "heal-failed", reason: "healer returned no query" };
    }
    return { type: "healed", queryText };
  } catch (err) {
    if (err instanceof PipelineAbortedError) throw err;
    return { type: "heal-failed", reason: errorMessage(err) };
  }
}

// ── Loop ────────────────────────────────────────────────────────────────────

function failureSignature(attempt: ValidationAttempt): string {
  return `${attempt.status}|${attempt.errorMessage ?? ""}`;
}

/**
 * Run the bounded validate-and-heal loop for one candidate.
 */
export async function validateCandidate(
  candidate: CandidateQuery,
  subTask: SubTask | undefined,
  deps: ValidationStageDeps
): Promise<ValidationOutcome> {
  const { maxRetries } = deps.config;
  const attempts: ValidationAttempt[] = [];
  let state: HealingState = initialState(candidate.queryText);

  while (state.tag === "pending" || state.tag === "healing") {
    throwIfAborted(deps.signal);

    if (state.tag === "pending") {
      const startTime = Date.now();
      const event = await runAttempt(state.queryText, deps);
      const attempt: ValidationAttempt = {
        attempt: state.attempt,
        queryText: state.queryText,
        status: event.type === "attempt-failed" ? event.failure.status : "VALID",
        durationMs: Date.now() - startTime,
        ...(event.type === "attempt-failed" ? { errorMessage: event.failure.message } : {}),
      };
      attempts.push(attempt);

      if (event.type === "attempt-failed") {
        console.warn(
          `[Validator] Sub-task ${candidate.subTaskId} attempt ${state.attempt} ${event.failure.status}: ${event.failure.message}`
        );
        const signature = failureSignature(attempt);
        if (attempts.slice(0, -1).some(a => failureSignature(a) === signature)) {
          console.warn(`[Validator] Sub-task ${candidate.subTaskId} repeated an earlier failure`);
        }
      }
      state = transition(state, event, maxRetries);
    } else {
      const event = await requestHeal(state, subTask, attempts, deps);
      if (event.type === "heal-failed") {
        console.warn(`[Validator] Sub-task ${candidate.subTaskId} healing failed, retrying same query: ${event.reason}`);
      } else if (event.type === "healed" && attempts.some(a => a.queryText === event.queryText)) {
        console.warn(`[Validator] Sub-task ${candidate.subTaskId} healer returned a query that was already tried`);
      }
      state = transition(state, event, maxRetries);
    }
  }

  if (state.tag === "valid") {
    console.log(
      `[Validator] Sub-task ${candidate.subTaskId} VALID after ${state.attempt} retr${state.attempt === 1 ? "y" : "ies"} (${state.rows.length} rows)`
    );
    return {
      subTaskId: candidate.subTaskId,
      status: "VALID",
      originalQuery: candidate.queryText,
      finalQuery: state.queryText,
      rows: state.rows,
      executionTimeMs: state.executionTimeMs,
      retryCount: state.attempt,
      attempts,
    };
  }

  console.error(
    `[Validator] Sub-task ${candidate.subTaskId} failed after ${state.attempt} retries: ${state.failure.status} ${state.failure.message}`
  );
  return {
    subTaskId: candidate.subTaskId,
    status: state.failure.status,
    originalQuery: candidate.queryText,
    finalQuery: state.queryText,
    errorMessage: state.failure.message,
    retryCount: state.attempt,
    attempts,
  };
}
