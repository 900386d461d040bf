/**
 * Bounded self-healing loop as an explicit state machine.
 *
 *   pending ──ok──▶ valid
 *      │
 *      └─fail─▶ healing ──healed / heal-failed──▶ pending (attempt + 1)
 *      └─fail (attempt ≥ maxRetries)─▶ failed
 *
 * `transition` is pure; the effectful driver lives in validationStage.ts.
 * `valid` and `failed` absorb every event.
 */

import type { FailureStatus, Row } from "@shared/pipelineSchemas";

export interface Failure {
  status: FailureStatus;
  message: string;
}

export type HealingState =
  | { tag: "pending"; attempt: number; queryText: string; lastFailure?: Failure }
  | { tag: "healing"; attempt: number; queryText: string; failure: Failure }
  | { tag: "valid"; attempt: number; queryText: string; rows: Row[]; executionTimeMs: number }
  | { tag: "failed"; attempt: number; queryText: string; failure: Failure };

export type HealingEvent =
  | { type: "attempt-succeeded"; rows: Row[]; executionTimeMs: number }
  | { type: "attempt-failed"; failure: Failure }
  | { type: "healed"; queryText: string }
  | { type: "heal-failed"; reason: string };

export function initialState(queryText: string): HealingState {
  return { tag: "pending", attempt: 0, queryText };
}

export function isTerminal(state: HealingState): state is Extract<HealingState, { tag: "valid" | "failed" }> {
  return state.tag === "valid" || state.tag === "failed";
}

export function transition(state: HealingState, event: HealingEvent, maxRetries: number): HealingState {
  switch (state.tag) {
    case "valid":
    case "failed":
      return state;

    case "pending":
      if (event.type === "attempt-succeeded") {
        return {
          tag: "valid",
          attempt: state.attempt,
          queryText: state.queryText,
          rows: event.rows,
          executionTimeMs: event.executionTimeMs,
        };
      }
      if (event.type === "attempt-failed") {
        return state.attempt >= maxRetries
          ? { tag: "failed", attempt: state.attempt, queryText: state.queryText, failure: event.failure }
          : { tag: "healing", attempt: state.attempt, queryText: state.queryText, failure: event.failure };
      }
      return state;

    case "healing":
      if (event.type === "healed") {
        return { tag: "pending", attempt: state.attempt + 1, queryText: event.queryText, lastFailure: state.failure };
      }
      if (event.type === "heal-failed") {
        // The attempt still counts; the same text is retried
        return { tag: "pending", attempt: state.attempt + 1, queryText: state.queryText, lastFailure: state.failure };
      }
      return state;
  }
}
