import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { QueryPlan, ValidationOutcome, ValidationStatus } from "@shared/pipelineSchemas";
import { beginStep, buildTrace, createPipelineRun, recordOutcomes, routeAfterValidation } from "./pipelineState";

function outcome(subTaskId: number, status: ValidationStatus, retryCount = 0): ValidationOutcome {
  const query = `MATCH (n) RETURN n // ${subTaskId}`;
  return {
    subTaskId,
    status,
    originalQuery: query,
    finalQuery: query,
    retryCount,
    attempts: [],
    ...(status === "VALID" ? { rows: [{ n: 1 }], executionTimeMs: 5 } : { errorMessage: `${status} in ${subTaskId}` }),
  };
}

describe("routeAfterValidation", () => {
  it("answers normally when every query is valid", () => {
    expect(routeAfterValidation([outcome(1, "VALID"), outcome(2, "VALID")])).toEqual({
      framing: "standard",
      shouldEscalate: false,
    });
  });

  it("frames a partial answer when failures are a minority", () => {
    expect(routeAfterValidation([outcome(1, "VALID"), outcome(2, "VALID"), outcome(3, "SCHEMA_ERROR")])).toEqual({
      framing: "partial",
      shouldEscalate: true,
    });
  });

  it("leads with the failures on a tie", () => {
    expect(routeAfterValidation([outcome(1, "VALID"), outcome(2, "EXECUTION_ERROR")])).toEqual({
      framing: "failure-foreground",
      shouldEscalate: true,
    });
  });

  it("leads with the failures when nothing is valid", () => {
    expect(routeAfterValidation([outcome(1, "SYNTAX_ERROR")]).framing).toBe("failure-foreground");
  });
});

describe("recordOutcomes", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("derives error count, retries and one degradation per failed query", () => {
    const run = createPipelineRun({ question: "q", sessionId: "s1", detailedMode: false });

    const decision = recordOutcomes(run, [
      outcome(1, "VALID", 1),
      outcome(2, "SYNTAX_ERROR", 3),
      outcome(3, "VALID", 0),
    ]);

    expect(decision).toEqual({ framing: "partial", shouldEscalate: true });
    expect(run.errorCount).toBe(1);
    expect(run.totalRetries).toBe(4);
    expect(run.framing).toBe("partial");
    expect(run.shouldEscalate).toBe(true);
    expect(run.degradations).toEqual([
      { kind: "ValidationFailed", subTaskId: 2, category: "Syntax", reason: "SYNTAX_ERROR in 2" },
    ]);
  });
});

describe("beginStep", () => {
  it("closes the step with its final status and detail", () => {
    const run = createPipelineRun({ question: "q", sessionId: "s1", detailedMode: true });
    const close = beginStep(run, "plan", "Planning", "working");
    expect(run.steps[0].status).toBe("running");

    close("degraded", "fallback");
    expect(run.steps[0]).toMatchObject({ stage: "plan", action: "Planning", status: "degraded", detail: "fallback" });
    expect(run.steps[0].durationMs).toBeGreaterThanOrEqual(0);
  });
});

describe("buildTrace", () => {
  it("summarizes each outcome against its sub-task", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const plan: QueryPlan = {
      originalQuestion: "q",
      complexity: "COMPOUND",
      subTasks: [
        { id: 1, description: "Aquifers", queryType: "lookup", requiredEntityKinds: [], dependsOn: [] },
        { id: 2, description: "Basins", queryType: "lookup", requiredEntityKinds: [], dependsOn: [] },
      ],
      rationale: "",
    };
    const run = createPipelineRun({ question: "q", sessionId: "s1", detailedMode: true });
    recordOutcomes(run, [outcome(1, "VALID", 1), outcome(2, "EXECUTION_ERROR", 3)]);

    const trace = buildTrace(run, plan);

    expect(trace.totalRetries).toBe(4);
    expect(trace.subTaskOutcomes).toEqual([
      {
        subTaskId: 1,
        description: "Aquifers",
        query: "MATCH (n) RETURN n // 1",
        finalQuery: "MATCH (n) RETURN n // 1",
        status: "VALID",
        retryCount: 1,
        executionTimeMs: 5,
        rowCount: 1,
      },
      {
        subTaskId: 2,
        description: "Basins",
        query: "MATCH (n) RETURN n // 2",
        finalQuery: "MATCH (n) RETURN n // 2",
        status: "EXECUTION_ERROR",
        retryCount: 3,
        executionTimeMs: null,
        rowCount: 0,
        errorMessage: "EXECUTION_ERROR in 2",
      },
    ]);
    vi.restoreAllMocks();
  });
});
