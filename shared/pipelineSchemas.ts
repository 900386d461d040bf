/**
 * Pipeline data model — stage outputs, validated at each stage boundary.
 *
 * Model-facing shapes are zod schemas (the model's JSON is parsed through
 * them); shapes built only by our own code are plain types.
 */

import { z } from "zod";

// ── Roles ───────────────────────────────────────────────────────────────────

export const MODEL_ROLES = ["planner", "query-writer", "healer", "synthesizer"] as const;
export type ModelRole = (typeof MODEL_ROLES)[number];

// ── Plan ────────────────────────────────────────────────────────────────────

export const COMPLEXITIES = ["SIMPLE", "COMPOUND", "ANALYTICAL"] as const;
export type Complexity = (typeof COMPLEXITIES)[number];

export const QUERY_TYPES = ["lookup", "filter", "aggregation", "comparison", "traversal", "ranking"] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

const upperCased = (value: unknown) => (typeof value === "string" ? value.trim().toUpperCase() : value);
const lowerCased = (value: unknown) => (typeof value === "string" ? value.trim().toLowerCase() : value);

export const complexitySchema = z.preprocess(upperCased, z.enum(COMPLEXITIES));

export const subTaskSchema = z.object({
  id: z.coerce.number().int().positive(),
  description: z.string().trim().min(1),
  queryType: z.preprocess(lowerCased, z.enum(QUERY_TYPES)).catch("lookup"),
  requiredEntityKinds: z.array(z.string()).default([]),
  dependsOn: z.array(z.coerce.number().int()).default([]),
  expectedOutput: z.string().optional(),
});
export type SubTask = z.infer<typeof subTaskSchema>;

/** What the planner role must return. */
export const plannerOutputSchema = z.object({
  complexity: complexitySchema,
  subTasks: z.array(subTaskSchema).min(1),
  rationale: z.string().default(""),
});
export type PlannerOutput = z.infer<typeof plannerOutputSchema>;

export interface QueryPlan {
  originalQuestion: string;
  complexity: Complexity;
  subTasks: SubTask[];
  rationale: string;
}

// ── Candidate queries ───────────────────────────────────────────────────────

/** What the query-writer role must return. */
export const queryWriterOutputSchema = z.object({
  query: z.string().trim().min(1),
  explanation: z.string().default(""),
  expectedColumns: z.array(z.string()).default([]),
});
export type QueryWriterOutput = z.infer<typeof queryWriterOutputSchema>;

export interface CandidateQuery {
  readonly subTaskId: number;
  readonly queryText: string;
  readonly explanation: string;
  readonly expectedColumns: readonly string[];
  readonly origin: "generated" | "fallback";
}

// ── Validation ──────────────────────────────────────────────────────────────

export const VALIDATION_STATUSES = ["VALID", "SYNTAX_ERROR", "SCHEMA_ERROR", "EXECUTION_ERROR"] as const;
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];
export type FailureStatus = Exclude<ValidationStatus, "VALID">;

export type Row = Record<string, unknown>;

export interface ValidationAttempt {
  attempt: number;
  queryText: string;
  status: ValidationStatus;
  errorMessage?: string;
  durationMs: number;
}

export interface ValidationOutcome {
  subTaskId: number;
  status: ValidationStatus;
  originalQuery: string;
  finalQuery: string;
  errorMessage?: string;
  rows?: Row[];
  executionTimeMs?: number;
  retryCount: number;
  attempts: ValidationAttempt[];
}

// ── Report ──────────────────────────────────────────────────────────────────

const PRIORITY_WORDS: Record<string, number> = {
  critical: 1,
  high: 1,
  medium: 3,
  normal: 3,
  low: 5,
};

/** Recommendation priority: 1 (most urgent) to 5. Words and out-of-range numbers are mapped in. */
export const prioritySchema = z.preprocess(
  value => {
    if (typeof value === "string") {
      const word = PRIORITY_WORDS[value.trim().toLowerCase()];
      return word !== undefined ? word : Number(value);
    }
    return value;
  },
  z
    .number()
    .finite()
    .transform(n => Math.min(5, Math.max(1, Math.round(n))))
).catch(3);

export const insightSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  importance: z.preprocess(lowerCased, z.enum(["high", "medium", "low"])).catch("medium"),
});
export type Insight = z.infer<typeof insightSchema>;

export const recommendationSchema = z.object({
  action: z.string().min(1),
  rationale: z.string().default(""),
  priority: prioritySchema,
});
export type Recommendation = z.infer<typeof recommendationSchema>;

export const visualizationHintSchema = z.object({
  type: z.preprocess(lowerCased, z.enum(["table", "map", "chart", "stats"])),
  dataKey: z.string().default("results"),
  config: z.record(z.unknown()).default({}),
});
export type VisualizationHint = z.infer<typeof visualizationHintSchema>;

/** What the synthesizer role must return; also the shape of every report we emit. */
export const analysisReportSchema = z.object({
  summary: z.string().min(1),
  insights: z.array(insightSchema).default([]),
  recommendations: z.array(recommendationSchema).default([]),
  followUpQuestions: z.array(z.string()).default([]),
  visualizationHints: z.array(visualizationHintSchema).default([]),
  dataQualityNotes: z.array(z.string()).default([]),
});
export type AnalysisReport = z.infer<typeof analysisReportSchema>;

// ── Run bookkeeping ─────────────────────────────────────────────────────────

export type PipelineStage = "plan" | "generate" | "validate" | "synthesize";

/** One entry of the per-run activity feed. */
export interface PipelineStep {
  stage: PipelineStage;
  action: string;
  detail: string;
  status: "running" | "complete" | "degraded" | "error";
  timestamp: number;
  durationMs?: number;
}

export type Degradation =
  | { kind: "PlanningDegraded"; reason: string }
  | { kind: "GenerationDegraded"; subTaskId: number; reason: string }
  | { kind: "ValidationFailed"; subTaskId: number; category: "Syntax" | "Schema" | "Execution"; reason: string }
  | { kind: "SynthesisDegraded"; reason: string };

export interface SubTaskTrace {
  subTaskId: number;
  description: string;
  query: string;
  finalQuery: string;
  status: ValidationStatus;
  retryCount: number;
  executionTimeMs: number | null;
  rowCount: number;
  errorMessage?: string;
}

/** Detailed-mode execution record. */
export interface PipelineTrace {
  plan: QueryPlan;
  subTaskOutcomes: SubTaskTrace[];
  totalRetries: number;
  steps: PipelineStep[];
  durationMs: number;
}

export type ResponseFraming = "standard" | "partial" | "failure-foreground";

export interface PipelineMetadata {
  runId: string;
  complexity: Complexity;
  framing: ResponseFraming;
  queriesExecuted: number;
  validQueries: number;
  totalRetries: number;
  shouldEscalate: boolean;
  degradations: Degradation[];
  durationMs: number;
}

export interface PipelineResponse {
  sessionId: string;
  answerText: string;
  report: AnalysisReport;
  trace?: PipelineTrace;
  metadata: PipelineMetadata;
}
