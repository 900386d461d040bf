/**
 * Plan Stage — question → QueryPlan.
 *
 * The planner role proposes a complexity class and sub-tasks; the result is
 * normalized (unique ids, backward-only dependencies, known entity kinds,
 * complexity consistent with the question). Any gateway failure or malformed
 * plan yields the single-sub-task fallback, so this stage never halts the run.
 */

import {
  plannerOutputSchema,
  type Complexity,
  type PlannerOutput,
  type QueryPlan,
  type SubTask,
} from "@shared/pipelineSchemas";
import { PipelineAbortedError, errorMessage } from "../_core/errors";
import { describeVocabulary, type SchemaVocabulary } from "../graph/graphStore";
import type { ModelGateway, StructuredTarget } from "../llm/modelGateway";
import type { ConversationPair } from "../sessions/sessionStore";

export interface PlanStageDeps {
  gateway: ModelGateway;
  vocabulary: SchemaVocabulary;
  /** Summary of the pairs older than `history` */
  conversationSummary?: string;
  signal?: AbortSignal;
}

export interface PlanStageResult {
  plan: QueryPlan;
  /** Set when the fallback plan was used */
  degradedReason?: string;
}

// ── Output schema ───────────────────────────────────────────────────────────

export const PLAN_OUTPUT_SCHEMA = {
  type: "object",
  properties: {
    complexity: { type: "string", enum: ["SIMPLE", "COMPOUND", "ANALYTICAL"] },
    subTasks: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        properties: {
          id: { type: "integer", minimum: 1 },
          description: { type: "string" },
          queryType: { type: "string", enum: ["lookup", "filter", "aggregation", "comparison", "traversal", "ranking"] },
          requiredEntityKinds: { type: "array", items: { type: "string" } },
          dependsOn: { type: "array", items: { type: "integer" } },
          expectedOutput: { type: "string" },
        },
        required: ["id", "description", "queryType", "requiredEntityKinds", "dependsOn"],
      },
    },
    rationale: { type: "string" },
  },
  required: ["complexity", "subTasks", "rationale"],
} as const;

const PLAN_TARGET: StructuredTarget<PlannerOutput> = {
  name: "QueryPlan",
  schema: plannerOutputSchema,
  jsonSchema: PLAN_OUTPUT_SCHEMA,
};

// ── Heuristics ──────────────────────────────────────────────────────────────

/** Comparison and aggregation vocabulary. A question without any of these is never ANALYTICAL. */
const ANALYTICAL_TERMS = [
  "compare", "comparison", "comparing", "versus", "vs", "difference", "differences", "differ",
  "average", "avg", "mean", "median", "sum", "total", "count", "how many", "number of",
  "most", "least", "highest", "lowest", "largest", "smallest", "best", "worst", "top", "bottom",
  "rank", "ranking", "ranked", "maximum", "minimum", "max", "min",
  "more than", "less than", "greater than", "fewer than", "better", "worse",
  "ratio", "percentage", "proportion", "distribution", "trend", "correlation", "correlate",
  "statistics", "aggregate", "recommend", "suitable", "suitability",
];

const ANALYTICAL_PATTERN = new RegExp(
  `\\b(${ANALYTICAL_TERMS.map(term => term.replace(/\s+/g, "\\s+")).join("|")})\\b`,
  "i"
);

export function hasAnalyticalLanguage(question: string): boolean {
  return ANALYTICAL_PATTERN.test(question);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Entity kinds of the vocabulary named in the text (singular or plural), in vocabulary order.
 */
export function inferEntityKinds(text: string, vocabulary: SchemaVocabulary): string[] {
  return vocabulary.entityKinds.filter(kind => {
    const forms = new Set([kind, `${kind}s`, `${kind}es`, kind.replace(/y$/i, "ies")]);
    const pattern = new RegExp(`\\b(${Array.from(forms).map(escapeRegExp).join("|")})\\b`, "i");
    return pattern.test(text);
  });
}

/**
 * Map model-supplied kinds onto vocabulary spelling; unknown kinds are dropped.
 */
function canonicalKinds(kinds: readonly string[], vocabulary: SchemaVocabulary): string[] {
  const canonical: string[] = [];
  for (const kind of kinds) {
    const bare = kind.replace(/^:/, "").trim().toLowerCase();
    const match = vocabulary.entityKinds.find(k => k.toLowerCase() === bare);
    if (match && !canonical.includes(match)) canonical.push(match);
  }
  return canonical;
}

export function fallbackPlan(question: string, vocabulary: SchemaVocabulary, reason: string): QueryPlan {
  return {
    originalQuestion: question,
    complexity: "SIMPLE",
    subTasks: [
      {
        id: 1,
        description: question,
        queryType: "lookup",
        requiredEntityKinds: inferEntityKinds(question, vocabulary),
        dependsOn: [],
      },
    ],
    rationale: `Fallback single-step plan (${reason})`,
  };
}

/**
 * Enforce plan invariants on planner output. Throws on duplicate ids.
 */
export function normalizePlan(question: string, output: PlannerOutput, vocabulary: SchemaVocabulary): QueryPlan {
  const seen = new Set<number>();
  for (const task of output.subTasks) {
    if (seen.has(task.id)) {
      throw new Error(`Plan contains duplicate sub-task id ${task.id}`);
    }
    seen.add(task.id);
  }

  const earlier = new Set<number>();
  const subTasks: SubTask[] = output.subTasks.map(task => {
    const dependsOn = Array.from(new Set(task.dependsOn.filter(id => earlier.has(id))));
    earlier.add(task.id);

    let requiredEntityKinds = canonicalKinds(task.requiredEntityKinds, vocabulary);
    if (requiredEntityKinds.length === 0) requiredEntityKinds = inferEntityKinds(task.description, vocabulary);
    if (requiredEntityKinds.length === 0) requiredEntityKinds = inferEntityKinds(question, vocabulary);

    return { ...task, dependsOn, requiredEntityKinds };
  });

  let complexity: Complexity = output.complexity;
  if (complexity === "ANALYTICAL" && !hasAnalyticalLanguage(question)) {
    complexity = subTasks.length > 1 ? "COMPOUND" : "SIMPLE";
  }
  if (complexity === "SIMPLE" && subTasks.length > 1) {
    complexity = "COMPOUND";
  }

  return { originalQuestion: question, complexity, subTasks, rationale: output.rationale };
}

// ── Prompt ──────────────────────────────────────────────────────────────────

function buildSystemPrompt(vocabulary: SchemaVocabulary): string {
  return `You are the planning step of a question-answering system over a graph database.
Break the user's question into the smallest set of sub-tasks that can each be answered by ONE graph query.

## Graph schema
${describeVocabulary(vocabulary)}

## Complexity classes
- SIMPLE: one direct lookup or filter. Exactly 1 sub-task.
- COMPOUND: several entities, filters or a comparison between a few items. 2-3 sub-tasks.
- ANALYTICAL: ranking, aggregation, recommendation or statistics across many items. 3-5 sub-tasks.

## Rules
1. Sub-task ids are consecutive integers starting at 1.
2. dependsOn may only list ids of EARLIER sub-tasks whose results this sub-task needs.
3. requiredEntityKinds uses node labels exactly as spelled in the schema.
4. Do not write queries. Describe what each sub-task must retrieve.
5. Use the conversation history and its summary only to resolve references like "those" or "the same country".`;
}

function buildUserPrompt(question: string, history: readonly ConversationPair[], summary?: string): string {
  const earlier = summary ? `## Earlier conversation (summary)\n${summary}\n\n` : "";
  const context = history.length
    ? history
        .map(pair => `User: ${pair.question}\nAssistant: ${pair.answer.substring(0, 500)}`)
        .join("\n\n")
    : "(none)";
  return `${earlier}## Conversation history\n${context}\n\n## Question\n${question}`;
}

// ── Stage ───────────────────────────────────────────────────────────────────

export async function planQuestion(
  question: string,
  history: readonly ConversationPair[],
  deps: PlanStageDeps
): Promise<PlanStageResult> {
  try {
    const output = await deps.gateway.generateStructured(
      "planner",
      buildUserPrompt(question, history, deps.conversationSummary),
      { system: buildSystemPrompt(deps.vocabulary), signal: deps.signal },
      PLAN_TARGET
    );
    const plan = normalizePlan(question, output, deps.vocabulary);
    console.log(`[Planner] ${plan.complexity} plan with ${plan.subTasks.length} sub-task(s)`);
    return { plan };
  } catch (err) {
    if (err instanceof PipelineAbortedError) throw err;
    const reason = errorMessage(err);
    console.warn(`[Planner] Using fallback plan: ${reason}`);
    return { plan: fallbackPlan(question, deps.vocabulary, reason), degradedReason: reason };
  }
}
