/**
 * Query Generation Stage — one candidate Cypher query per sub-task.
 *
 * The query-writer role sees the full schema vocabulary, the plan, and the
 * queries already written for the sub-tasks this one depends on. When the
 * role fails, a conservative default query scoped to the sub-task's first
 * known entity kind is emitted instead.
 */

import {
  queryWriterOutputSchema,
  type CandidateQuery,
  type QueryPlan,
  type QueryWriterOutput,
  type SubTask,
} from "@shared/pipelineSchemas";
import { PipelineAbortedError, errorMessage } from "../_core/errors";
import { describeVocabulary, type SchemaVocabulary } from "../graph/graphStore";
import type { ModelGateway, StructuredTarget } from "../llm/modelGateway";
import { cleanQueryText } from "./queryChecks";

export interface GenerationStageDeps {
  gateway: ModelGateway;
  vocabulary: SchemaVocabulary;
  readOnly: boolean;
  signal?: AbortSignal;
}

export interface GenerationResult {
  candidate: CandidateQuery;
  degradedReason?: string;
}

export const FALLBACK_ROW_LIMIT = 10;

export const QUERY_OUTPUT_SCHEMA = {
  type: "object",
  properties: {
    query: { type: "string", description: "A single Cypher query, no markdown" },
    explanation: { type: "string" },
    expectedColumns: { type: "array", items: { type: "string" } },
  },
  required: ["query", "explanation", "expectedColumns"],
} as const;

const QUERY_TARGET: StructuredTarget<QueryWriterOutput> = {
  name: "CandidateQuery",
  schema: queryWriterOutputSchema,
  jsonSchema: QUERY_OUTPUT_SCHEMA,
};

function quoteName(name: string): string {
  return /^[A-Za-z_]\w*$/.test(name) ? name : `\`${name.replace(/`/g, "``")}\``;
}

/**
 * The default query for a sub-task: its first entity kind known to the
 * vocabulary (else the vocabulary's first kind), capped at a small row limit.
 */
export function fallbackCandidate(subTask: SubTask, vocabulary: SchemaVocabulary): CandidateQuery {
  const kind = subTask.requiredEntityKinds.find(k => vocabulary.entityKinds.includes(k)) ?? vocabulary.entityKinds[0];
  return {
    subTaskId: subTask.id,
    queryText: `MATCH (n:${quoteName(kind)}) RETURN n LIMIT ${FALLBACK_ROW_LIMIT}`,
    explanation: `Default query listing up to ${FALLBACK_ROW_LIMIT} ${kind} nodes`,
    expectedColumns: ["n"],
    origin: "fallback",
  };
}

function buildSystemPrompt(vocabulary: SchemaVocabulary, readOnly: boolean): string {
  const rules = [
    "Use ONLY the node labels, relationship types and property keys listed in the schema, spelled exactly as shown (case-sensitive).",
    "Follow relationship directions exactly as shown in the schema.",
    "Return explicit columns with readable aliases (e.g. `RETURN a.Porosity AS porosity`), never whole paths.",
    "Add `LIMIT 100` unless the query aggregates to a handful of rows.",
    "Compare text case-insensitively with `toLower(x.name) = toLower('value')` or `CONTAINS`.",
    "Write literal values inline; do not use $parameters.",
    ...(readOnly ? ["The database is read-only: never use CREATE, MERGE, SET, DELETE, REMOVE or DROP."] : []),
    "Put the query in the `query` field as plain text without markdown fences.",
  ];
  return `You write Cypher queries for a Neo4j graph database.

## Graph schema
${describeVocabulary(vocabulary)}

## Rules
${rules.map((rule, i) => `${i + 1}. ${rule}`).join("\n")}`;
}

function buildUserPrompt(subTask: SubTask, plan: QueryPlan, dependencies: readonly CandidateQuery[]): string {
  const planLines = plan.subTasks.map(t => `${t.id}. ${t.description}${t.id === subTask.id ? "   <-- this sub-task" : ""}`);
  const sections = [
    `## Original question\n${plan.originalQuestion}`,
    `## Plan (${plan.complexity})\n${planLines.join("\n")}`,
    `## Sub-task ${subTask.id}\n${subTask.description}\nQuery type: ${subTask.queryType}\nEntity kinds: ${subTask.requiredEntityKinds.join(", ") || "(unspecified)"}${subTask.expectedOutput ? `\nExpected output: ${subTask.expectedOutput}` : ""}`,
  ];
  if (dependencies.length > 0) {
    const dependencyText = dependencies
      .map(d => `Sub-task ${d.subTaskId}: ${d.explanation}\n${d.queryText}`)
      .join("\n\n");
    sections.push(`## Queries written for prerequisite sub-tasks\n${dependencyText}`);
  }
  return sections.join("\n\n");
}

export async function generateCandidate(
  subTask: SubTask,
  plan: QueryPlan,
  dependencies: readonly CandidateQuery[],
  deps: GenerationStageDeps
): Promise<GenerationResult> {
  try {
    const output = await deps.gateway.generateStructured(
      "query-writer",
      buildUserPrompt(subTask, plan, dependencies),
      { system: buildSystemPrompt(deps.vocabulary, deps.readOnly), signal: deps.signal },
      QUERY_TARGET
    );
    const queryText = cleanQueryText(output.query);
    if (!queryText) {
      throw new Error("query-writer returned an empty query");
    }
    console.log(`[QueryWriter] Sub-task ${subTask.id}: ${queryText.replace(/\s+/g, " ").substring(0, 160)}`);
    return {
      candidate: {
        subTaskId: subTask.id,
        queryText,
        explanation: output.explanation,
        expectedColumns: output.expectedColumns,
        origin: "generated",
      },
    };
  } catch (err) {
    if (err instanceof PipelineAbortedError) throw err;
    const reason = errorMessage(err);
    console.warn(`[QueryWriter] Sub-task ${subTask.id} using default query: ${reason}`);
    return { candidate: fallbackCandidate(subTask, deps.vocabulary), degradedReason: reason };
  }
}
