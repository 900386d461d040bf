/**
 * Application configuration — parsed once from the environment at startup.
 *
 * Malformed values never abort boot: they are reported with a warning and the
 * default is used instead. Every setting has a default.
 */

import { z } from "zod";
import type { ModelRole } from "@shared/pipelineSchemas";

export type LLMBackend = "ollama" | "openai";
export type SessionBusyPolicy = "queue" | "reject";
export type SchemaSource = "static" | "introspect";

export interface StageTimeouts {
  plan: number;
  generation: number;
  healing: number;
  synthesis: number;
  query: number;
}

export interface PipelineConfig {
  maxRetries: number;
  timeouts: StageTimeouts;
  rowSampleThreshold: number;
  historyPairs: number;
  /** Unsummarized pairs older than the history window that trigger a summary refresh; 0 disables */
  summaryTriggerPairs: number;
  maxConcurrentSubtasks: number;
  sessionBusyPolicy: SessionBusyPolicy;
  readOnlyQueries: boolean;
}

export interface LLMSettings {
  backend: LLMBackend;
  baseUrl: string;
  apiKey: string;
  models: Record<ModelRole, string>;
}

export interface GraphSettings {
  uri: string;
  user: string;
  password: string;
  database?: string;
  schemaSource: SchemaSource;
}

export interface AppConfig {
  llm: LLMSettings;
  pipeline: PipelineConfig;
  graph: GraphSettings;
  databaseUrl?: string;
  /** Directory for the per-run JSONL log; unset disables it */
  runLogDir?: string;
  port: number;
}

// ── Defaults ────────────────────────────────────────────────────────────────

const DEFAULT_BASE_URLS: Record<LLMBackend, string> = {
  ollama: "http://localhost:11434",
  openai: "http://localhost:8000",
};

export const DEFAULT_MODELS: Record<ModelRole, string> = {
  planner: "llama3.2:3b",
  "query-writer": "qwen2.5-coder:7b",
  healer: "llama3.2:3b",
  synthesizer: "llama3:8b",
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  maxRetries: 3,
  timeouts: {
    plan: 60_000,
    generation: 60_000,
    healing: 60_000,
    synthesis: 120_000,
    query: 30_000,
  },
  rowSampleThreshold: 20,
  historyPairs: 3,
  summaryTriggerPairs: 5,
  maxConcurrentSubtasks: 4,
  sessionBusyPolicy: "queue",
  readOnlyQueries: true,
};

// ── Field parsers ───────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseField<T>(env: Env, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Config] Ignoring invalid ${key}="${raw}" — using ${JSON.stringify(fallback)}`);
    return fallback;
  }
  return parsed.data;
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const booleanFlag = z
  .string()
  .transform(v => v.toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform(v => v === "true" || v === "1" || v === "yes");

/**
 * Build the typed configuration from an environment map.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const backend = parseField(env, "LLM_BACKEND", z.enum(["ollama", "openai"]), "ollama");

  const models: Record<ModelRole, string> = {
    planner: readString(env, "PLANNER_MODEL") ?? DEFAULT_MODELS.planner,
    "query-writer": readString(env, "QUERY_WRITER_MODEL") ?? DEFAULT_MODELS["query-writer"],
    healer: readString(env, "HEALER_MODEL") ?? DEFAULT_MODELS.healer,
    synthesizer: readString(env, "SYNTHESIZER_MODEL") ?? DEFAULT_MODELS.synthesizer,
  };

  const defaults = DEFAULT_PIPELINE_CONFIG;
  const pipeline: PipelineConfig = {
    maxRetries: parseField(env, "MAX_RETRIES", nonNegativeInt, defaults.maxRetries),
    timeouts: {
      plan: parseField(env, "PLAN_TIMEOUT_MS", positiveInt, defaults.timeouts.plan),
      generation: parseField(env, "GENERATION_TIMEOUT_MS", positiveInt, defaults.timeouts.generation),
      healing: parseField(env, "HEALING_TIMEOUT_MS", positiveInt, defaults.timeouts.healing),
      synthesis: parseField(env, "SYNTHESIS_TIMEOUT_MS", positiveInt, defaults.timeouts.synthesis),
      query: parseField(env, "QUERY_TIMEOUT_MS", positiveInt, defaults.timeouts.query),
    },
    rowSampleThreshold: parseField(env, "ROW_SAMPLE_THRESHOLD", positiveInt, defaults.rowSampleThreshold),
    historyPairs: parseField(env, "HISTORY_PAIRS", nonNegativeInt, defaults.historyPairs),
    summaryTriggerPairs: parseField(env, "SUMMARY_TRIGGER_PAIRS", nonNegativeInt, defaults.summaryTriggerPairs),
    maxConcurrentSubtasks: parseField(env, "MAX_CONCURRENT_SUBTASKS", positiveInt, defaults.maxConcurrentSubtasks),
    sessionBusyPolicy: parseField(env, "SESSION_BUSY_POLICY", z.enum(["queue", "reject"]), defaults.sessionBusyPolicy),
    readOnlyQueries: parseField(env, "READ_ONLY_QUERIES", booleanFlag, defaults.readOnlyQueries),
  };

  return {
    llm: {
      backend,
      baseUrl: (readString(env, "LLM_BASE_URL") ?? DEFAULT_BASE_URLS[backend]).replace(/\/+$/, ""),
      apiKey: readString(env, "LLM_API_KEY") ?? "",
      models,
    },
    pipeline,
    graph: {
      uri: readString(env, "NEO4J_URI") ?? "bolt://localhost:7687",
      user: readString(env, "NEO4J_USER") ?? "neo4j",
      password: readString(env, "NEO4J_PASSWORD") ?? "",
      database: readString(env, "NEO4J_DATABASE"),
      schemaSource: parseField(env, "SCHEMA_SOURCE", z.enum(["static", "introspect"]), "static"),
    },
    databaseUrl: readString(env, "DATABASE_URL"),
    runLogDir: readString(env, "RUN_LOG_DIR"),
    port: parseField(env, "PORT", positiveInt, 3000),
  };
}
