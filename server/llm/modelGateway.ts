/**
 * Model Gateway — role-addressed text and structured generation.
 *
 * Pipeline stages never name a model or a backend: they ask for a role
 * (planner / query-writer / healer / synthesizer) and the gateway resolves the
 * per-role model id and timeout from configuration. One instance is built at
 * startup and handed to every run.
 *
 * Every call logs token usage (fire-and-forget).
 */

import type { z } from "zod";
import type { ModelRole } from "@shared/pipelineSchemas";
import type { LLMSettings } from "../_core/config";
import { ModelGatewayError, PipelineAbortedError, errorMessage } from "../_core/errors";
import { createBackend, type ChatMessage, type GenerationBackend } from "./llmBackends";
import { logUsage, type UsageLogger } from "./usageLog";

// ── Types ───────────────────────────────────────────────────────────────────

export interface GatewayContext {
  /** Role instructions placed in the system message */
  system?: string;
  /** Caller cancellation */
  signal?: AbortSignal;
}

export interface StructuredTarget<T> {
  /** Short name used in log lines and error messages */
  name: string;
  /** Validates the decoded JSON at the stage boundary */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Sent to the backend as the required output shape */
  jsonSchema: Record<string, unknown>;
}

export interface ModelGateway {
  generate(role: ModelRole, prompt: string, context?: GatewayContext): Promise<string>;
  generateStructured<T>(
    role: ModelRole,
    prompt: string,
    context: GatewayContext | undefined,
    target: StructuredTarget<T>
  ): Promise<T>;
}

/** Sampling temperature per role — query writing and repair stay near-deterministic. */
const ROLE_TEMPERATURE: Record<ModelRole, number> = {
  planner: 0.2,
  "query-writer": 0.1,
  healer: 0.1,
  synthesizer: 0.5,
};

/** Completion budget per role; a repaired query is short, a report is not. */
const ROLE_MAX_TOKENS: Record<ModelRole, number> = {
  planner: 1024,
  "query-writer": 1024,
  healer: 512,
  synthesizer: 2048,
};

// ── Text helpers ────────────────────────────────────────────────────────────

/**
 * Remove a surrounding markdown code fence (```json, ```cypher, bare ```).
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[\w-]*\s*\n?([\s\S]*?)\n?```\s*$/);
  if (fenced) return fenced[1].trim();
  const inner = trimmed.match(/```[\w-]*\s*\n([\s\S]*?)\n```/);
  return inner ? inner[1].trim() : trimmed;
}

/**
 * Decode the first JSON object in a model reply. Models often wrap JSON in
 * prose or fences; the outermost braces are taken as the payload.
 */
export function extractJson(text: string): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return JSON.parse(cleaned);
  } catch {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start < 0 || end <= start) {
      throw new ModelGatewayError("invalid_output", "Model reply contained no JSON object");
    }
    try {
      return JSON.parse(cleaned.slice(start, end + 1));
    } catch (err) {
      throw new ModelGatewayError("invalid_output", `Model reply was not valid JSON: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

// ── Gateway ─────────────────────────────────────────────────────────────────

export class LLMModelGateway implements ModelGateway {
  private readonly backend: GenerationBackend;

  constructor(
    private readonly settings: LLMSettings,
    private readonly timeouts: Record<ModelRole, number>,
    backend?: GenerationBackend,
    private readonly usageLogger: UsageLogger = logUsage
  ) {
    this.backend = backend ?? createBackend(settings);
  }

  async generate(role: ModelRole, prompt: string, context: GatewayContext = {}): Promise<string> {
    const content = await this.invoke(role, prompt, context);
    if (!content.trim()) {
      throw new ModelGatewayError("empty", `Empty response for role ${role}`);
    }
    return content;
  }

  async generateStructured<T>(
    role: ModelRole,
    prompt: string,
    context: GatewayContext | undefined,
    target: StructuredTarget<T>
  ): Promise<T> {
    const content = await this.invoke(role, prompt, context ?? {}, target.jsonSchema);
    if (!content.trim()) {
      throw new ModelGatewayError("empty", `Empty ${target.name} response for role ${role}`);
    }
    const parsed = target.schema.safeParse(extractJson(content));
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ModelGatewayError("invalid_output", `${target.name} failed validation — ${issues}`);
    }
    return parsed.data;
  }

  private async invoke(
    role: ModelRole,
    prompt: string,
    context: GatewayContext,
    jsonSchema?: Record<string, unknown>
  ): Promise<string> {
    const model = this.settings.models[role];
    const timeoutMs = this.timeouts[role];
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = context.signal ? AbortSignal.any([context.signal, timeoutSignal]) : timeoutSignal;

    const messages: ChatMessage[] = [
      ...(context.system ? [{ role: "system" as const, content: context.system }] : []),
      { role: "user", content: prompt },
    ];

    const startTime = Date.now();
    try {
      const result = await this.backend.complete({
        model,
        messages,
        jsonSchema,
        temperature: ROLE_TEMPERATURE[role],
        maxTokens: ROLE_MAX_TOKENS[role],
        signal,
      });
      void this.usageLogger({
        model: result.model,
        backend: this.backend.kind,
        role,
        ...result.usage,
        latencyMs: Date.now() - startTime,
        success: true,
      });
      return result.content;
    } catch (err) {
      const latencyMs = Date.now() - startTime;
      if (context.signal?.aborted) {
        throw new PipelineAbortedError(context.signal.reason);
      }

      const failure =
        err instanceof ModelGatewayError
          ? err
          : timeoutSignal.aborted
            ? new ModelGatewayError("timeout", `${role} call timed out after ${timeoutMs}ms`, { cause: err })
            : new ModelGatewayError("http", `${role} call failed: ${errorMessage(err)}`, { cause: err });

      console.error(`[LLM] ${role} (${model}) failed after ${latencyMs}ms: ${failure.message}`);
      void this.usageLogger({
        model,
        backend: this.backend.kind,
        role,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        latencyMs,
        success: false,
        errorMessage: failure.message,
      });
      throw failure;
    }
  }
}
