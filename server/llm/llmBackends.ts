/**
 * Generation backends — the wire protocols behind the Model Gateway.
 *
 * - OpenAI-compatible: POST {base}/v1/chat/completions (llama.cpp, vLLM, TGI, Ollama's /v1 shim)
 * - Ollama native:     POST {base}/api/chat
 *
 * Neither backend is trusted to honour json_schema response formats, so the
 * schema is injected into the system prompt and only JSON mode is requested.
 */

import axios from "axios";
import { z } from "zod";
import type { LLMBackend, LLMSettings } from "../_core/config";
import { ModelGatewayError } from "../_core/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface BackendRequest {
  model: string;
  messages: ChatMessage[];
  /** When present the backend is asked for a single JSON object of this shape */
  jsonSchema?: Record<string, unknown>;
  temperature: number;
  maxTokens?: number;
  signal: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface BackendResponse {
  content: string;
  model: string;
  usage: TokenUsage;
}

export interface GenerationBackend {
  readonly kind: LLMBackend;
  readonly baseUrl: string;
  complete(request: BackendRequest): Promise<BackendResponse>;
}

// ── Shared helpers ──────────────────────────────────────────────────────────

/**
 * Append the JSON schema instruction to the first system message (or add one).
 */
export function withSchemaInstruction(messages: ChatMessage[], jsonSchema?: Record<string, unknown>): ChatMessage[] {
  if (!jsonSchema) return messages;
  const instruction = `You MUST respond with valid JSON matching this exact schema:\n${JSON.stringify(jsonSchema, null, 2)}`;
  const systemIdx = messages.findIndex(m => m.role === "system");
  if (systemIdx < 0) {
    return [{ role: "system", content: instruction }, ...messages];
  }
  return messages.map((m, i) => (i === systemIdx ? { ...m, content: `${m.content}\n\n${instruction}` } : m));
}

// ── OpenAI-compatible ───────────────────────────────────────────────────────

const openAIResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class OpenAICompatibleBackend implements GenerationBackend {
  readonly kind = "openai" as const;

  constructor(
    readonly baseUrl: string,
    private readonly apiKey: string
  ) {}

  async complete(request: BackendRequest): Promise<BackendResponse> {
    const payload: Record<string, unknown> = {
      model: request.model,
      messages: withSchemaInstruction(request.messages, request.jsonSchema),
      temperature: request.temperature,
      max_tokens: request.maxTokens ?? 4096,
      stream: false,
    };
    if (request.jsonSchema) {
      payload.response_format = { type: "json_object" };
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelGatewayError(
        "http",
        `LLM request failed: ${response.status} ${response.statusText} — ${errorText.substring(0, 500)}`
      );
    }

    const parsed = openAIResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelGatewayError("invalid_output", "LLM response did not contain any choices");
    }

    const usage = parsed.data.usage;
    return {
      content: parsed.data.choices[0].message.content ?? "",
      model: parsed.data.model ?? request.model,
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
    };
  }
}

// ── Ollama native ───────────────────────────────────────────────────────────

const ollamaResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaBackend implements GenerationBackend {
  readonly kind = "ollama" as const;

  constructor(readonly baseUrl: string) {}

  async complete(request: BackendRequest): Promise<BackendResponse> {
    let data: unknown;
    try {
      const response = await axios.post(
        `${this.baseUrl}/api/chat`,
        {
          model: request.model,
          messages: withSchemaInstruction(request.messages, request.jsonSchema),
          stream: false,
          ...(request.jsonSchema ? { format: "json" } : {}),
          options: {
            temperature: request.temperature,
            ...(request.maxTokens ? { num_predict: request.maxTokens } : {}),
          },
        },
        { signal: request.signal, headers: { "Content-Type": "application/json" } }
      );
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        const body = typeof err.response.data === "string" ? err.response.data : JSON.stringify(err.response.data);
        throw new ModelGatewayError(
          "http",
          `Ollama request failed: ${err.response.status} — ${body.substring(0, 500)}`,
          { cause: err }
        );
      }
      throw err;
    }

    const parsed = ollamaResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ModelGatewayError("invalid_output", "Ollama response did not contain a message");
    }

    const promptTokens = parsed.data.prompt_eval_count ?? 0;
    const completionTokens = parsed.data.eval_count ?? 0;
    return {
      content: parsed.data.message.content,
      model: parsed.data.model ?? request.model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
    };
  }
}

export function createBackend(settings: LLMSettings): GenerationBackend {
  return settings.backend === "openai"
    ? new OpenAICompatibleBackend(settings.baseUrl, settings.apiKey)
    : new OllamaBackend(settings.baseUrl);
}
