import { getDb } from "../db";
import { llmUsage } from "../../drizzle/schema";
import type { LLMBackend } from "../_core/config";
import { errorMessage } from "../_core/errors";

export interface UsageEntry {
  model: string;
  backend: LLMBackend;
  role: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latencyMs: number;
  success: boolean;
  errorMessage?: string;
}

export type UsageLogger = (entry: UsageEntry) => Promise<void>;

/**
 * Log token usage to the database (fire-and-forget). Never rejects.
 */
export async function logUsage(entry: UsageEntry): Promise<void> {
  try {
    const db = await getDb();
    if (!db) return;
    await db.insert(llmUsage).values({
      model: entry.model,
      backend: entry.backend,
      role: entry.role,
      promptTokens: entry.promptTokens,
      completionTokens: entry.completionTokens,
      totalTokens: entry.totalTokens,
      latencyMs: entry.latencyMs,
      success: entry.success ? 1 : 0,
      errorMessage: entry.errorMessage?.substring(0, 2000),
    });
  } catch (err) {
    console.error(`[LLM] Failed to log usage: ${errorMessage(err)}`);
  }
}
