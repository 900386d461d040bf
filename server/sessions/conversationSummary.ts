/**
 * Rolling conversation summary.
 *
 * Only the last `historyPairs` pairs reach the planner verbatim. Pairs that
 * fall out of that window are folded into a short summary once enough of them
 * have accumulated, so long sessions keep their earlier context.
 */

import type { ModelGateway } from "../llm/modelGateway";
import { pairMessages, type ConversationPair, type ConversationSummary, type SessionStore } from "./sessionStore";

export interface SummarySettings {
  historyPairs: number;
  /** Pending pairs needed before the summary is rewritten; 0 disables */
  summaryTriggerPairs: number;
}

const ANSWER_EXCERPT_LENGTH = 400;

const SUMMARY_SYSTEM_PROMPT = `You maintain a running summary of a conversation about a graph database of aquifers, basins and countries.
Merge the previous summary with the new exchanges into one paragraph of at most 150 words.
Keep the entities, places, filters and figures the user asked about so later questions like "those" or "the same basin" can be resolved.
Do not add information that is not in the exchanges.`;

function buildPrompt(previous: string | undefined, pairs: readonly ConversationPair[]): string {
  const exchanges = pairs
    .map(pair => `User: ${pair.question}\nAssistant: ${pair.answer.substring(0, ANSWER_EXCERPT_LENGTH)}`)
    .join("\n\n");
  return `## Previous summary\n${previous ?? "(none)"}\n\n## New exchanges\n${exchanges}`;
}

/**
 * Pairs older than the history window that the summary does not cover yet.
 */
export function pendingPairs(
  pairs: readonly ConversationPair[],
  pairsCovered: number,
  historyPairs: number
): ConversationPair[] {
  const windowStart = Math.max(0, pairs.length - historyPairs);
  return pairsCovered < windowStart ? pairs.slice(pairsCovered, windowStart) : [];
}

/**
 * Rewrite the session summary when enough pairs have left the history window.
 * Returns the saved summary, or null when nothing was due.
 */
export async function refreshSummary(
  sessionStore: SessionStore,
  gateway: ModelGateway,
  sessionId: string,
  settings: SummarySettings,
  signal?: AbortSignal
): Promise<ConversationSummary | null> {
  if (settings.summaryTriggerPairs <= 0) return null;

  const current = await sessionStore.getSummary(sessionId);
  const covered = current?.pairsCovered ?? 0;
  const pairs = pairMessages(await sessionStore.history(sessionId));
  const pending = pendingPairs(pairs, covered, settings.historyPairs);
  if (pending.length < settings.summaryTriggerPairs) return null;

  const text = await gateway.generate("synthesizer", buildPrompt(current?.text, pending), {
    system: SUMMARY_SYSTEM_PROMPT,
    signal,
  });
  const summary: ConversationSummary = { text: text.trim(), pairsCovered: covered + pending.length };
  if (!summary.text) return null;

  await sessionStore.saveSummary(sessionId, summary);
  console.log(`[Sessions] Summary for ${sessionId} now covers ${summary.pairsCovered} pair(s)`);
  return summary;
}
