/**
 * Session Store — append-only question/answer persistence keyed by session id.
 *
 * The pipeline reads a short window of recent pairs for context and appends
 * exactly one pair per completed run; older pairs are folded into a rolling
 * summary stored on the session row. MySQL (drizzle) when DATABASE_URL is set,
 * otherwise an in-process map.
 */

import { asc, desc, eq, sql } from "drizzle-orm";
import { nanoid } from "nanoid";
import type { PipelineTrace } from "@shared/pipelineSchemas";
import { chatMessages, chatSessions } from "../../drizzle/schema";
import type { Database } from "../db";

// ── Types ───────────────────────────────────────────────────────────────────

export interface SessionSummary {
  sessionId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
  messageCount: number;
}

export interface StoredMessage {
  role: "user" | "assistant";
  content: string;
  trace: PipelineTrace | null;
  createdAt: Date;
}

export interface ConversationPair {
  question: string;
  answer: string;
}

export interface ConversationSummary {
  text: string;
  /** Number of leading pairs folded into the text */
  pairsCovered: number;
}

export interface Exchange {
  question: string;
  answerText: string;
  trace?: PipelineTrace;
  /** Title used if the session does not exist yet */
  sessionTitle?: string;
}

export interface SessionStore {
  readonly mode: "mysql" | "memory";
  createSession(title?: string): Promise<SessionSummary>;
  getSession(sessionId: string): Promise<SessionSummary | null>;
  listSessions(limit?: number): Promise<SessionSummary[]>;
  history(sessionId: string): Promise<StoredMessage[]>;
  /** The last `pairs` completed question/answer pairs, oldest first */
  recentExchanges(sessionId: string, pairs: number): Promise<ConversationPair[]>;
  /** Append one question/answer pair atomically, creating the session if it does not exist */
  appendExchange(sessionId: string, exchange: Exchange): Promise<void>;
  renameSession(sessionId: string, title: string): Promise<boolean>;
  getSummary(sessionId: string): Promise<ConversationSummary | null>;
  /** False when the session does not exist */
  saveSummary(sessionId: string, summary: ConversationSummary): Promise<boolean>;
  deleteSession(sessionId: string): Promise<boolean>;
}

export const DEFAULT_SESSION_TITLE = "New conversation";
const TITLE_MAX_LENGTH = 80;

/**
 * Derive a session title from the first question.
 */
export function titleFromQuestion(question: string): string {
  const singleLine = question.replace(/\s+/g, " ").trim();
  if (!singleLine) return DEFAULT_SESSION_TITLE;
  return singleLine.length > TITLE_MAX_LENGTH ? `${singleLine.substring(0, TITLE_MAX_LENGTH - 3)}...` : singleLine;
}

/**
 * Pair each user message with the assistant message that follows it.
 * Unanswered questions are skipped.
 */
export function pairMessages(messages: Array<Pick<StoredMessage, "role" | "content">>): ConversationPair[] {
  const pairs: ConversationPair[] = [];
  for (let i = 0; i < messages.length - 1; i++) {
    const current = messages[i];
    const next = messages[i + 1];
    if (current.role === "user" && next.role === "assistant") {
      pairs.push({ question: current.content, answer: next.content });
      i++;
    }
  }
  return pairs;
}

// ── MySQL ───────────────────────────────────────────────────────────────────

export class DrizzleSessionStore implements SessionStore {
  readonly mode = "mysql" as const;

  constructor(private readonly db: Database) {}

  async createSession(title?: string): Promise<SessionSummary> {
    const sessionId = nanoid();
    const now = new Date();
    const sessionTitle = title?.trim() || DEFAULT_SESSION_TITLE;
    await this.db.insert(chatSessions).values({ sessionId, title: sessionTitle, createdAt: now, updatedAt: now });
    return { sessionId, title: sessionTitle, createdAt: now, updatedAt: now, messageCount: 0 };
  }

  async getSession(sessionId: string): Promise<SessionSummary | null> {
    const rows = await this.summaryQuery().where(eq(chatSessions.sessionId, sessionId)).limit(1);
    return rows.length > 0 ? toSummary(rows[0]) : null;
  }

  async listSessions(limit = 50): Promise<SessionSummary[]> {
    const rows = await this.summaryQuery().orderBy(desc(chatSessions.updatedAt)).limit(limit);
    return rows.map(toSummary);
  }

  async history(sessionId: string): Promise<StoredMessage[]> {
    const rows = await this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .orderBy(asc(chatMessages.id));
    return rows.map(row => ({ role: row.role, content: row.content, trace: row.trace ?? null, createdAt: row.createdAt }));
  }

  async recentExchanges(sessionId: string, pairs: number): Promise<ConversationPair[]> {
    if (pairs <= 0) return [];
    const rows = await this.db
      .select({ role: chatMessages.role, content: chatMessages.content })
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .orderBy(desc(chatMessages.id))
      .limit(pairs * 2);
    return pairMessages(rows.reverse()).slice(-pairs);
  }

  async appendExchange(sessionId: string, exchange: Exchange): Promise<void> {
    await this.db.transaction(async tx => {
      await tx
        .insert(chatSessions)
        .values({ sessionId, title: exchange.sessionTitle ?? DEFAULT_SESSION_TITLE })
        .onDuplicateKeyUpdate({ set: { updatedAt: new Date() } });
      await tx.insert(chatMessages).values([
        { sessionId, role: "user", content: exchange.question },
        { sessionId, role: "assistant", content: exchange.answerText, trace: exchange.trace ?? null },
      ]);
    });
  }

  async renameSession(sessionId: string, title: string): Promise<boolean> {
    const [result] = await this.db
      .update(chatSessions)
      .set({ title: title.trim() || DEFAULT_SESSION_TITLE })
      .where(eq(chatSessions.sessionId, sessionId));
    return result.affectedRows > 0;
  }

  async getSummary(sessionId: string): Promise<ConversationSummary | null> {
    const rows = await this.db
      .select({ summary: chatSessions.summary, summarizedPairs: chatSessions.summarizedPairs })
      .from(chatSessions)
      .where(eq(chatSessions.sessionId, sessionId))
      .limit(1);
    const [row] = rows;
    if (!row || row.summary === null) return null;
    return { text: row.summary, pairsCovered: row.summarizedPairs };
  }

  async saveSummary(sessionId: string, summary: ConversationSummary): Promise<boolean> {
    const [result] = await this.db
      .update(chatSessions)
      .set({ summary: summary.text, summarizedPairs: summary.pairsCovered })
      .where(eq(chatSessions.sessionId, sessionId));
    return result.affectedRows > 0;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.db.transaction(async tx => {
      await tx.delete(chatMessages).where(eq(chatMessages.sessionId, sessionId));
      const [result] = await tx.delete(chatSessions).where(eq(chatSessions.sessionId, sessionId));
      return result.affectedRows > 0;
    });
  }

  private summaryQuery() {
    return this.db
      .select({
        sessionId: chatSessions.sessionId,
        title: chatSessions.title,
        createdAt: chatSessions.createdAt,
        updatedAt: chatSessions.updatedAt,
        messageCount: sql<number>`count(${chatMessages.id})`,
      })
      .from(chatSessions)
      .leftJoin(chatMessages, eq(chatMessages.sessionId, chatSessions.sessionId))
      .groupBy(chatSessions.id)
      .$dynamic();
  }
}

function toSummary(row: { sessionId: string; title: string; createdAt: Date; updatedAt: Date; messageCount: number }): SessionSummary {
  return { ...row, messageCount: Number(row.messageCount) };
}

// ── In-memory ───────────────────────────────────────────────────────────────

interface MemorySession {
  sessionId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
  messages: StoredMessage[];
  summary: ConversationSummary | null;
}

export class InMemorySessionStore implements SessionStore {
  readonly mode = "memory" as const;
  private readonly sessions = new Map<string, MemorySession>();

  async createSession(title?: string): Promise<SessionSummary> {
    const now = new Date();
    const session: MemorySession = {
      sessionId: nanoid(),
      title: title?.trim() || DEFAULT_SESSION_TITLE,
      createdAt: now,
      updatedAt: now,
      messages: [],
      summary: null,
    };
    this.sessions.set(session.sessionId, session);
    return summarize(session);
  }

  async getSession(sessionId: string): Promise<SessionSummary | null> {
    const session = this.sessions.get(sessionId);
    return session ? summarize(session) : null;
  }

  async listSessions(limit = 50): Promise<SessionSummary[]> {
    return Array.from(this.sessions.values())
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, limit)
      .map(summarize);
  }

  async history(sessionId: string): Promise<StoredMessage[]> {
    return [...(this.sessions.get(sessionId)?.messages ?? [])];
  }

  async recentExchanges(sessionId: string, pairs: number): Promise<ConversationPair[]> {
    if (pairs <= 0) return [];
    return pairMessages(this.sessions.get(sessionId)?.messages ?? []).slice(-pairs);
  }

  async appendExchange(sessionId: string, exchange: Exchange): Promise<void> {
    const now = new Date();
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { sessionId, title: exchange.sessionTitle ?? DEFAULT_SESSION_TITLE, createdAt: now, updatedAt: now, messages: [], summary: null };
      this.sessions.set(sessionId, session);
    }
    session.messages.push(
      { role: "user", content: exchange.question, trace: null, createdAt: now },
      { role: "assistant", content: exchange.answerText, trace: exchange.trace ?? null, createdAt: now }
    );
    session.updatedAt = now;
  }

  async renameSession(sessionId: string, title: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.title = title.trim() || DEFAULT_SESSION_TITLE;
    return true;
  }

  async getSummary(sessionId: string): Promise<ConversationSummary | null> {
    const summary = this.sessions.get(sessionId)?.summary;
    return summary ? { ...summary } : null;
  }

  async saveSummary(sessionId: string, summary: ConversationSummary): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.summary = { ...summary };
    return true;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}

function summarize(session: MemorySession): SessionSummary {
  return {
    sessionId: session.sessionId,
    title: session.title,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    messageCount: session.messages.length,
  };
}
