import {
  index,
  int,
  json,
  mysqlEnum,
  mysqlTable,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/mysql-core";
import type { PipelineTrace } from "../shared/pipelineSchemas";

/**
 * Conversation sessions — one row per chat thread.
 */
export const chatSessions = mysqlTable("chat_sessions", {
  id: int("id").autoincrement().primaryKey(),
  /** Public session identifier (nanoid) */
  sessionId: varchar("sessionId", { length: 64 }).notNull().unique(),
  title: varchar("title", { length: 256 }).notNull(),
  /** Rolling summary of the pairs older than the prompt history window */
  summary: text("summary"),
  /** Number of leading question/answer pairs the summary covers */
  summarizedPairs: int("summarizedPairs").default(0).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().onUpdateNow().notNull(),
});

export type ChatSession = typeof chatSessions.$inferSelect;
export type InsertChatSession = typeof chatSessions.$inferInsert;

/**
 * Chat messages — append-only, written in user/assistant pairs.
 */
export const chatMessages = mysqlTable("chat_messages", {
  id: int("id").autoincrement().primaryKey(),
  sessionId: varchar("sessionId", { length: 64 }).notNull(),
  role: mysqlEnum("role", ["user", "assistant"]).notNull(),
  content: text("content").notNull(),
  /** Execution trace, stored only for detailed-mode answers */
  trace: json("trace").$type<PipelineTrace>(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ([
  index("chat_messages_sessionId_idx").on(table.sessionId),
]));

export type ChatMessage = typeof chatMessages.$inferSelect;
export type InsertChatMessage = typeof chatMessages.$inferInsert;

/**
 * LLM token usage — one row per generation call.
 */
export const llmUsage = mysqlTable("llm_usage", {
  id: int("id").autoincrement().primaryKey(),
  model: varchar("model", { length: 128 }).notNull(),
  backend: mysqlEnum("backend", ["ollama", "openai"]).notNull(),
  /** Pipeline role that issued the call */
  role: varchar("role", { length: 32 }).notNull(),
  promptTokens: int("promptTokens").default(0).notNull(),
  completionTokens: int("completionTokens").default(0).notNull(),
  totalTokens: int("totalTokens").default(0).notNull(),
  latencyMs: int("latencyMs").default(0).notNull(),
  success: int("success").default(1).notNull(),
  errorMessage: text("errorMessage"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ([
  index("llm_usage_createdAt_idx").on(table.createdAt),
]));

export type LlmUsage = typeof llmUsage.$inferSelect;
export type InsertLlmUsage = typeof llmUsage.$inferInsert;
