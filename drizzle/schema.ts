import {
  index,
  int,
  mysqlEnum,
  mysqlTable,
  text,
  timestamp,
  varchar,
  json,
} from "drizzle-orm/mysql-core";

/**
 * Conversation checkpoints — one row per assistant session holding the full
 * conversation state as JSON. Overwritten after every turn.
 */
export const conversationCheckpoints = mysqlTable("conversation_checkpoints", {
  /** Session identifier (nanoid, or caller-supplied) */
  sessionId: varchar("sessionId", { length: 64 }).primaryKey(),
  /** Serialized conversation state */
  state: json("state").$type<Record<string, unknown>>().notNull(),
  /** Workflow progress index, duplicated out of `state` for listing */
  currentStep: int("currentStep").default(0).notNull(),
  /** Number of turns checkpointed for this session */
  turnCount: int("turnCount").default(0).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().onUpdateNow().notNull(),
});

export type ConversationCheckpoint = typeof conversationCheckpoints.$inferSelect;
export type InsertConversationCheckpoint = typeof conversationCheckpoints.$inferInsert;

/**
 * Conversation transcript — user messages and assistant replies per session.
 */
export const conversationMessages = mysqlTable(
  "conversation_messages",
  {
    id: int("id").autoincrement().primaryKey(),
    sessionId: varchar("sessionId", { length: 64 }).notNull(),
    role: mysqlEnum("role", ["user", "assistant"]).notNull(),
    content: text("content").notNull(),
    /** Intent the user message was classified as (assistant rows only) */
    intent: varchar("intent", { length: 32 }),
    createdAt: timestamp("createdAt").defaultNow().notNull(),
  },
  table => ({
    sessionIdx: index("conversation_messages_session_idx").on(table.sessionId),
  })
);

export type ConversationMessage = typeof conversationMessages.$inferSelect;
export type InsertConversationMessage = typeof conversationMessages.$inferInsert;

/**
 * LLM usage — one row per model invocation, written by llm/llmService.
 */
export const llmUsage = mysqlTable("llm_usage", {
  id: int("id").autoincrement().primaryKey(),
  model: varchar("model", { length: 256 }).notNull(),
  source: mysqlEnum("source", ["custom", "builtin", "fallback"]).notNull(),
  promptTokens: int("promptTokens").default(0).notNull(),
  completionTokens: int("completionTokens").default(0).notNull(),
  totalTokens: int("totalTokens").default(0).notNull(),
  latencyMs: int("latencyMs").default(0).notNull(),
  /** Component that issued the call (e.g. "intent-classifier") */
  caller: varchar("caller", { length: 64 }),
  success: int("success").default(1).notNull(),
  errorMessage: text("errorMessage"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

export type LlmUsage = typeof llmUsage.$inferSelect;
export type InsertLlmUsage = typeof llmUsage.$inferInsert;
