/**
 * Checkpoint store — persists conversation state and transcript per session.
 *
 * The MySQL implementation keeps one JSON row per session in
 * conversation_checkpoints and one row per message in conversation_messages.
 * Without DATABASE_URL the in-memory implementation is used.
 */

import { desc, eq, sql } from "drizzle-orm";
import { conversationCheckpoints, conversationMessages } from "../../drizzle/schema";
import { ENV } from "../_core/env";
import { getDb } from "../db";
import { parseConversationState, type ConversationState } from "./conversationState";

export interface TranscriptMessage {
  role: "user" | "assistant";
  content: string;
  intent?: string | null;
  createdAt?: Date;
}

export interface CheckpointStore {
  load(sessionId: string): Promise<ConversationState | null>;
  save(sessionId: string, state: ConversationState): Promise<void>;
  appendMessages(sessionId: string, messages: TranscriptMessage[]): Promise<void>;
  history(sessionId: string, limit?: number): Promise<TranscriptMessage[]>;
}

function toJsonRecord(state: ConversationState): Record<string, unknown> {
  const parsed: unknown = JSON.parse(JSON.stringify(state));
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
}

// ── In-memory ───────────────────────────────────────────────────────────────

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly states = new Map<string, string>();
  private readonly transcripts = new Map<string, TranscriptMessage[]>();

  async load(sessionId: string): Promise<ConversationState | null> {
    const raw = this.states.get(sessionId);
    return raw === undefined ? null : parseConversationState(JSON.parse(raw));
  }

  async save(sessionId: string, state: ConversationState): Promise<void> {
    this.states.set(sessionId, JSON.stringify(state));
  }

  async appendMessages(sessionId: string, messages: TranscriptMessage[]): Promise<void> {
    const transcript = this.transcripts.get(sessionId) ?? [];
    const now = new Date();
    for (const message of messages) {
      transcript.push({ ...message, createdAt: message.createdAt ?? now });
    }
    this.transcripts.set(sessionId, transcript);
  }

  async history(sessionId: string, limit = 200): Promise<TranscriptMessage[]> {
    const transcript = this.transcripts.get(sessionId) ?? [];
    return transcript.slice(-limit).map(message => ({ ...message }));
  }
}

// ── MySQL (drizzle) ─────────────────────────────────────────────────────────

export class DrizzleCheckpointStore implements CheckpointStore {
  async load(sessionId: string): Promise<ConversationState | null> {
    const db = await getDb();
    if (!db) throw new Error("Database not available");

    const rows = await db
      .select()
      .from(conversationCheckpoints)
      .where(eq(conversationCheckpoints.sessionId, sessionId))
      .limit(1);
    return rows.length > 0 ? parseConversationState(rows[0].state) : null;
  }

  async save(sessionId: string, state: ConversationState): Promise<void> {
    const db = await getDb();
    if (!db) throw new Error("Database not available");

    const json = toJsonRecord(state);
    const currentStep = state.currentStep ?? 0;
    await db
      .insert(conversationCheckpoints)
      .values({ sessionId, state: json, currentStep, turnCount: 1 })
      .onDuplicateKeyUpdate({
        set: {
          state: json,
          currentStep,
          turnCount: sql`${conversationCheckpoints.turnCount} + 1`,
        },
      });
  }

  async appendMessages(sessionId: string, messages: TranscriptMessage[]): Promise<void> {
    if (messages.length === 0) return;
    const db = await getDb();
    if (!db) throw new Error("Database not available");

    await db.insert(conversationMessages).values(
      messages.map(message => ({
        sessionId,
        role: message.role,
        content: message.content,
        intent: message.intent ?? null,
      }))
    );
  }

  async history(sessionId: string, limit = 200): Promise<TranscriptMessage[]> {
    const db = await getDb();
    if (!db) throw new Error("Database not available");

    const rows = await db
      .select()
      .from(conversationMessages)
      .where(eq(conversationMessages.sessionId, sessionId))
      .orderBy(desc(conversationMessages.id))
      .limit(limit);

    return rows.reverse().map(row => ({
      role: row.role,
      content: row.content,
      intent: row.intent,
      createdAt: row.createdAt,
    }));
  }
}

let defaultStore: CheckpointStore | null = null;

/**
 * MySQL-backed store when DATABASE_URL is set, otherwise a process-local one.
 */
export function getCheckpointStore(): CheckpointStore {
  if (defaultStore) return defaultStore;
  if (ENV.databaseUrl) {
    defaultStore = new DrizzleCheckpointStore();
  } else {
    console.warn("[Assistant] DATABASE_URL not set; conversation checkpoints are kept in memory");
    defaultStore = new InMemoryCheckpointStore();
  }
  return defaultStore;
}
