// ============================================================
// Conversation Store — Session History
// ============================================================
// The chat service reads the last few exchanges before every
// agent run (so follow-ups like "what about its treatment?"
// make sense) and appends the new exchange afterwards.
//
// Two implementations behind one interface:
//   MongoConversationStore     → MONGODB_URI is set
//   InMemoryConversationStore  → default; also used by tests
//
// The in-memory store is for development and single-process use.
// It forgets everything on restart and keeps at most `maxSessions`
// sessions; past that, the least recently written one is dropped.
//
// history() returns null for a session that never existed, and
// [] for one that exists but was cleared. GET /conversation/:id
// answers differently for the two.
// ============================================================

import { ConversationExchange } from "../../types";
import Session from "./conversation.model";

export interface ConversationStore {
  readonly backend: string;
  /** The last `turns` exchanges, oldest first. */
  recent(sessionId: string, turns: number): Promise<ConversationExchange[]>;
  /** Append an exchange, keeping only the newest `keep`. */
  append(sessionId: string, exchange: ConversationExchange, keep: number): Promise<void>;
  history(sessionId: string): Promise<ConversationExchange[] | null>;
  /** Empty an existing session. Unknown sessions are left alone. */
  clear(sessionId: string): Promise<void>;
}

export const DEFAULT_MAX_SESSIONS = 1000;

export class InMemoryConversationStore implements ConversationStore {
  readonly backend = "In-memory";
  // Map iteration order is insertion order, so the first key is the stalest
  private readonly sessions = new Map<string, ConversationExchange[]>();

  constructor(private readonly maxSessions: number = DEFAULT_MAX_SESSIONS) {}

  async recent(sessionId: string, turns: number): Promise<ConversationExchange[]> {
    if (turns <= 0) return [];
    return (this.sessions.get(sessionId) ?? []).slice(-turns);
  }

  async append(sessionId: string, exchange: ConversationExchange, keep: number): Promise<void> {
    const exchanges = [...(this.sessions.get(sessionId) ?? []), exchange];
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, exchanges.slice(-keep));

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }
  }

  async history(sessionId: string): Promise<ConversationExchange[] | null> {
    const exchanges = this.sessions.get(sessionId);
    return exchanges ? [...exchanges] : null;
  }

  async clear(sessionId: string): Promise<void> {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }
}

const toExchange = (exchange: ConversationExchange): ConversationExchange => ({
  userMessage: exchange.userMessage,
  botResponse: exchange.botResponse,
  timestamp: exchange.timestamp,
  toolsUsed: [...exchange.toolsUsed],
});

export class MongoConversationStore implements ConversationStore {
  readonly backend = "MongoDB";

  async recent(sessionId: string, turns: number): Promise<ConversationExchange[]> {
    if (turns <= 0) return [];
    // $slice projection: only the newest `turns` exchanges leave the database
    const session = await Session.findOne(
      { sessionId },
      { exchanges: { $slice: -turns } }
    ).lean();
    return session ? session.exchanges.map(toExchange) : [];
  }

  async append(sessionId: string, exchange: ConversationExchange, keep: number): Promise<void> {
    // upsert creates the session on its first message
    await Session.updateOne(
      { sessionId },
      { $push: { exchanges: { $each: [exchange], $slice: -keep } } },
      { upsert: true }
    );
  }

  async history(sessionId: string): Promise<ConversationExchange[] | null> {
    const session = await Session.findOne({ sessionId }).lean();
    return session ? session.exchanges.map(toExchange) : null;
  }

  async clear(sessionId: string): Promise<void> {
    await Session.updateOne({ sessionId }, { $set: { exchanges: [] } });
  }
}
