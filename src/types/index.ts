// ============================================================
// Type Definitions for the Medical Assistant API
// ============================================================
// Shapes shared across modules: the agent's message list, the
// conversation history we persist, and the HTTP payloads.
//
// The agent speaks its OWN message format (AgentMessage) rather
// than Gemini's Content objects. The Gemini chat model converts
// at the edge, so the loop and its tests never touch the SDK.
// ============================================================

// ── Agent Types ─────────────────────────────────────────────

/**
 * ToolCall — a model request to run one tool.
 * `id` pairs the request with the tool message that answers it.
 */
export interface ToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
  /** Opaque Gemini thinking signature, sent back with the call on the next turn. */
  thoughtSignature?: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface ModelMessage {
  role: "model";
  content: string;
  toolCalls: ToolCall[];
}

export interface ToolMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  content: string;
}

/**
 * AgentMessage — one entry in the agent's conversation state.
 *   user  → what the human typed (or a replayed past question)
 *   model → the LLM's reply, possibly asking for tools
 *   tool  → a tool's observation, fed back to the LLM
 */
export type AgentMessage = UserMessage | ModelMessage | ToolMessage;

/**
 * ModelTurn — what the chat model returns for one call.
 */
export interface ModelTurn {
  content: string;
  toolCalls: ToolCall[];
}

// ── Conversation Types ──────────────────────────────────────

/**
 * ConversationExchange — one question and its final answer.
 * Sessions keep the last HISTORY_LIMIT of these.
 */
export interface ConversationExchange {
  userMessage: string;
  botResponse: string;
  timestamp: Date;
  toolsUsed: string[];
}

// ── API Types ───────────────────────────────────────────────

/**
 * ChatReply — body of POST /chat.
 * Field names are snake_case to match what the web client reads.
 */
export interface ChatReply {
  response: string;
  response_html: string;
  timestamp: string;
  processing_time: number;
  tools_used: string[];
}

/**
 * StreamEvent — one server-sent event of POST /chat/stream.
 * Sent as `data: <json>\n\n`.
 */
export type StreamEvent =
  | { type: "start"; status: string }
  | { type: "tool_start"; tool_name: string; message: string }
  | { type: "tool_end"; tool_name?: string }
  | { type: "response_start" }
  | { type: "content"; content: string }
  | { type: "complete"; tools_used: string[] }
  | { type: "error"; content: string }
  | { type: "end" };

export interface HealthReport {
  status: string;
  timestamp: string;
  version: string;
  services: Record<string, string>;
}
