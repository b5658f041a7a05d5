// ============================================================
// Chat Service — Conversation Around the Agent
// ============================================================
// Everything between an HTTP request and the agent loop:
//
//   1. Load the session's last HISTORY_TURNS exchanges
//   2. Replay them as user/model messages + add the new question
//   3. Run the agent (model ⇄ tools until it answers)
//   4. Render the answer (HTML for /chat, chunks for /chat/stream)
//   5. Store the exchange, keeping the last HISTORY_LIMIT
//
// The chat endpoints never fail with a 5xx because the model or
// a tool misbehaved: failures become a canned apology (JSON) or
// an "error" event (stream).
// ============================================================

import {
  AgentMessage,
  ChatReply,
  ConversationExchange,
  StreamEvent,
} from "../../types";
import { getErrorMessage, preview } from "../../utils/errors";
import { chunkMarkdown, renderMarkdown } from "../../utils/markdown";
import { AgentListener, AgentRunResult } from "../agent/agent.service";
import { ConversationStore } from "./conversation.store";

export const DEFAULT_SESSION_ID = "default_session";

export const NO_REPLY_MESSAGE =
  "I apologize, but I'm having trouble processing your request right now. Please try again.";
export const CHAT_ERROR_MESSAGE =
  "❌ I encountered an error while processing your medical query. Please try rephrasing your question or try again in a moment.";
export const STREAM_ERROR_MESSAGE = "Sorry, there was an error processing your request.";
export const STREAM_START_STATUS = "Processing your medical query...";

/**
 * What the chat service needs from the agent. MedicalAgent fits.
 */
export interface ChatAgent {
  run(messages: AgentMessage[], listener?: AgentListener): Promise<AgentRunResult>;
}

export interface ChatServiceOptions {
  agent: ChatAgent;
  store: ConversationStore;
  historyTurns: number;
  historyLimit: number;
}

const secondsSince = (startedAt: number): number => (Date.now() - startedAt) / 1000;

/**
 * Replay past exchanges as alternating user/model messages.
 */
export const toAgentMessages = (
  history: ConversationExchange[],
  newMessage: string
): AgentMessage[] => [
  ...history.flatMap((exchange): AgentMessage[] => [
    { role: "user", content: exchange.userMessage },
    { role: "model", content: exchange.botResponse, toolCalls: [] },
  ]),
  { role: "user", content: newMessage },
];

export class ChatService {
  constructor(private readonly options: ChatServiceOptions) {}

  get storageBackend(): string {
    return this.options.store.backend;
  }

  /**
   * Run one question through the agent and return the full reply.
   */
  async sendMessage(sessionId: string, message: string): Promise<ChatReply> {
    const startedAt = Date.now();

    try {
      console.log(`[Chat] Processing message: ${preview(message)}`);
      const messages = await this.buildMessages(sessionId, message);
      const result = await this.options.agent.run(messages);

      const response = result.reply || NO_REPLY_MESSAGE;
      const responseHtml = await renderMarkdown(response);

      await this.remember(sessionId, {
        userMessage: message,
        botResponse: response,
        timestamp: new Date(startedAt),
        toolsUsed: result.toolsUsed,
      });

      const processingTime = secondsSince(startedAt);
      console.log(
        `[Chat] Response generated in ${processingTime.toFixed(2)}s using tools: [${result.toolsUsed.join(", ")}]`
      );

      return {
        response,
        response_html: responseHtml,
        timestamp: new Date().toISOString(),
        processing_time: processingTime,
        tools_used: result.toolsUsed,
      };
    } catch (error) {
      console.error(`[Chat] Error processing message: ${getErrorMessage(error)}`);
      return {
        response: CHAT_ERROR_MESSAGE,
        response_html: `<p>${CHAT_ERROR_MESSAGE}</p>`,
        timestamp: new Date().toISOString(),
        processing_time: secondsSince(startedAt),
        tools_used: [],
      };
    }
  }

  /**
   * Same as sendMessage, but reports progress as stream events.
   *
   * EVENT ORDER:
   *   start → (tool_start → tool_end)* → tool_end → response_start
   *   → content* → complete → end
   * "error" replaces everything after the failure point; "end"
   * is ALWAYS the last event.
   */
  async streamMessage(
    sessionId: string,
    message: string,
    emit: (event: StreamEvent) => void
  ): Promise<void> {
    try {
      console.log(`[Chat] Streaming reply for: ${preview(message)}`);
      emit({ type: "start", status: STREAM_START_STATUS });

      const messages = await this.buildMessages(sessionId, message);
      const result = await this.options.agent.run(messages, {
        onToolStart: (call, tool) =>
          emit({
            type: "tool_start",
            tool_name: call.name,
            message: tool ? tool.activity : `Running ${call.name}...`,
          }),
        onToolEnd: (call) => emit({ type: "tool_end", tool_name: call.name }),
      });

      emit({ type: "tool_end" });

      if (!result.reply) {
        emit({ type: "error", content: NO_REPLY_MESSAGE });
        return;
      }

      emit({ type: "response_start" });
      for (const chunk of chunkMarkdown(result.reply)) {
        emit({ type: "content", content: chunk });
      }

      await this.remember(sessionId, {
        userMessage: message,
        botResponse: result.reply,
        timestamp: new Date(),
        toolsUsed: result.toolsUsed,
      });

      emit({ type: "complete", tools_used: result.toolsUsed });
    } catch (error) {
      console.error(`[Chat] Stream error: ${getErrorMessage(error)}`);
      emit({ type: "error", content: STREAM_ERROR_MESSAGE });
    } finally {
      emit({ type: "end" });
    }
  }

  async getHistory(sessionId: string): Promise<ConversationExchange[] | null> {
    return this.options.store.history(sessionId);
  }

  async clearHistory(sessionId: string): Promise<void> {
    await this.options.store.clear(sessionId);
  }

  private async buildMessages(sessionId: string, message: string): Promise<AgentMessage[]> {
    const history = await this.options.store.recent(sessionId, this.options.historyTurns);
    return toAgentMessages(history, message);
  }

  private async remember(sessionId: string, exchange: ConversationExchange): Promise<void> {
    await this.options.store.append(sessionId, exchange, this.options.historyLimit);
  }
}
