// ============================================================
// Agent Service — THE CONTROL LOOP
// ============================================================
// The agent is a two-node LangGraph state machine:
//
//        START
//          │
//          ▼
//     ┌──────────┐  tool calls?  ┌─────────────┐
//     │ llm_call │ ────Action───▶│ environment │
//     └──────────┘               └─────────────┘
//          │  ▲                         │
//          │  └─────────────────────────┘
//         END (no tool calls)
//
//   llm_call     → system prompt + messages + tool declarations
//                  go to the chat model; its reply is appended
//   environment  → every tool call of that reply runs in order;
//                  one tool message per call is appended
//
// State is just the message list. The reducer APPENDS, so each
// node returns only the messages it produced.
//
// FAILURE HANDLING:
//   A tool that is unknown, gets bad arguments, or throws does
//   NOT stop the loop. The model receives TOOL_ERROR_OBSERVATION
//   and answers from what it already knows.
//   A model that never stops calling tools hits the recursion
//   limit (AGENT_MAX_STEPS) and the run rejects.
// ============================================================

import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { AgentMessage, ModelMessage, ToolCall, ToolMessage } from "../../types";
import { getErrorMessage } from "../../utils/errors";
import { AgentTool } from "../tools/tool";
import { ChatModel } from "./llm.service";
import { SYSTEM_PROMPT } from "./system.prompt";

export const TOOL_ERROR_OBSERVATION =
  "⚠️ Tool error occurred. Providing response based on available knowledge.";

export const AgentState = Annotation.Root({
  messages: Annotation<AgentMessage[]>({
    reducer: (prev, next) => prev.concat(next),
    default: () => [],
  }),
});

type AgentStateType = typeof AgentState.State;

/**
 * Hooks for callers that want to show progress (the SSE stream).
 */
export interface AgentListener {
  onToolStart?(call: ToolCall, tool: AgentTool | undefined): void;
  onToolEnd?(call: ToolCall, output: string): void;
}

export interface AgentRunResult {
  messages: AgentMessage[];
  reply: string;
  toolsUsed: string[];
}

export interface MedicalAgentOptions {
  model: ChatModel;
  tools: AgentTool[];
  maxSteps: number;
  systemPrompt?: string;
}

const lastMessage = (messages: AgentMessage[]): AgentMessage | undefined =>
  messages[messages.length - 1];

/**
 * Route after llm_call: "Action" when the model asked for tools.
 */
export const shouldContinue = (state: AgentStateType): "Action" | "END" => {
  const last = lastMessage(state.messages);
  if (last && last.role === "model" && last.toolCalls.length > 0) {
    return "Action";
  }
  return "END";
};

/**
 * Distinct tool names requested by the model, in first-request order.
 */
export const collectToolsUsed = (messages: AgentMessage[]): string[] => {
  const used: string[] = [];
  for (const message of messages) {
    if (message.role !== "model") continue;
    for (const call of message.toolCalls) {
      if (!used.includes(call.name)) used.push(call.name);
    }
  }
  return used;
};

export class MedicalAgent {
  private readonly toolsByName: Map<string, AgentTool>;
  private readonly systemPrompt: string;

  constructor(private readonly options: MedicalAgentOptions) {
    this.toolsByName = new Map(options.tools.map((tool) => [tool.name, tool]));
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  get toolNames(): string[] {
    return [...this.toolsByName.keys()];
  }

  /**
   * Run the loop until the model answers without tool calls.
   */
  async run(messages: AgentMessage[], listener: AgentListener = {}): Promise<AgentRunResult> {
    const graph = this.buildGraph(listener);

    // Each model call and each tool round is one graph step
    const state = await graph.invoke(
      { messages },
      { recursionLimit: this.options.maxSteps * 2 }
    );

    const last = lastMessage(state.messages);
    return {
      messages: state.messages,
      reply: last && last.role === "model" ? last.content : "",
      toolsUsed: collectToolsUsed(state.messages),
    };
  }

  private buildGraph(listener: AgentListener) {
    const llmCall = async (state: AgentStateType) => {
      const turn = await this.options.model.invoke(state.messages, {
        systemInstruction: this.systemPrompt,
        tools: this.options.tools,
      });
      if (turn.toolCalls.length > 0) {
        console.log(`[Agent] Model requested tools: ${turn.toolCalls.map((c) => c.name).join(", ")}`);
      }
      const reply: ModelMessage = { role: "model", content: turn.content, toolCalls: turn.toolCalls };
      return { messages: [reply] };
    };

    const environment = async (state: AgentStateType) => {
      const last = lastMessage(state.messages);
      const calls = last && last.role === "model" ? last.toolCalls : [];
      const results: ToolMessage[] = [];

      for (const call of calls) {
        const tool = this.toolsByName.get(call.name);
        listener.onToolStart?.(call, tool);
        const content = await this.invokeTool(call, tool);
        listener.onToolEnd?.(call, content);
        results.push({ role: "tool", toolCallId: call.id, name: call.name, content });
      }

      return { messages: results };
    };

    return new StateGraph(AgentState)
      .addNode("llm_call", llmCall)
      .addNode("environment", environment)
      .addEdge(START, "llm_call")
      .addConditionalEdges("llm_call", shouldContinue, {
        Action: "environment",
        END: END,
      })
      .addEdge("environment", "llm_call")
      .compile();
  }

  private async invokeTool(call: ToolCall, tool: AgentTool | undefined): Promise<string> {
    if (!tool) {
      console.error(`[Agent] Unknown tool requested: ${call.name}`);
      return TOOL_ERROR_OBSERVATION;
    }
    try {
      return await tool.run(call.args);
    } catch (error) {
      console.error(`[Agent] Tool ${call.name} failed: ${getErrorMessage(error)}`);
      return TOOL_ERROR_OBSERVATION;
    }
  }
}
