// ============================================================
// LLM Service — the Agent's Chat Model
// ============================================================
// The agent loop only needs one thing from an LLM:
//
//   invoke(messages, { systemInstruction, tools }) → ModelTurn
//
// where a ModelTurn is some text plus zero or more tool calls.
// ChatModel is that contract; GeminiChatModel fulfils it with
// Gemini's function calling.
//
// MESSAGE MAPPING (ours → Gemini Content):
//   user  → { role: "user",  parts: [{ text }] }
//   model → { role: "model", parts: [{ text }, { functionCall, thoughtSignature? }...] }
//   tool  → { role: "user",  parts: [{ functionResponse }] }
//           consecutive tool messages share ONE user turn, the
//           way Gemini expects parallel call results back
// ============================================================

import { Content, FunctionDeclaration, GoogleGenAI, Part, Schema, Type } from "@google/genai";
import { v4 as uuidv4 } from "uuid";
import { AgentMessage, ModelTurn, ToolCall } from "../../types";
import { ToolDeclaration } from "../tools/tool";

export interface ChatModelRequest {
  systemInstruction: string;
  tools: ToolDeclaration[];
}

export interface ChatModel {
  invoke(messages: AgentMessage[], request: ChatModelRequest): Promise<ModelTurn>;
}

export interface GeminiChatModelOptions {
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

const isFunctionResponseTurn = (content: Content | undefined): content is Content =>
  content !== undefined &&
  content.role === "user" &&
  (content.parts ?? []).length > 0 &&
  (content.parts ?? []).every((part) => part.functionResponse !== undefined);

/**
 * Convert the agent's message list into Gemini `contents`.
 */
export const toGeminiContents = (messages: AgentMessage[]): Content[] => {
  const contents: Content[] = [];

  for (const message of messages) {
    if (message.role === "user") {
      contents.push({ role: "user", parts: [{ text: message.content }] });
      continue;
    }

    if (message.role === "model") {
      const parts: Part[] = [];
      if (message.content) parts.push({ text: message.content });
      for (const call of message.toolCalls) {
        parts.push({
          functionCall: { id: call.id, name: call.name, args: call.args },
          ...(call.thoughtSignature ? { thoughtSignature: call.thoughtSignature } : {}),
        });
      }
      if (parts.length > 0) contents.push({ role: "model", parts });
      continue;
    }

    const part: Part = {
      functionResponse: {
        id: message.toolCallId,
        name: message.name,
        response: { output: message.content },
      },
    };
    const previous = contents[contents.length - 1];
    if (isFunctionResponseTurn(previous)) {
      previous.parts = [...(previous.parts ?? []), part];
    } else {
      contents.push({ role: "user", parts: [part] });
    }
  }

  return contents;
};

export const toFunctionDeclaration = (tool: ToolDeclaration): FunctionDeclaration => {
  const properties: Record<string, Schema> = {};
  const required: string[] = [];
  for (const [name, parameter] of Object.entries(tool.parameters)) {
    properties[name] = { type: Type.STRING, description: parameter.description };
    if (parameter.required !== false) required.push(name);
  }
  return {
    name: tool.name,
    description: tool.description,
    parameters: { type: Type.OBJECT, properties, required },
  };
};

/**
 * Read text and function calls out of a candidate's parts.
 * Thought parts are skipped. Calls without an id get one so the
 * tool message can point back at them.
 */
export const parseModelTurn = (
  parts: Part[] | undefined,
  makeId: () => string = () => `call_${uuidv4().slice(0, 8)}`
): ModelTurn => {
  const text: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const part of parts ?? []) {
    if (part.functionCall?.name) {
      toolCalls.push({
        id: part.functionCall.id || makeId(),
        name: part.functionCall.name,
        args: part.functionCall.args ?? {},
        ...(part.thoughtSignature ? { thoughtSignature: part.thoughtSignature } : {}),
      });
    } else if (typeof part.text === "string" && !part.thought) {
      text.push(part.text);
    }
  }

  return { content: text.join(""), toolCalls };
};

export class GeminiChatModel implements ChatModel {
  constructor(
    private readonly ai: GoogleGenAI,
    private readonly options: GeminiChatModelOptions
  ) {}

  async invoke(messages: AgentMessage[], request: ChatModelRequest): Promise<ModelTurn> {
    const response = await this.ai.models.generateContent({
      model: this.options.model,
      contents: toGeminiContents(messages),
      config: {
        systemInstruction: request.systemInstruction,
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
        tools:
          request.tools.length > 0
            ? [{ functionDeclarations: request.tools.map(toFunctionDeclaration) }]
            : undefined,
      },
    });

    return parseModelTurn(response.candidates?.[0]?.content?.parts);
  }
}
