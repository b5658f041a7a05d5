// ============================================================
// Tool Definition
// ============================================================
// A tool is something the model can ask us to run. Each one has:
//
//   name / description / parameters → sent to the LLM so it knows
//                                      WHEN and HOW to call it
//   schema                          → zod validation of the args
//                                      the LLM actually sent
//   activity                        → status line for the stream UI
//   handler                         → does the work, returns text
//
// Every parameter is a string. The model fills them from the
// conversation ("fever, headache", "2 days", "7/10 pain").
// ============================================================

import { z } from "zod";

export interface ToolParameter {
  description: string;
  required?: boolean;
}

/**
 * ToolDeclaration — the part of a tool the chat model sees.
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
}

export interface AgentTool extends ToolDeclaration {
  activity: string;
  run(args: Record<string, unknown>): Promise<string>;
}

interface ToolDefinition<TSchema extends z.ZodTypeAny> extends ToolDeclaration {
  activity: string;
  schema: TSchema;
  handler: (args: z.output<TSchema>) => Promise<string>;
}

/**
 * Bind a zod schema to a handler. Invalid arguments throw a
 * ZodError, which the agent's tool node turns into an observation.
 */
export const defineTool = <TSchema extends z.ZodTypeAny>(
  definition: ToolDefinition<TSchema>
): AgentTool => ({
  name: definition.name,
  description: definition.description,
  parameters: definition.parameters,
  activity: definition.activity,
  run: async (args) => definition.handler(definition.schema.parse(args)),
});
