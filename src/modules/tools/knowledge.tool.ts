// ============================================================
// rag_tool — Health Knowledge Base Search
// ============================================================
// The model's FIRST stop for medical questions. Returns the 7
// closest knowledge-base passages, or a message that nudges the
// model toward web search when the knowledge base cannot help.
// ============================================================

import { z } from "zod";
import { getErrorMessage, preview } from "../../utils/errors";
import { KnowledgeRetriever } from "../knowledge/retriever.service";
import { AgentTool, defineTool } from "./tool";

export const KNOWLEDGE_TOP_K = 7;

export const KNOWLEDGE_HEADER = "**📚 From the Health Knowledge Base:**";
export const KNOWLEDGE_EMPTY =
  "📚 I couldn't find specific information about that in our health knowledge base. Let me search for current health information online to help you better.";
export const KNOWLEDGE_UNAVAILABLE =
  "📚 The health knowledge base is currently unavailable. I'll use web search to find current medical information for you.";
export const KNOWLEDGE_ERROR =
  "⚠️ An error occurred while searching our health knowledge base. Let me search the web for current health information instead.";

// Results shorter than this are treated as "nothing found"
const MIN_RESULT_LENGTH = 20;

const isIndexMissing = (error: unknown): boolean => {
  if (error instanceof Error && error.name === "PineconeNotFoundError") return true;
  const message = getErrorMessage(error);
  return message.includes("NOT_FOUND") || message.toLowerCase().includes("not found");
};

export const createKnowledgeTool = (
  retriever: KnowledgeRetriever,
  topK: number = KNOWLEDGE_TOP_K
): AgentTool =>
  defineTool({
    name: "rag_tool",
    description:
      "📚 Retrieve relevant health information from the medical knowledge base. " +
      "It contains medical documents covering diseases, treatments, medications, symptoms, prevention, diagnosis and wellness.",
    activity: "📚 Searching the health knowledge base...",
    parameters: {
      query: { description: "The health question or topic to look up" },
    },
    schema: z.object({ query: z.string().min(1) }),
    handler: async ({ query }) => {
      try {
        console.log(`[Knowledge] Searching knowledge base for: ${preview(query)}`);
        const passages = await retriever.search(query, topK);
        const text = passages.map((passage) => passage.text).join("\n\n");

        if (text.trim().length < MIN_RESULT_LENGTH) {
          console.warn("[Knowledge] No relevant results found in knowledge base");
          return KNOWLEDGE_EMPTY;
        }

        console.log(`[Knowledge] Found ${passages.length} passages`);
        return `${KNOWLEDGE_HEADER}\n\n${text}`;
      } catch (error) {
        console.error(`[Knowledge] Search failed: ${getErrorMessage(error)}`);
        if (isIndexMissing(error)) {
          console.warn("[Knowledge] Index not found, deferring to web search");
          return KNOWLEDGE_UNAVAILABLE;
        }
        return KNOWLEDGE_ERROR;
      }
    },
  });
