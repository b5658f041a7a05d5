import { KnowledgeRetriever } from "../knowledge/retriever.service";
import { WebSearchClient } from "../search/webSearch.service";
import { createDiseasePredictionTool } from "./diseasePrediction.tool";
import { createKnowledgeTool } from "./knowledge.tool";
import { AgentTool } from "./tool";
import { createWebSearchTool } from "./webSearch.tool";

export interface MedicalToolDependencies {
  retriever?: KnowledgeRetriever;
  webSearch?: WebSearchClient;
}

/**
 * The tools bound to the agent, in the order the model sees them:
 * knowledge base, prediction, web search. A tool whose backing
 * service is not configured is left out, so the model never
 * plans around it.
 */
export const createMedicalTools = ({ retriever, webSearch }: MedicalToolDependencies): AgentTool[] => {
  const tools: AgentTool[] = [];
  if (retriever) tools.push(createKnowledgeTool(retriever));
  tools.push(createDiseasePredictionTool());
  if (webSearch) tools.push(createWebSearchTool(webSearch));
  return tools;
};
