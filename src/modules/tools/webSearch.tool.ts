// ============================================================
// medical_web_search — Current Information from Trusted Sites
// ============================================================
// The query is pinned to well-known health publishers so the
// model gets WHO/CDC/NIH-grade sources rather than forums.
// ============================================================

import { z } from "zod";
import { getErrorMessage, preview } from "../../utils/errors";
import { WebSearchClient, WebSearchResult } from "../search/webSearch.service";
import { AgentTool, defineTool } from "./tool";

export const WEB_SEARCH_MAX_RESULTS = 3;

export const TRUSTED_SITES_SUFFIX =
  " health medical wellness site:who.int OR site:mayoclinic.org OR site:webmd.com OR site:healthline.com OR site:medlineplus.gov OR site:cdc.gov OR site:nih.gov";

export const SEARCH_INDICATOR = "🔍 **Searching web for latest medical information...**\n\n";
export const WEB_RESULTS_HEADER = "**🌐 Latest Health Information from Web:**";
export const WEB_NO_RESULTS =
  "I couldn't find current web information about that health topic. Please consult with a healthcare professional for the most accurate information.";
export const WEB_SEARCH_ERROR =
  "⚠️ An error occurred while searching for health information online. Please try again or consult with a healthcare professional.";

const MIN_RESULT_LENGTH = 20;

export const formatSearchResults = (results: WebSearchResult[]): string =>
  results
    .map((result) => `[snippet: ${result.snippet}, title: ${result.title}, link: ${result.url}]`)
    .join("\n");

export const createWebSearchTool = (
  client: WebSearchClient,
  maxResults: number = WEB_SEARCH_MAX_RESULTS
): AgentTool =>
  defineTool({
    name: "medical_web_search",
    description:
      "🔍 Search the web for medical, health and wellness information. " +
      "Use it for conditions, symptoms, treatments, nutrition, fitness, mental health, preventive care and recent research, " +
      "especially when current or broader perspectives are needed beyond the knowledge base.",
    activity: "🔍 Searching web for latest medical information...",
    parameters: {
      query: { description: "What to search for" },
    },
    schema: z.object({ query: z.string().min(1) }),
    handler: async ({ query }) => {
      try {
        console.log(`[Search] Medical web search for: ${preview(query)}`);
        const results = await client.search(`${query}${TRUSTED_SITES_SUFFIX}`, maxResults);
        const text = formatSearchResults(results);

        if (text.trim().length < MIN_RESULT_LENGTH) {
          console.warn("[Search] No relevant medical web results found");
          return `${SEARCH_INDICATOR}${WEB_NO_RESULTS}`;
        }

        console.log(`[Search] ${results.length} results`);
        return `${SEARCH_INDICATOR}${WEB_RESULTS_HEADER}\n\n${text}`;
      } catch (error) {
        console.error(`[Search] Web search failed: ${getErrorMessage(error)}`);
        return WEB_SEARCH_ERROR;
      }
    },
  });
