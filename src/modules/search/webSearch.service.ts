// ============================================================
// Web Search Service — Brave Search API
// ============================================================
// GET https://api.search.brave.com/res/v1/web/search?q=...
//   header X-Subscription-Token: <BRAVE_API_KEY>
//
// Brave wraps matched words in <strong> tags inside descriptions;
// those are stripped before the text reaches the model.
//
// A 429 (rate limited) gets ONE retry after a short pause.
// ============================================================

import axios, { AxiosInstance } from "axios";
import { z } from "zod";

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchClient {
  search(query: string, count: number): Promise<WebSearchResult[]>;
}

const braveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(
        z.object({
          title: z.string().default(""),
          url: z.string().default(""),
          description: z.string().optional(),
          snippet: z.string().optional(),
        })
      ),
    })
    .optional(),
});

const stripTags = (text: string): string => text.replace(/<[^>]+>/g, "");

/**
 * Pull results out of a Brave response body. Anything that
 * does not look like a Brave response yields no results.
 */
export const parseBraveResults = (body: unknown): WebSearchResult[] => {
  const parsed = braveResponseSchema.safeParse(body);
  if (!parsed.success || !parsed.data.web) return [];

  return parsed.data.web.results.map((result) => ({
    title: stripTags(result.title),
    url: result.url,
    snippet: stripTags(result.description ?? result.snippet ?? ""),
  }));
};

const RATE_LIMIT_PAUSE_MS = 2000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class BraveSearchClient implements WebSearchClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: "https://api.search.brave.com/res/v1",
        timeout: 10000,
      });
  }

  async search(query: string, count: number): Promise<WebSearchResult[]> {
    try {
      return await this.request(query, count);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 429) {
        console.warn("[Search] Rate limited, retrying once...");
        await sleep(RATE_LIMIT_PAUSE_MS);
        return this.request(query, count);
      }
      throw error;
    }
  }

  private async request(query: string, count: number): Promise<WebSearchResult[]> {
    const response = await this.http.get<unknown>("/web/search", {
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": this.apiKey,
      },
      params: {
        q: query,
        count,
        search_lang: "en",
        safesearch: "moderate",
      },
    });
    return parseBraveResults(response.data);
  }
}
