import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import axios, { InternalAxiosRequestConfig } from "axios";
import { KnowledgePassage, KnowledgeRetriever } from "../modules/knowledge/retriever.service";
import { buildPredictionReport } from "../modules/prediction/prediction.service";
import {
  BraveSearchClient,
  WebSearchClient,
  WebSearchResult,
  parseBraveResults,
} from "../modules/search/webSearch.service";
import { createDiseasePredictionTool, predictionFailure } from "../modules/tools/diseasePrediction.tool";
import { createMedicalTools } from "../modules/tools";
import {
  KNOWLEDGE_EMPTY,
  KNOWLEDGE_ERROR,
  KNOWLEDGE_HEADER,
  KNOWLEDGE_UNAVAILABLE,
  createKnowledgeTool,
} from "../modules/tools/knowledge.tool";
import {
  SEARCH_INDICATOR,
  TRUSTED_SITES_SUFFIX,
  WEB_NO_RESULTS,
  WEB_RESULTS_HEADER,
  WEB_SEARCH_ERROR,
  createWebSearchTool,
} from "../modules/tools/webSearch.tool";

class FakeRetriever implements KnowledgeRetriever {
  calls: { query: string; topK: number }[] = [];

  constructor(private readonly outcome: KnowledgePassage[] | Error) {}

  async search(query: string, topK: number): Promise<KnowledgePassage[]> {
    this.calls.push({ query, topK });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

class FakeSearch implements WebSearchClient {
  calls: { query: string; count: number }[] = [];

  constructor(private readonly outcome: WebSearchResult[] | Error) {}

  async search(query: string, count: number): Promise<WebSearchResult[]> {
    this.calls.push({ query, count });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

const passage = (text: string): KnowledgePassage => ({ text, score: 0.9 });

class PineconeNotFoundError extends Error {
  name = "PineconeNotFoundError";
}

describe("rag_tool", () => {
  it("joins passages under the knowledge-base header", async () => {
    const retriever = new FakeRetriever([
      passage("Dengue spreads through Aedes mosquitoes."),
      passage("Rest and fluids help recovery."),
    ]);
    const output = await createKnowledgeTool(retriever).run({ query: "dengue" });

    assert.equal(
      output,
      `${KNOWLEDGE_HEADER}\n\nDengue spreads through Aedes mosquitoes.\n\nRest and fluids help recovery.`
    );
    assert.deepEqual(retriever.calls, [{ query: "dengue", topK: 7 }]);
  });

  it("treats short or empty results as nothing found", async () => {
    assert.equal(await createKnowledgeTool(new FakeRetriever([])).run({ query: "x" }), KNOWLEDGE_EMPTY);
    assert.equal(
      await createKnowledgeTool(new FakeRetriever([passage("too short")])).run({ query: "x" }),
      KNOWLEDGE_EMPTY
    );
  });

  it("reports a missing index as unavailable", async () => {
    const notFound = createKnowledgeTool(new FakeRetriever(new Error("Index medical-knowledge NOT_FOUND")));
    assert.equal(await notFound.run({ query: "x" }), KNOWLEDGE_UNAVAILABLE);

    const http404 = createKnowledgeTool(new FakeRetriever(new Error("HTTP 404: Not Found")));
    assert.equal(await http404.run({ query: "x" }), KNOWLEDGE_UNAVAILABLE);
  });

  it("recognises the client's not-found error by name", async () => {
    const tool = createKnowledgeTool(new FakeRetriever(new PineconeNotFoundError("missing index")));
    assert.equal(await tool.run({ query: "x" }), KNOWLEDGE_UNAVAILABLE);
  });

  it("reports other failures as a search error", async () => {
    const tool = createKnowledgeTool(new FakeRetriever(new Error("socket hang up")));
    assert.equal(await tool.run({ query: "x" }), KNOWLEDGE_ERROR);
  });

  it("rejects arguments without a query", async () => {
    const tool = createKnowledgeTool(new FakeRetriever([]));
    await assert.rejects(tool.run({}), { name: "ZodError" });
  });
});

describe("medical_web_search", () => {
  it("pins the query to trusted sites and formats the results", async () => {
    const search = new FakeSearch([
      { title: "Flu basics", url: "https://example.org/flu", snippet: "Influenza is a viral infection." },
      { title: "Flu care", url: "https://example.org/care", snippet: "Rest at home." },
    ]);
    const output = await createWebSearchTool(search).run({ query: "flu treatment" });

    assert.deepEqual(search.calls, [{ query: `flu treatment${TRUSTED_SITES_SUFFIX}`, count: 3 }]);
    assert.equal(
      output,
      `${SEARCH_INDICATOR}${WEB_RESULTS_HEADER}\n\n` +
        "[snippet: Influenza is a viral infection., title: Flu basics, link: https://example.org/flu]\n" +
        "[snippet: Rest at home., title: Flu care, link: https://example.org/care]"
    );
  });

  it("says so when nothing was found", async () => {
    const output = await createWebSearchTool(new FakeSearch([])).run({ query: "rare thing" });
    assert.equal(output, `${SEARCH_INDICATOR}${WEB_NO_RESULTS}`);
  });

  it("turns failures into the canned error", async () => {
    const output = await createWebSearchTool(new FakeSearch(new Error("timeout"))).run({ query: "flu" });
    assert.equal(output, WEB_SEARCH_ERROR);
  });
});

describe("disease_prediction", () => {
  it("defaults additional_info to an empty string", async () => {
    const output = await createDiseasePredictionTool().run({
      symptoms: "cough",
      duration: "today",
      severity: "mild",
    });
    assert.equal(
      output,
      buildPredictionReport({ symptoms: "cough", duration: "today", severity: "mild", additionalInfo: "" })
    );
  });

  it("turns analysis failures into the canned message", async () => {
    const tool = createDiseasePredictionTool(() => {
      throw new Error("bad input");
    });
    const output = await tool.run({ symptoms: "cough", duration: "today", severity: "mild" });
    assert.equal(output, predictionFailure("bad input"));
    assert.ok(output.startsWith("⚠️ Unable to perform disease prediction analysis at this time. Error: bad input"));
  });
});

describe("createMedicalTools", () => {
  it("registers only the configured tools", () => {
    assert.deepEqual(
      createMedicalTools({}).map((tool) => tool.name),
      ["disease_prediction"]
    );
    assert.deepEqual(
      createMedicalTools({ retriever: new FakeRetriever([]), webSearch: new FakeSearch([]) }).map(
        (tool) => tool.name
      ),
      ["rag_tool", "disease_prediction", "medical_web_search"]
    );
  });
});

describe("parseBraveResults", () => {
  it("strips highlight tags and falls back to the snippet field", () => {
    const results = parseBraveResults({
      web: {
        results: [
          { title: "<strong>Flu</strong> facts", url: "https://example.org/a", description: "About <strong>flu</strong>" },
          { title: "Cold", url: "https://example.org/b", snippet: "Common cold" },
          { title: "Empty", url: "https://example.org/c" },
        ],
      },
    });
    assert.deepEqual(results, [
      { title: "Flu facts", url: "https://example.org/a", snippet: "About flu" },
      { title: "Cold", url: "https://example.org/b", snippet: "Common cold" },
      { title: "Empty", url: "https://example.org/c", snippet: "" },
    ]);
  });

  it("returns nothing for an unexpected body", () => {
    assert.deepEqual(parseBraveResults({}), []);
    assert.deepEqual(parseBraveResults("nope"), []);
  });
});

describe("BraveSearchClient", () => {
  it("sends the key and query and parses the reply", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async (config) => {
        seen.push(config);
        return {
          data: { web: { results: [{ title: "Flu", url: "https://example.org/flu", description: "Flu info" }] } },
          status: 200,
          statusText: "OK",
          headers: {},
          config,
        };
      },
    });

    const results = await new BraveSearchClient("test-secret", http).search("flu", 3);

    assert.deepEqual(results, [{ title: "Flu", url: "https://example.org/flu", snippet: "Flu info" }]);
    assert.equal(seen.length, 1);
    assert.equal(seen[0].url, "/web/search");
    assert.equal(seen[0].headers["X-Subscription-Token"], "test-secret");
    assert.deepEqual(seen[0].params, { q: "flu", count: 3, search_lang: "en", safesearch: "moderate" });
  });
});
