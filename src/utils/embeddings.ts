// ============================================================
// Embeddings Utility (Gemini)
// ============================================================
// Text → vector, via ai.models.embedContent.
//
// Two task types matter for retrieval quality:
//   RETRIEVAL_QUERY     → the user's question (rag_tool)
//   RETRIEVAL_DOCUMENT  → knowledge-base chunks (ingestion)
// Gemini tunes the vector for each side of the search.
//
// The output dimensionality MUST equal the Pinecone index
// dimension (EMBEDDING_DIMENSIONS, 768 by default).
// ============================================================

import { GoogleGenAI } from "@google/genai";

export interface Embedder {
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingOptions {
  model: string;
  dimensions: number;
}

const toVectors = (
  embeddings: { values?: number[] }[] | undefined,
  expected: number
): number[][] => {
  if (!embeddings || embeddings.length === 0) {
    throw new Error("No embeddings returned from Gemini");
  }
  if (embeddings.length !== expected) {
    throw new Error(`Expected ${expected} embeddings, got ${embeddings.length}`);
  }
  return embeddings.map((embedding, i) => {
    if (!embedding.values) {
      throw new Error(`Embedding ${i} has no values`);
    }
    return embedding.values;
  });
};

/**
 * Build an Embedder backed by Gemini's embedding model.
 */
export const createGeminiEmbedder = (
  ai: GoogleGenAI,
  { model, dimensions }: EmbeddingOptions
): Embedder => ({
  async embedQuery(text) {
    const response = await ai.models.embedContent({
      model,
      contents: text,
      config: { outputDimensionality: dimensions, taskType: "RETRIEVAL_QUERY" },
    });
    return toVectors(response.embeddings, 1)[0];
  },

  // One API call for the whole batch
  async embedDocuments(texts) {
    if (texts.length === 0) return [];
    const response = await ai.models.embedContent({
      model,
      contents: texts,
      config: { outputDimensionality: dimensions, taskType: "RETRIEVAL_DOCUMENT" },
    });
    return toVectors(response.embeddings, texts.length);
  },
});
