// ============================================================
// Google Gemini Configuration
// ============================================================
// One Gemini client serves both jobs the service has for it:
//
//   ai.models.generateContent  →  the agent's chat model (with tools)
//   ai.models.embedContent     →  query + document embeddings
//
// The client is created lazily so that importing this module
// (e.g. from tests) does not require GEMINI_API_KEY.
//
// Embedding dimensions MUST match the Pinecone index. The index
// setup script creates the index with EMBEDDING_DIMENSIONS, and
// every embedding call asks Gemini for the same size.
// ============================================================

import { GoogleGenAI } from "@google/genai";

let client: GoogleGenAI | null = null;

/**
 * Get (or create) the shared Gemini client.
 */
export const getGeminiClient = (apiKey: string): GoogleGenAI => {
  if (!client) {
    client = new GoogleGenAI({ apiKey });
  }
  return client;
};

export const LLM_PROVIDER_NAME = "Google Gemini";
