// ============================================================
// Pinecone Vector Database Configuration
// ============================================================
// The health knowledge base lives in a single Pinecone index.
// Ingestion (scripts/ingest-documents.ts) fills it with PDF
// chunks; the rag_tool and nothing else reads from it.
//
//   PDF → text chunks → Gemini embeddings → Pinecone
//   question → Gemini embedding → Pinecone query → passages
//
// SETUP:
//   npm run setup:index   creates the index (cosine metric,
//                         EMBEDDING_DIMENSIONS, serverless AWS)
//   npm run ingest        uploads ./data/**/*.pdf
// ============================================================

import { Pinecone } from "@pinecone-database/pinecone";

let client: Pinecone | null = null;

export const getPineconeClient = (apiKey: string): Pinecone => {
  if (!client) {
    client = new Pinecone({ apiKey });
  }
  return client;
};

/**
 * Serverless placement for new indexes. Matches the free tier.
 */
export const INDEX_SPEC = {
  serverless: {
    cloud: "aws",
    region: "us-east-1",
  },
} as const;
