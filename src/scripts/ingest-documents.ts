// ============================================================
// Ingestion Script — Upload PDFs to the Knowledge Base
// ============================================================
// Usage:  npm run ingest [-- <directory>]     (default: ./data)
//
//   1. Make sure the index exists
//   2. Load every PDF under the directory
//   3. Split into 500-char chunks (20-char overlap)
//   4. Embed + upsert 100 chunks at a time, pausing 2s between
//      batches; a failed batch is retried once after 10s
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import path from "node:path";
import { loadConfig, requireSetting } from "../config/env";
import { getGeminiClient } from "../config/gemini";
import { getPineconeClient } from "../config/pinecone";
import { uploadInBatches } from "../modules/knowledge/chunking";
import {
  ensureIndex,
  loadPdfDocuments,
  toKnowledgeChunks,
  upsertChunks,
} from "../modules/knowledge/ingest.service";
import { createGeminiEmbedder } from "../utils/embeddings";
import { getErrorMessage } from "../utils/errors";

const main = async () => {
  const config = loadConfig();
  const pinecone = getPineconeClient(requireSetting(config, "PINECONE_API_KEY"));
  const ai = getGeminiClient(requireSetting(config, "GEMINI_API_KEY"));
  const dataDir = path.resolve(process.argv[2] ?? "data");

  await ensureIndex(pinecone, {
    name: config.PINECONE_INDEX_NAME,
    dimension: config.EMBEDDING_DIMENSIONS,
  });

  const documents = await loadPdfDocuments(dataDir);
  const chunks = await toKnowledgeChunks(documents);
  console.log(`[Ingest] ${documents.length} document(s) → ${chunks.length} chunks`);

  if (chunks.length === 0) {
    console.warn(`[Ingest] Nothing to upload. Put PDF files in ${dataDir}`);
    return;
  }

  const target = {
    pinecone,
    embedder: createGeminiEmbedder(ai, {
      model: config.EMBEDDING_MODEL,
      dimensions: config.EMBEDDING_DIMENSIONS,
    }),
    indexName: config.PINECONE_INDEX_NAME,
    namespace: config.PINECONE_NAMESPACE,
  };

  const report = await uploadInBatches(chunks, (batch) => upsertChunks(target, batch));

  console.log(`[Ingest] Done: ${report.uploaded}/${report.total} chunks uploaded`);
  if (report.failedBatches.length > 0) {
    console.warn(`[Ingest] Skipped batches: ${report.failedBatches.join(", ")}`);
  }
};

main().catch((error) => {
  console.error(`[Ingest] Failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
