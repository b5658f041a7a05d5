// ============================================================
// Setup Script — Create the Pinecone Index
// ============================================================
// Usage:  npm run setup:index
//
// Creates PINECONE_INDEX_NAME (cosine, EMBEDDING_DIMENSIONS) if
// it does not exist yet, then prints its stats.
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { loadConfig, requireSetting } from "../config/env";
import { getPineconeClient } from "../config/pinecone";
import { ensureIndex } from "../modules/knowledge/ingest.service";
import { getErrorMessage } from "../utils/errors";

const main = async () => {
  const config = loadConfig();
  const pinecone = getPineconeClient(requireSetting(config, "PINECONE_API_KEY"));

  await ensureIndex(pinecone, {
    name: config.PINECONE_INDEX_NAME,
    dimension: config.EMBEDDING_DIMENSIONS,
  });

  const stats = await pinecone.index(config.PINECONE_INDEX_NAME).describeIndexStats();
  console.log(
    `[Knowledge] "${config.PINECONE_INDEX_NAME}": ${stats.totalRecordCount ?? 0} vectors, ${stats.dimension ?? config.EMBEDDING_DIMENSIONS} dimensions`
  );
  if (!stats.totalRecordCount) {
    console.log("[Knowledge] Index is empty. Run `npm run ingest` to upload documents.");
  }
};

main().catch((error) => {
  console.error(`[Knowledge] Index setup failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
