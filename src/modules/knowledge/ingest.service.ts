// ============================================================
// Knowledge-Base Ingestion — PDFs → Pinecone
// ============================================================
// Used by the two CLI scripts in src/scripts:
//
//   ensureIndex()       create the index if it does not exist
//   loadPdfDocuments()  read every *.pdf under a directory
//   toKnowledgeChunks() split documents into ~500-char chunks
//   upsertChunks()      embed + upsert one batch into Pinecone
//
// Each vector carries { text, source } as metadata; the
// retriever reads `text` back out at query time.
// ============================================================

import { Pinecone, PineconeRecord } from "@pinecone-database/pinecone";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import pdfParse from "pdf-parse";
import { v4 as uuidv4 } from "uuid";
import { INDEX_SPEC } from "../../config/pinecone";
import { Embedder } from "../../utils/embeddings";
import { SplitOptions, createSplitter } from "./chunking";
import { IndexProvider, resolveIndex } from "./retriever.service";

export interface SourceDocument {
  source: string;
  text: string;
}

export interface KnowledgeChunk {
  id: string;
  text: string;
  source: string;
}

export interface IndexSettings {
  name: string;
  dimension: number;
}

export type CreateIndexRequest = Parameters<Pinecone["createIndex"]>[0];

/**
 * Index administration calls used by ensureIndex. Pinecone fits.
 */
export interface IndexAdmin {
  listIndexes(): Promise<{ indexes?: { name: string }[] }>;
  createIndex(options: CreateIndexRequest): Promise<unknown>;
}

/**
 * Create the index when missing. Returns true when it was created.
 */
export const ensureIndex = async (pinecone: IndexAdmin, settings: IndexSettings): Promise<boolean> => {
  const { indexes = [] } = await pinecone.listIndexes();
  if (indexes.some((index) => index.name === settings.name)) {
    console.log(`[Knowledge] Index "${settings.name}" already exists`);
    return false;
  }

  console.log(`[Knowledge] Creating index "${settings.name}" (${settings.dimension} dimensions)...`);
  await pinecone.createIndex({
    name: settings.name,
    dimension: settings.dimension,
    metric: "cosine",
    spec: INDEX_SPEC,
    waitUntilReady: true,
  });
  console.log(`[Knowledge] Index "${settings.name}" is ready`);
  return true;
};

export const findPdfFiles = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { recursive: true });
  return entries
    .filter((entry) => entry.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((entry) => path.join(dir, entry));
};

export const loadPdfDocuments = async (dir: string): Promise<SourceDocument[]> => {
  const files = await findPdfFiles(dir);
  console.log(`[Ingest] Found ${files.length} PDF file(s) in ${dir}`);

  const documents: SourceDocument[] = [];
  for (const file of files) {
    const parsed = await pdfParse(await readFile(file));
    documents.push({ source: path.relative(dir, file), text: parsed.text });
  }
  return documents;
};

export const toKnowledgeChunks = async (
  documents: SourceDocument[],
  options: Partial<SplitOptions> = {}
): Promise<KnowledgeChunk[]> => {
  const splitter = createSplitter(options);
  const chunks: KnowledgeChunk[] = [];
  for (const doc of documents) {
    const texts = await splitter.splitText(doc.text);
    chunks.push(...texts.map((text) => ({ id: uuidv4(), text, source: doc.source })));
  }
  return chunks;
};

export interface UpsertTarget {
  pinecone: IndexProvider;
  embedder: Embedder;
  indexName: string;
  namespace: string;
}

export const upsertChunks = async (target: UpsertTarget, chunks: KnowledgeChunk[]): Promise<void> => {
  const vectors = await target.embedder.embedDocuments(chunks.map((chunk) => chunk.text));

  const records: PineconeRecord[] = chunks.map((chunk, i) => ({
    id: chunk.id,
    values: vectors[i],
    metadata: { text: chunk.text, source: chunk.source },
  }));

  await resolveIndex(target.pinecone, target.indexName, target.namespace).upsert(records);
};
