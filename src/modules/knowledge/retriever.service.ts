// ============================================================
// Knowledge Retriever — Pinecone Similarity Search
// ============================================================
// The "Retrieval" step of RAG:
//   1. Embed the question (Gemini, RETRIEVAL_QUERY)
//   2. Ask Pinecone for the topK nearest chunks
//   3. Hand back the chunk text stored in metadata.text
//
// Matches without a text field are dropped; they cannot help
// the model and usually mean the index was filled by something
// other than our ingestion script.
// ============================================================

import { Index } from "@pinecone-database/pinecone";
import { Embedder } from "../../utils/embeddings";

// ── Index Access ────────────────────────────────────────────
// The slice of the Pinecone client the knowledge module uses.
// A Pinecone instance satisfies IndexProvider as is; tests hand
// in an in-process stand-in.

export type KnowledgeIndex = Pick<Index, "query" | "upsert">;

export interface IndexHandle extends KnowledgeIndex {
  namespace(name: string): KnowledgeIndex;
}

export interface IndexProvider {
  index(name: string): IndexHandle;
}

/**
 * The index to read and write. An empty namespace means
 * Pinecone's default namespace.
 */
export const resolveIndex = (
  provider: IndexProvider,
  indexName: string,
  namespace: string
): KnowledgeIndex => {
  const index = provider.index(indexName);
  return namespace ? index.namespace(namespace) : index;
};

export interface KnowledgePassage {
  text: string;
  score: number;
  source?: string;
}

export interface KnowledgeRetriever {
  search(query: string, topK: number): Promise<KnowledgePassage[]>;
}

export interface PineconeRetrieverOptions {
  indexName: string;
  namespace: string;
}

export class PineconeRetriever implements KnowledgeRetriever {
  constructor(
    private readonly pinecone: IndexProvider,
    private readonly embedder: Embedder,
    private readonly options: PineconeRetrieverOptions
  ) {}

  async search(query: string, topK: number): Promise<KnowledgePassage[]> {
    const vector = await this.embedder.embedQuery(query);

    const target = resolveIndex(this.pinecone, this.options.indexName, this.options.namespace);
    const results = await target.query({ vector, topK, includeMetadata: true });

    return results.matches.flatMap((match): KnowledgePassage[] => {
      const text = match.metadata?.text;
      if (typeof text !== "string" || text.trim().length === 0) return [];
      const source = match.metadata?.source;
      return [
        {
          text,
          score: match.score ?? 0,
          source: typeof source === "string" ? source : undefined,
        },
      ];
    });
  }
}
