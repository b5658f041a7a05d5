// ============================================================
// Chunking + Batching for Knowledge-Base Ingestion
// ============================================================
// RECURSIVE CHARACTER SPLITTING (@langchain/textsplitters):
//   The splitter tries the coarsest separator first: paragraphs
//   ("\n\n"), then lines ("\n"), then words (" "), then single
//   characters (""). Pieces that fit are merged back together up
//   to chunkSize; consecutive chunks share up to chunkOverlap
//   characters so a sentence cut at a boundary appears in both.
//
//   500 / 20 is what the knowledge base was built with. Changing
//   it means re-ingesting every document.
// ============================================================

import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_SPLIT_OPTIONS: SplitOptions = {
  chunkSize: 500,
  chunkOverlap: 20,
};

/**
 * Throws when chunkOverlap is not smaller than chunkSize.
 */
export const createSplitter = (options: Partial<SplitOptions> = {}): RecursiveCharacterTextSplitter =>
  new RecursiveCharacterTextSplitter({ ...DEFAULT_SPLIT_OPTIONS, ...options });

export const splitText = (text: string, options: Partial<SplitOptions> = {}): Promise<string[]> =>
  createSplitter(options).splitText(text);

// ── Batched Upload ──────────────────────────────────────────

export interface BatchUploadOptions {
  batchSize: number;
  /** Pause between successful batches, to stay under rate limits. */
  pauseMs: number;
  /** Wait before the single retry of a failed batch. */
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchUploadReport {
  uploaded: number;
  total: number;
  failedBatches: number[];
}

export const DEFAULT_BATCH_OPTIONS: BatchUploadOptions = {
  batchSize: 100,
  pauseMs: 2000,
  retryDelayMs: 10000,
};

const realSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Upload `items` in batches. A failed batch is retried once after
 * retryDelayMs; if the retry fails too, it is skipped and reported.
 * Batch numbers start at 1.
 */
export const uploadInBatches = async <T>(
  items: T[],
  upload: (batch: T[], batchNumber: number) => Promise<void>,
  options: BatchUploadOptions = DEFAULT_BATCH_OPTIONS
): Promise<BatchUploadReport> => {
  const sleep = options.sleep ?? realSleep;
  const report: BatchUploadReport = { uploaded: 0, total: items.length, failedBatches: [] };

  for (let start = 0; start < items.length; start += options.batchSize) {
    const batch = items.slice(start, start + options.batchSize);
    const batchNumber = start / options.batchSize + 1;
    const isLast = start + options.batchSize >= items.length;

    console.log(
      `[Ingest] Uploading batch ${batchNumber}: chunks ${start + 1}-${start + batch.length} of ${items.length}`
    );

    let succeeded = false;
    try {
      await upload(batch, batchNumber);
      succeeded = true;
    } catch (error) {
      console.error(`[Ingest] Batch ${batchNumber} failed, retrying after ${options.retryDelayMs}ms:`, error);
      await sleep(options.retryDelayMs);
      try {
        await upload(batch, batchNumber);
        succeeded = true;
      } catch (retryError) {
        console.error(`[Ingest] Retry failed for batch ${batchNumber}:`, retryError);
        report.failedBatches.push(batchNumber);
      }
    }

    if (succeeded) {
      report.uploaded += batch.length;
      console.log(`[Ingest] Total uploaded: ${report.uploaded}/${items.length}`);
      if (!isLast) await sleep(options.pauseMs);
    }
  }

  return report;
};
