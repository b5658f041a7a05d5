// ============================================================
// Markdown Utilities
// ============================================================
// The model answers in markdown. Two consumers need it shaped:
//
//   POST /chat         → response_html, rendered with marked (GFM)
//   POST /chat/stream  → content events, split into chunks that
//                        keep headers, bold lines and list items
//                        whole so the client can render as it goes
// ============================================================

import { marked } from "marked";

export const renderMarkdown = async (text: string): Promise<string> =>
  marked.parse(text, { gfm: true });

const STREAM_CHUNK_LIMIT = 100;

const startsBlock = (line: string): boolean =>
  line.startsWith("##") || line.startsWith("**") || line.startsWith("-");

/**
 * Split a reply into stream chunks.
 *
 * Lines accumulate until a blank line, a block-starting line
 * (##, **, -) or more than 100 characters, then the chunk is
 * flushed. Chunks are trimmed; blank ones are dropped.
 */
export const chunkMarkdown = (text: string, limit = STREAM_CHUNK_LIMIT): string[] => {
  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    if (current.trim()) chunks.push(current.trim());
    current = "";
  };

  for (const line of text.split("\n")) {
    current += `${line}\n`;
    if (line.trim() === "" || current.length > limit || startsBlock(line)) {
      flush();
    }
  }
  flush();

  return chunks;
};
