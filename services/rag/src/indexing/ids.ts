import { createHash } from "node:crypto";
import type { Chunk, TextSplitter } from "../chunking/types.js";
import type { Document } from "./types.js";

/**
 * Content-addressed chunk id. Identical (filename, position, length, content)
 * always yields the same id, which is what makes re-ingestion an upsert.
 */
export function chunkId(filename: string, ordinal: number, content: string): string {
  const digest = createHash("md5").update(content, "utf8").digest("hex");
  return `${filename}-${ordinal}-${content.length}-${digest}`;
}

export function chunkDocument(document: Document, splitter: TextSplitter): Chunk[] {
  const texts = splitter(document.content);
  return texts.map((content, index) => ({
    id: chunkId(document.metadata.filename, index, content),
    content,
    index,
    metadata: {
      ...document.metadata,
      chunkIndex: index,
      totalChunks: texts.length,
    },
  }));
}
