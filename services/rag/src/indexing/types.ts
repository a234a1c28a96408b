import type { IngestionError } from "../errors.js";

export type MetadataValue = string | number | boolean | null;

export type RecordMetadata = Record<string, MetadataValue>;

export interface DocumentMetadata {
  /** Source identifier; part of every chunk id. */
  filename: string;
  /** Source kind, e.g. "txt" or "pdf". */
  type: string;
  [key: string]: MetadataValue;
}

export interface Document {
  content: string;
  metadata: DocumentMetadata;
}

export interface SearchHit {
  id: string;
  content: string;
  metadata: RecordMetadata;
  /** Cosine distance, lower is closer. */
  distance: number;
}

/** Ordered by non-decreasing distance. */
export type SearchResult = SearchHit[];

export interface ExportedRecord {
  id: string;
  content: string;
  metadata: RecordMetadata;
}

export interface IngestReport {
  documentsReceived: number;
  documentsIndexed: number;
  documentsSkipped: number;
  chunksUpserted: number;
  staleChunksRemoved: number;
  ids: string[];
  errors: IngestionError[];
}
