import type { ExportedRecord, RecordMetadata } from "../indexing/types.js";

export interface VectorRecord {
  id: string;
  content: string;
  metadata: RecordMetadata;
  vector: number[];
}

export type StoredRecord = ExportedRecord;

export interface ScoredRecord extends StoredRecord {
  distance: number;
}

export interface ListIdsFilter {
  filename?: string;
}

/**
 * Capabilities every backend must provide. `upsert` is insert-or-replace by id;
 * a backend without native upsert implements it as delete-then-insert.
 */
export interface VectorStore {
  readonly backend: "memory" | "qdrant";
  readonly collectionName: string;

  /** Create or load the collection and check it matches the embedding dimensions. */
  init(): Promise<void>;
  upsert(records: VectorRecord[]): Promise<void>;
  /** The `k` nearest records by cosine distance, closest first. */
  query(vector: number[], k: number): Promise<ScoredRecord[]>;
  getAll(): Promise<StoredRecord[]>;
  count(): Promise<number>;
  listIds(filter?: ListIdsFilter): Promise<string[]>;
  /** Distinct `metadata.filename` values. */
  listFilenames(): Promise<string[]>;
  deleteByIds(ids: string[]): Promise<void>;
  close(): Promise<void>;
}
