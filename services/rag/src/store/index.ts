import type { EmbeddingClient } from "../embeddings/index.js";
import { MemoryVectorStore } from "./memory.js";
import { QdrantVectorStore } from "./qdrant.js";
import type { VectorStore } from "./types.js";

export type { VectorStore, VectorRecord, StoredRecord, ScoredRecord, ListIdsFilter } from "./types.js";
export { MemoryVectorStore } from "./memory.js";
export type { MemoryVectorStoreConfig } from "./memory.js";
export { QdrantVectorStore, toPointId } from "./qdrant.js";
export type { QdrantStoreConfig } from "./qdrant.js";
export { cosineDistance } from "./cosine.js";

export type StoreBackend = VectorStore["backend"];

export interface StoreConfig {
  backend: StoreBackend;
  collectionName: string;
  persistDirectory?: string;
  qdrant: {
    url: string;
    apiKey?: string;
  };
}

export function createVectorStore(config: StoreConfig, embedding: EmbeddingClient): VectorStore {
  switch (config.backend) {
    case "memory":
      return new MemoryVectorStore({
        collectionName: config.collectionName,
        persistDirectory: config.persistDirectory,
        embeddingModel: embedding.model,
        dimensions: embedding.dimensions,
      });
    case "qdrant":
      return new QdrantVectorStore({
        url: config.qdrant.url,
        apiKey: config.qdrant.apiKey,
        collectionName: config.collectionName,
        vectorSize: embedding.dimensions,
      });
  }
}
