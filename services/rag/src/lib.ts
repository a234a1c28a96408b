export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { openIndex, createLocalFileClient } from "./setup.js";
export * from "./errors.js";
export { VectorIndex, DEFAULT_RESULTS, chunkId, chunkDocument } from "./indexing/index.js";
export type {
  Document,
  DocumentMetadata,
  ExportedRecord,
  IngestReport,
  MetadataValue,
  RecordMetadata,
  SearchHit,
  SearchResult,
  VectorIndexOptions,
} from "./indexing/index.js";
export { createChunker, splitText } from "./chunking/index.js";
export type { ChunkingOptions } from "./chunking/index.js";
export { createEmbeddingClient } from "./embeddings/index.js";
export type { EmbeddingClient, EmbeddingInputType } from "./embeddings/index.js";
export { createVectorStore, MemoryVectorStore, QdrantVectorStore } from "./store/index.js";
export type { VectorStore } from "./store/index.js";
export { LocalFileClient } from "./local/index.js";
export { exportKnowledge, ingestLocalFiles, writeSnapshot, readSnapshot, restoreSnapshot } from "./pipeline/index.js";
export type { ExportKnowledgeResult, IngestLocalResult, Snapshot } from "./pipeline/index.js";
export { startSyncScheduler } from "./scheduler/cron.js";
export { initTracing } from "./tracing.js";
