export { ingestLocalFiles } from "./ingest-local.js";
export type { IngestLocalOptions, IngestLocalResult } from "./ingest-local.js";
export { exportKnowledge, writeSnapshot, readSnapshot, restoreSnapshot } from "./snapshot.js";
export type {
  ExportKnowledgeOptions,
  ExportKnowledgeResult,
  Snapshot,
  WriteSnapshotOptions,
  WriteSnapshotResult,
} from "./snapshot.js";
