export { VectorIndex, DEFAULT_RESULTS } from "./vector-index.js";
export type { VectorIndexOptions } from "./vector-index.js";
export { chunkId, chunkDocument } from "./ids.js";
export type * from "./types.js";
export { DocumentSchema, ExportedRecordSchema } from "./schema.js";
