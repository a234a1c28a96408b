import type { DocumentMetadata, MetadataValue } from "../indexing/types.js";

export type LengthFunction = (text: string) => number;

export type LengthUnit = "characters" | "tokens";

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** How chunk length is measured. Defaults to characters. */
  lengthUnit?: LengthUnit;
}

export interface SplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  lengthFunction?: LengthFunction;
}

export type TextSplitter = (text: string) => string[];

export interface ChunkMetadata extends DocumentMetadata {
  chunkIndex: number;
  totalChunks: number;
}

export interface Chunk {
  id: string; // filename-ordinal-length-md5
  content: string;
  index: number;
  metadata: ChunkMetadata;
}

export type { DocumentMetadata, MetadataValue };
