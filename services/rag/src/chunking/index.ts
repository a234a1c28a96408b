import { countTokens } from "./tokenizer.js";
import { createTextSplitter } from "./splitter.js";
import type { ChunkingOptions, LengthFunction, LengthUnit, TextSplitter } from "./types.js";

export { createTextSplitter, splitText, validateSplitterOptions, DEFAULT_SEPARATORS } from "./splitter.js";
export { countTokens } from "./tokenizer.js";
export type * from "./types.js";

export function lengthFunctionFor(unit: LengthUnit = "characters"): LengthFunction {
  return unit === "tokens" ? countTokens : (text) => text.length;
}

/** Splitter for the configured chunk size, overlap and length unit. */
export function createChunker(options: ChunkingOptions): TextSplitter {
  return createTextSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
    lengthFunction: lengthFunctionFor(options.lengthUnit),
  });
}
