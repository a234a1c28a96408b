import { ConfigurationError } from "../errors.js";
import type { LengthFunction, SplitterOptions, TextSplitter } from "./types.js";

/**
 * Tried in order: paragraphs, lines, sentences, words, then single characters.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " ", ""];

const characterLength: LengthFunction = (text) => text.length;

export function validateSplitterOptions(options: Pick<SplitterOptions, "chunkSize" | "chunkOverlap">): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }
}

/**
 * Split before every occurrence of `separator`, so the separator stays at the
 * head of the following piece and the pieces concatenate back to `text`.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    // Code points, so surrogate pairs stay whole
    return Array.from(text);
  }
  const escaped = separator.replace(/[/\-\\^$*+?.()|[\]{}]/g, "\\$&");
  return text.split(new RegExp(`(?=${escaped})`)).filter((piece) => piece !== "");
}

function pushIfNotBlank(chunks: string[], text: string): void {
  if (text.trim() !== "") {
    chunks.push(text);
  }
}

/**
 * Build a recursive character splitter. Options are validated once, here.
 *
 * Pieces are merged greedily up to `chunkSize`; after each emitted chunk the
 * window keeps its trailing pieces up to `chunkOverlap`, so consecutive chunks
 * share the tail of the earlier one.
 */
export function createTextSplitter(
  options: SplitterOptions,
  separators: readonly string[] = DEFAULT_SEPARATORS,
): TextSplitter {
  validateSplitterOptions(options);
  const { chunkSize, chunkOverlap, lengthFunction = characterLength } = options;

  function merge(pieces: string[]): string[] {
    const chunks: string[] = [];
    const window: string[] = [];
    const lengths: number[] = [];
    let total = 0;

    for (const piece of pieces) {
      const length = lengthFunction(piece);

      if (total + length > chunkSize && window.length > 0) {
        pushIfNotBlank(chunks, window.join(""));
        while (total > chunkOverlap || (total + length > chunkSize && total > 0)) {
          total -= lengths.shift() ?? 0;
          window.shift();
        }
      }

      window.push(piece);
      lengths.push(length);
      total += length;
    }

    if (window.length > 0) {
      pushIfNotBlank(chunks, window.join(""));
    }
    return chunks;
  }

  function split(text: string, candidates: readonly string[]): string[] {
    let separator = candidates[candidates.length - 1] ?? "";
    let remaining: readonly string[] = [];

    for (const [i, candidate] of candidates.entries()) {
      if (candidate === "") {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = candidates.slice(i + 1);
        break;
      }
    }

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (lengthFunction(piece) < chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...merge(pending));
        pending = [];
      }

      if (remaining.length === 0) {
        pushIfNotBlank(chunks, piece);
      } else {
        chunks.push(...split(piece, remaining));
      }
    }

    if (pending.length > 0) {
      chunks.push(...merge(pending));
    }
    return chunks;
  }

  return (text: string): string[] => {
    if (text.trim() === "") return [];
    if (lengthFunction(text) <= chunkSize) return [text];
    return split(text, separators);
  };
}

/**
 * One-shot form of {@link createTextSplitter}.
 */
export function splitText(text: string, options: SplitterOptions): string[] {
  return createTextSplitter(options)(text);
}
