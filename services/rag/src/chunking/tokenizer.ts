import { getEncoding, type Tiktoken } from "js-tiktoken";

let enc: Tiktoken | undefined;

/**
 * Count tokens in a string using the cl100k_base BPE tokenizer
 * (text-embedding-3-* and GPT-4 family). The encoder is built on first use.
 */
export function countTokens(text: string): number {
  enc ??= getEncoding("cl100k_base");
  return enc.encode(text).length;
}
