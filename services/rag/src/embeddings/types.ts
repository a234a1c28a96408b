import type { Logger } from "@docent/common";

/** Providers that distinguish stored passages from search queries get the hint. */
export type EmbeddingInputType = "document" | "query";

export interface EmbeddingClient {
  /**
   * Generate embeddings for a batch of texts, in input order
   */
  embed(texts: string[], inputType?: EmbeddingInputType): Promise<number[][]>;

  /**
   * Generate embedding for a single text
   */
  embedSingle(text: string, inputType?: EmbeddingInputType): Promise<number[]>;

  /**
   * Get the dimension of embeddings produced by this client
   */
  readonly dimensions: number;

  /**
   * Get the model name
   */
  readonly model: string;
}

export interface EmbeddingConfig {
  apiKey: string;
  /** Provider default when absent. */
  model?: string;
  dimensions?: number;
  /** Receives a warning for each retried request. */
  logger?: Logger;
}
