import type { Logger } from "@docent/common";
import type { EmbeddingClient } from "./types.js";
import { CohereEmbedding } from "./cohere.js";
import { OpenAIEmbedding } from "./openai.js";
import { VoyageEmbedding } from "./voyage.js";

export type { EmbeddingClient, EmbeddingConfig, EmbeddingInputType } from "./types.js";
export { OpenAIEmbedding } from "./openai.js";
export { VoyageEmbedding } from "./voyage.js";
export { CohereEmbedding } from "./cohere.js";

export type EmbeddingProvider = "openai" | "voyage" | "cohere";

export interface CreateEmbeddingClientOptions {
  provider: EmbeddingProvider;
  apiKey: string;
  model?: string;
  dimensions?: number;
  logger?: Logger;
}

export function createEmbeddingClient(
  options: CreateEmbeddingClientOptions,
): EmbeddingClient {
  const config = {
    apiKey: options.apiKey,
    model: options.model,
    dimensions: options.dimensions,
    logger: options.logger,
  };

  switch (options.provider) {
    case "openai":
      return new OpenAIEmbedding(config);
    case "voyage":
      return new VoyageEmbedding(config);
    case "cohere":
      return new CohereEmbedding(config);
  }
}
