import { z } from "zod";
import { HttpEmbeddingClient } from "./http.js";
import type { EmbeddingConfig } from "./types.js";

const OpenAIResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

type OpenAIResponse = z.infer<typeof OpenAIResponseSchema>;

/** OpenAI embeds queries and documents alike, so the input type is not sent. */
export class OpenAIEmbedding extends HttpEmbeddingClient<OpenAIResponse> {
  constructor(config: EmbeddingConfig) {
    super(config, {
      name: "OpenAI",
      url: "https://api.openai.com/v1/embeddings",
      defaultModel: "text-embedding-3-small",
      defaultDimensions: 1536,
      maxBatch: 2048,
      response: OpenAIResponseSchema,
    });
  }

  protected requestBody(texts: string[]): object {
    return { model: this.model, input: texts, dimensions: this.dimensions };
  }

  // Items may arrive out of order; `index` is their input position
  protected vectorsFrom(response: OpenAIResponse): number[][] {
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
