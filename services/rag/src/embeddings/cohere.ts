import { z } from "zod";
import { HttpEmbeddingClient } from "./http.js";
import type { EmbeddingConfig, EmbeddingInputType } from "./types.js";

const INPUT_TYPES: Record<EmbeddingInputType, string> = {
  document: "search_document",
  query: "search_query",
};

const CohereResponseSchema = z.object({
  embeddings: z.object({ float: z.array(z.array(z.number())) }),
});

type CohereResponse = z.infer<typeof CohereResponseSchema>;

export class CohereEmbedding extends HttpEmbeddingClient<CohereResponse> {
  constructor(config: EmbeddingConfig) {
    super(config, {
      name: "Cohere",
      url: "https://api.cohere.com/v2/embed",
      defaultModel: "embed-multilingual-v3.0",
      defaultDimensions: 1024,
      maxBatch: 96,
      response: CohereResponseSchema,
    });
  }

  protected requestBody(texts: string[], inputType: EmbeddingInputType): object {
    return {
      model: this.model,
      texts,
      input_type: INPUT_TYPES[inputType],
      embedding_types: ["float"],
    };
  }

  protected vectorsFrom(response: CohereResponse): number[][] {
    return response.embeddings.float;
  }
}
