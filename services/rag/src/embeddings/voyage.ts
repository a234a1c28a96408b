import { z } from "zod";
import { HttpEmbeddingClient } from "./http.js";
import type { EmbeddingConfig, EmbeddingInputType } from "./types.js";

const VoyageResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

type VoyageResponse = z.infer<typeof VoyageResponseSchema>;

export class VoyageEmbedding extends HttpEmbeddingClient<VoyageResponse> {
  constructor(config: EmbeddingConfig) {
    super(config, {
      name: "Voyage",
      url: "https://api.voyageai.com/v1/embeddings",
      defaultModel: "voyage-3",
      defaultDimensions: 1024,
      maxBatch: 128,
      response: VoyageResponseSchema,
    });
  }

  protected requestBody(texts: string[], inputType: EmbeddingInputType): object {
    return { model: this.model, input: texts, input_type: inputType };
  }

  protected vectorsFrom(response: VoyageResponse): number[][] {
    return response.data.map((item) => item.embedding);
  }
}
