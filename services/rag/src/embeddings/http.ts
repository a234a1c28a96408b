import type { z } from "zod";
import { errorMessage, silentLogger, type Logger } from "@docent/common";
import { EmbeddingError } from "../errors.js";
import { withRetry } from "../utils/retry.js";
import type { EmbeddingClient, EmbeddingConfig, EmbeddingInputType } from "./types.js";

export interface ProviderSettings<TResponse> {
  /** Provider name used in error messages. */
  name: string;
  url: string;
  defaultModel: string;
  defaultDimensions: number;
  /** Most texts one request may carry. */
  maxBatch: number;
  response: z.ZodType<TResponse>;
}

/**
 * Shared plumbing for the fetch-based providers: sub-batching, retries,
 * status-carrying errors and response validation. Subclasses supply the
 * request body and pull the vectors out of the parsed response.
 */
export abstract class HttpEmbeddingClient<TResponse> implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly logger: Logger;

  protected constructor(
    config: EmbeddingConfig,
    private readonly settings: ProviderSettings<TResponse>,
  ) {
    this.apiKey = config.apiKey;
    this.model = config.model || settings.defaultModel;
    this.dimensions = config.dimensions ?? settings.defaultDimensions;
    this.logger = (config.logger ?? silentLogger).child({ component: "embedding", provider: settings.name });
  }

  protected abstract requestBody(texts: string[], inputType: EmbeddingInputType): object;

  protected abstract vectorsFrom(response: TResponse): number[][];

  async embed(texts: string[], inputType: EmbeddingInputType = "document"): Promise<number[][]> {
    const { maxBatch } = this.settings;
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += maxBatch) {
      vectors.push(...(await this.post(texts.slice(start, start + maxBatch), inputType)));
    }
    return vectors;
  }

  async embedSingle(text: string, inputType: EmbeddingInputType = "query"): Promise<number[]> {
    const [vector] = await this.embed([text], inputType);
    return vector;
  }

  private post(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    const { name, url, response: schema } = this.settings;

    return withRetry(
      async () => {
        const response = await fetch(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(this.requestBody(texts, inputType)),
        });

        if (!response.ok) {
          const detail = await response.text();
          throw new EmbeddingError(`${name} embedding failed (${response.status}): ${detail}`, undefined, response.status);
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (error) {
          throw new EmbeddingError(`${name} returned invalid JSON: ${errorMessage(error)}`, error);
        }
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new EmbeddingError(`${name} returned an unexpected response shape`, parsed.error);
        }
        return this.vectorsFrom(parsed.data);
      },
      {
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn("Retrying embedding request", {
            attempt,
            delay_ms: Math.round(delayMs),
            error: errorMessage(error),
          }),
      },
    );
  }
}
