import type { LLMClient, LLMResponse, Message } from "./types.js";
import { LlmError } from "./types.js";

export interface OllamaClientOptions {
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
}

interface OllamaResponse {
  message?: { role: string; content: string };
  done: boolean;
  done_reason?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export function createOllamaClient(options: OllamaClientOptions = {}): LLMClient {
  const {
    baseUrl = "http://localhost:11434",
    model = "llama3.2",
    maxTokens = 4096,
  } = options;

  return {
    async chat(messages: Message[]): Promise<LLMResponse> {
      let response: Response;
      try {
        response = await fetch(`${baseUrl}/api/chat`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            options: { num_predict: maxTokens },
            stream: false,
          }),
        });
      } catch (error) {
        throw new LlmError("API_ERROR", `Ollama unreachable at ${baseUrl}`, error);
      }

      if (!response.ok) {
        const errorText = await response.text();
        throw new LlmError(
          response.status === 429 ? "RATE_LIMITED" : "API_ERROR",
          `Ollama request failed (${response.status}): ${errorText}`,
        );
      }

      const data = (await response.json()) as OllamaResponse;
      return {
        content: data.message?.content ?? "",
        usage: {
          inputTokens: data.prompt_eval_count ?? 0,
          outputTokens: data.eval_count ?? 0,
        },
      };
    },
  };
}
