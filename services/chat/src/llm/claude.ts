import Anthropic from "@anthropic-ai/sdk";
import type { LLMClient, LLMResponse, Message } from "./types.js";
import { LlmError } from "./types.js";

export interface ClaudeClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  maxRetries?: number;
  timeoutMs?: number;
}

export function createClaudeClient(options: ClaudeClientOptions): LLMClient {
  const {
    apiKey,
    model = "claude-sonnet-4-20250514",
    maxTokens = 4096,
    maxRetries,
    timeoutMs,
  } = options;

  const client = new Anthropic({
    apiKey,
    maxRetries: maxRetries ?? 3,
    timeout: timeoutMs ?? 120_000,
  });

  return {
    async chat(messages: Message[]): Promise<LLMResponse> {
      const systemMessage = messages.find((m) => m.role === "system");

      try {
        const response = await client.messages.create({
          model,
          max_tokens: maxTokens,
          system: systemMessage?.content,
          messages: buildMessages(messages),
        });

        const text = response.content
          .filter((block): block is Anthropic.TextBlock => block.type === "text")
          .map((block) => block.text)
          .join("");

        return {
          content: text,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
        };
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          if (error.status === 429) {
            throw new LlmError("RATE_LIMITED", "Rate limit exceeded", error);
          }
          throw new LlmError("API_ERROR", `Anthropic API error: ${error.status}`, error);
        }
        throw error;
      }
    },
  };
}

function buildMessages(messages: Message[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];

  for (const msg of messages) {
    if (msg.role === "system") continue;

    result.push({
      role: msg.role,
      content: msg.content,
    });
  }

  return result;
}
