import { ConfigurationError } from "@docent/rag";
import { createClaudeClient } from "./claude.js";
import { createOllamaClient } from "./ollama.js";
import type { LLMClient } from "./types.js";

export { LlmError } from "./types.js";
export type { LLMClient, LLMResponse, LlmErrorCode, Message, TokenUsage } from "./types.js";
export { createClaudeClient, createOllamaClient };
export type { ClaudeClientOptions } from "./claude.js";
export type { OllamaClientOptions } from "./ollama.js";

export type LlmProvider = "claude" | "ollama";

export interface LlmSettings {
  provider: LlmProvider;
  anthropicApiKey?: string;
  claudeModel: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
}

/** Build the client for the configured provider. Claude needs an API key; Ollama does not. */
export function createLlmClient(settings: LlmSettings): LLMClient {
  switch (settings.provider) {
    case "ollama":
      return createOllamaClient({ baseUrl: settings.ollamaBaseUrl, model: settings.ollamaModel });
    case "claude":
      if (!settings.anthropicApiKey) {
        throw new ConfigurationError("ANTHROPIC_API_KEY environment variable is required");
      }
      return createClaudeClient({ apiKey: settings.anthropicApiKey, model: settings.claudeModel });
  }
}
