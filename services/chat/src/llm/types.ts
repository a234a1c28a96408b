export interface Message {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: string;
  usage?: TokenUsage;
}

export interface LLMClient {
  chat(messages: Message[]): Promise<LLMResponse>;
}

export type LlmErrorCode = "RATE_LIMITED" | "API_ERROR";

export class LlmError extends Error {
  constructor(
    public readonly code: LlmErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "LlmError";
  }
}
