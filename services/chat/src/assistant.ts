import { silentLogger, type Logger } from "@docent/common";
import type { SearchHit, VectorIndex } from "@docent/rag";
import type { ConversationStore, ConversationTurn } from "./conversation/index.js";
import type { LLMClient, Message } from "./llm/index.js";
import { buildSystemPrompt, sourceOf } from "./prompts.js";
import { withSpan } from "./tracing.js";

export const DEFAULT_CONTEXT_RESULTS = 3;
export const DEFAULT_HISTORY_LIMIT = 10;

export interface RagAssistantOptions {
  index: VectorIndex;
  llm: LLMClient;
  conversations: ConversationStore;
  historyLimit?: number;
  logger?: Logger;
  /** Clock for turn timestamps. */
  now?: () => Date;
}

export interface QueryInput {
  question: string;
  userId: string;
  sessionId: string;
  nResults?: number;
}

export interface QueryAnswer {
  answer: string;
  /** Retrieved chunk texts, closest first. */
  context: string[];
  /** Source filename of each context entry. */
  metadata: string[];
  sources: SearchHit[];
}

export class RagAssistant {
  private readonly index: VectorIndex;
  private readonly llm: LLMClient;
  private readonly conversations: ConversationStore;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RagAssistantOptions) {
    this.index = options.index;
    this.llm = options.llm;
    this.conversations = options.conversations;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async query(input: QueryInput): Promise<QueryAnswer> {
    const { question, userId, sessionId, nResults = DEFAULT_CONTEXT_RESULTS } = input;

    return withSpan("chat.query", async (span) => {
      span.setAttribute("chat.session_id", sessionId);

      const hits = await this.index.search(question, nResults);
      const history = await this.conversations.history(userId, sessionId, this.historyLimit);

      const messages: Message[] = [
        { role: "system", content: buildSystemPrompt(hits) },
        ...history.map((turn): Message => ({ role: turn.role, content: turn.content })),
        { role: "user", content: question },
      ];

      const response = await this.llm.chat(messages);
      const timestamp = this.now().toISOString();
      const turns: ConversationTurn[] = [
        { role: "user", content: question, timestamp },
        { role: "assistant", content: response.content, timestamp },
      ];
      await this.conversations.append(userId, sessionId, turns);

      span.setAttribute("chat.context_chunks", hits.length);
      this.logger.info("query answered", {
        user_id: userId,
        session_id: sessionId,
        context_chunks: hits.length,
        history_turns: history.length,
        input_tokens: response.usage?.inputTokens,
        output_tokens: response.usage?.outputTokens,
      });

      return {
        answer: response.content,
        context: hits.map((hit) => hit.content),
        metadata: hits.map(sourceOf),
        sources: hits,
      };
    });
  }

  async history(userId: string, sessionId: string): Promise<ConversationTurn[]> {
    return this.conversations.history(userId, sessionId);
  }
}
