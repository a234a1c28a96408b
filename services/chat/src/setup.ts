import { z } from "zod";
import { createLogger, type Logger } from "@docent/common";
import {
  ConfigurationError,
  createLocalFileClient,
  ingestLocalFiles,
  loadConfig,
  openIndex,
  type Config,
  type LocalFileClient,
  type VectorIndex,
} from "@docent/rag";
import { RagAssistant } from "./assistant.js";
import {
  createConversationStore,
  DEFAULT_CONVERSATION_TTL_SECONDS,
  type ConversationStore,
} from "./conversation/index.js";
import { createLlmClient } from "./llm/index.js";

type Env = Record<string, string | undefined>;

const ChatConfigSchema = z
  .object({
    llm: z.object({
      provider: z.enum(["claude", "ollama"]),
      anthropicApiKey: z.string().min(1).optional(),
      claudeModel: z.string().min(1),
      ollamaBaseUrl: z.string().url(),
      ollamaModel: z.string().min(1),
    }),
    conversations: z.object({
      type: z.enum(["memory", "redis"]),
      redisUrl: z.string().min(1),
      ttlSeconds: z.coerce.number().int().positive(),
      historyLimit: z.coerce.number().int().nonnegative(),
    }),
    ingestOnStart: z
      .enum(["true", "false"])
      .optional()
      .transform((value) => value === "true"),
    port: z.coerce.number().int().min(1).max(65535),
  })
  .refine((config) => config.llm.provider !== "claude" || config.llm.anthropicApiKey !== undefined, {
    message: "ANTHROPIC_API_KEY is required when LLM_PROVIDER is claude",
    path: ["llm", "anthropicApiKey"],
  });

export type ChatConfig = z.infer<typeof ChatConfigSchema>;

export function loadChatConfig(env: Env = process.env): ChatConfig {
  const result = ChatConfigSchema.safeParse({
    llm: {
      provider: env.LLM_PROVIDER ?? "claude",
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      claudeModel: env.CLAUDE_MODEL ?? "claude-sonnet-4-20250514",
      ollamaBaseUrl: env.OLLAMA_BASE_URL ?? "http://localhost:11434",
      ollamaModel: env.OLLAMA_MODEL ?? "llama3.2",
    },
    conversations: {
      type: env.CONVERSATION_STORE ?? "memory",
      redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
      ttlSeconds: env.CONVERSATION_TTL_SECONDS ?? String(DEFAULT_CONVERSATION_TTL_SECONDS),
      historyLimit: env.HISTORY_LIMIT ?? "10",
    },
    ingestOnStart: env.INGEST_ON_START,
    port: env.PORT ?? "5000",
  });

  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`, result.error);
  }
  return result.data;
}

export interface ChatServices {
  rag: Config;
  chat: ChatConfig;
  index: VectorIndex;
  localFiles: LocalFileClient;
  conversations: ConversationStore;
  assistant: RagAssistant;
  logger: Logger;
}

/** Opens the index and builds everything the HTTP API needs. */
export async function createChatServices(env: Env = process.env): Promise<ChatServices> {
  const rag = loadConfig(env);
  const chat = loadChatConfig(env);
  const logger = createLogger({ level: rag.logLevel });

  const index = await openIndex(rag, logger.child({ component: "index" }));
  const localFiles = createLocalFileClient(rag, logger);

  if (chat.ingestOnStart) {
    const result = await ingestLocalFiles(localFiles, index, {
      pruneMissing: rag.documents.pruneMissing,
      logger,
    });
    logger.info("startup ingest complete", {
      files_loaded: result.filesLoaded,
      files_failed: result.filesFailed,
      chunks_upserted: result.chunksUpserted,
    });
  }

  const conversations = createConversationStore({
    type: chat.conversations.type,
    redisUrl: chat.conversations.redisUrl,
    ttlSeconds: chat.conversations.ttlSeconds,
  });

  const assistant = new RagAssistant({
    index,
    llm: createLlmClient(chat.llm),
    conversations,
    historyLimit: chat.conversations.historyLimit,
    logger: logger.child({ component: "assistant" }),
  });

  return { rag, chat, index, localFiles, conversations, assistant, logger };
}
