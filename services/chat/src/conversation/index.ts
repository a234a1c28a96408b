import type { ConversationStore } from "./types.js";
import { MemoryConversationStore } from "./memory.js";
import { RedisConversationStore, createRedisClient } from "./redis.js";

export type { ConversationStore, ConversationTurn } from "./types.js";
export { MemoryConversationStore } from "./memory.js";
export {
  RedisConversationStore,
  createRedisClient,
  DEFAULT_CONVERSATION_TTL_SECONDS,
} from "./redis.js";
export type { RedisClient } from "./redis.js";

export interface ConversationStoreConfig {
  type: "memory" | "redis";
  redisUrl?: string;
  ttlSeconds?: number;
}

export function createConversationStore(config: ConversationStoreConfig): ConversationStore {
  if (config.type === "redis") {
    const client = createRedisClient(config.redisUrl ?? "redis://localhost:6379");
    return new RedisConversationStore(client, config.ttlSeconds);
  }
  return new MemoryConversationStore();
}
