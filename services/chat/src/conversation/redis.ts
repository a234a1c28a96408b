import { Redis } from "ioredis";
import { z } from "zod";
import type { ConversationStore, ConversationTurn } from "./types.js";

export interface RedisClient {
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  expire(key: string, seconds: number): Promise<number>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

const TurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
});

/** Seven days; refreshed on every append. */
export const DEFAULT_CONVERSATION_TTL_SECONDS = 7 * 24 * 60 * 60;

export class RedisConversationStore implements ConversationStore {
  private readonly prefix = "docent:conversation:";

  constructor(
    private readonly client: RedisClient,
    private readonly ttlSeconds: number = DEFAULT_CONVERSATION_TTL_SECONDS,
  ) {}

  private key(userId: string, sessionId: string): string {
    return `${this.prefix}${userId}:${sessionId}`;
  }

  async append(userId: string, sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    if (turns.length === 0) return;
    const key = this.key(userId, sessionId);
    await this.client.rpush(key, ...turns.map((turn) => JSON.stringify(turn)));
    await this.client.expire(key, this.ttlSeconds);
  }

  async history(userId: string, sessionId: string, limit?: number): Promise<ConversationTurn[]> {
    if (limit !== undefined && limit <= 0) return [];
    const start = limit === undefined ? 0 : -limit;
    const raw = await this.client.lrange(this.key(userId, sessionId), start, -1);
    const turns: ConversationTurn[] = [];
    for (const entry of raw) {
      const parsed = TurnSchema.safeParse(parseJson(entry));
      // skip malformed entries
      if (parsed.success) turns.push(parsed.data);
    }
    return turns;
  }

  async clear(userId: string, sessionId: string): Promise<void> {
    await this.client.del(this.key(userId, sessionId));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function createRedisClient(redisUrl: string): RedisClient {
  return new Redis(redisUrl, { maxRetriesPerRequest: 3 });
}
