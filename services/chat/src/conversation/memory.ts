import type { ConversationStore, ConversationTurn } from "./types.js";

export class MemoryConversationStore implements ConversationStore {
  private readonly store = new Map<string, ConversationTurn[]>();

  private key(userId: string, sessionId: string): string {
    return `${userId}:${sessionId}`;
  }

  async append(userId: string, sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    const key = this.key(userId, sessionId);
    const existing = this.store.get(key) ?? [];
    this.store.set(key, [...existing, ...turns]);
  }

  async history(userId: string, sessionId: string, limit?: number): Promise<ConversationTurn[]> {
    const turns = this.store.get(this.key(userId, sessionId)) ?? [];
    if (limit === undefined) return [...turns];
    return limit > 0 ? turns.slice(-limit) : [];
  }

  async clear(userId: string, sessionId: string): Promise<void> {
    this.store.delete(this.key(userId, sessionId));
  }

  async close(): Promise<void> {
    this.store.clear();
  }
}
