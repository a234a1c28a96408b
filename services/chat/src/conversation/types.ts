export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  /** ISO-8601 time the turn was recorded. */
  timestamp: string;
}

export interface ConversationStore {
  append(userId: string, sessionId: string, turns: readonly ConversationTurn[]): Promise<void>;
  /** Oldest first. With `limit`, only the most recent `limit` turns. */
  history(userId: string, sessionId: string, limit?: number): Promise<ConversationTurn[]>;
  clear(userId: string, sessionId: string): Promise<void>;
  close(): Promise<void>;
}
