export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  retryable?: (error: unknown) => boolean;
  /** Called before each wait, with the 1-based number of the attempt that failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function statusOf(error: object): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

function codeOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  return "code" in value && typeof value.code === "string" ? value.code : undefined;
}

/**
 * Errors with an HTTP status retry on 408, 429 and 5xx. Anything else retries only
 * when it, or its cause (undici's "fetch failed" wraps the socket error), carries a
 * network error code.
 */
export function isTransient(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const status = statusOf(error);
  if (status !== undefined) return RETRYABLE_STATUS.has(status);
  const code = codeOf(error) ?? codeOf(error.cause);
  return code !== undefined && NETWORK_CODES.has(code);
}

/**
 * Full-jitter exponential backoff: random delay in [0, min(cap, base * 2^attempt)]
 */
function fullJitterDelay(attempt: number, minMs: number, maxMs: number): number {
  return Math.random() * Math.min(maxMs, minMs * 2 ** attempt);
}

/**
 * Retry an async function with full-jitter exponential backoff.
 * Defaults: 5 attempts, 1s–30s delay range.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 5, minDelayMs = 1000, maxDelayMs = 30000, retryable = isTransient, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !retryable(error)) throw error;

      const delay = fullJitterDelay(attempt - 1, minDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}
