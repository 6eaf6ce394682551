export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  /** Raises the exponent while the remote side keeps pushing back. */
  backoff?: BackoffState;
  /** Server-requested wait for an error; replaces the computed delay when set. */
  retryAfter?: (err: unknown) => number | null;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Backoff pressure owned by one client. Each rate-limited response raises the
 * level by one, each success lowers it by one.
 */
export class BackoffState {
  private current = 0;
  private readonly maxLevel: number;

  constructor(maxLevel = 6) {
    this.maxLevel = maxLevel;
  }

  get level(): number {
    return this.current;
  }

  escalate(): void {
    this.current = Math.min(this.current + 1, this.maxLevel);
  }

  decay(): void {
    if (this.current > 0) this.current--;
  }
}

function isRetryableError(err: unknown): boolean {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (
      msg.includes("econnreset") ||
      msg.includes("etimedout") ||
      msg.includes("enotfound") ||
      msg.includes("socket hang up") ||
      msg.includes("fetch failed")
    ) {
      return true;
    }
  }
  // Check for HTTP status codes
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return err.status >= 500 && err.status < 600;
  }
  return false;
}

export function retryDelay(
  attempt: number,
  opts: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "backoff"> = {},
): number {
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const level = opts.backoff?.level ?? 0;
  return Math.min(baseDelay * 2 ** (attempt + level), maxDelay);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      const requested = opts.retryAfter?.(err) ?? null;
      if (requested !== null) {
        opts.onRetry?.(err, attempt + 1, requested);
        await sleep(requested);
        continue;
      }
      // Exponential backoff with jitter
      const delay = retryDelay(attempt, opts);
      const jitter = delay * 0.1 * Math.random();
      opts.onRetry?.(err, attempt + 1, delay);
      await sleep(delay + jitter);
    }
  }
  throw lastError;
}
