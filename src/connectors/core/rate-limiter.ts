import type { RateLimiter, RateLimiterConfig } from "./types.js";
import { sleep } from "./retry.js";

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;

  private requestTimestamps: number[] = [];

  // Allow external updates from response headers
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
  }

  async acquire(): Promise<void> {
    // If we have header-reported remaining counts, respect them
    if (this.remainingRequests !== null && this.remainingRequests < 1) {
      if (this.resetAt && this.resetAt > Date.now()) {
        await sleep(this.resetAt - Date.now() + 100);
      }
      this.remainingRequests = null;
    }

    // Enforce request window
    if (this.maxRequests < Infinity) {
      this.requestTimestamps = this.requestTimestamps.filter(
        (ts) => Date.now() - ts < this.windowMs,
      );
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0];
        const waitMs = this.windowMs - (Date.now() - oldest) + 50;
        await sleep(waitMs);
        this.requestTimestamps = this.requestTimestamps.filter(
          (ts) => Date.now() - ts < this.windowMs,
        );
      }
      this.requestTimestamps.push(Date.now());
    }
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining =
      headers["x-ratelimit-remaining"] ??
      headers["x-ratelimit-requests-remaining"];
    if (remaining !== undefined) {
      const parsed = parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    const reset =
      headers["x-ratelimit-reset"] ?? headers["x-ratelimit-requests-reset"];
    if (reset !== undefined) {
      const resetVal = parseInt(reset, 10);
      // Could be epoch seconds or ms
      if (!Number.isNaN(resetVal)) {
        this.resetAt = resetVal < 1e12 ? resetVal * 1000 : resetVal;
      }
    }
  }

  /** Header-reported requests left in the current window, if known. */
  get remaining(): number | null {
    return this.remainingRequests;
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
