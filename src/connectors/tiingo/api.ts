/**
 * HTTP client for the Tiingo REST API with rate limiting, retry, and
 * error classification.
 */

import {
  AuthenticationError,
  errorMessage,
  FatalFetchError,
  TransientFetchError,
} from "../core/errors.js";
import type {
  FetchResult,
  HttpClient,
  Logger,
  QueryParams,
  RateLimiter,
} from "../core/index.js";
import { BackoffState, withRetry } from "../core/index.js";
import type { TiingoErrorBody } from "./types.js";

const BASE_RETRY_DELAY_MS = 1_000;
const MAX_RETRY_DELAY_MS = 60_000;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface TiingoApiOptions {
  apiKey: string;
  apiUrl: string;
  userAgent: string;
  rateLimiter: RateLimiter;
  logger: Logger;
  maxRetries: number;
  requestTimeoutMs: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Defaults to the global fetch. */
  fetchFn?: FetchFn;
}

export class TiingoApi implements HttpClient {
  private readonly opts: TiingoApiOptions;
  private readonly fetchFn: FetchFn;
  private readonly backoff = new BackoffState();

  constructor(opts: TiingoApiOptions) {
    this.opts = opts;
    this.fetchFn = opts.fetchFn ?? ((url, init) => fetch(url, init));
  }

  /** Current backoff pressure, for diagnostics. */
  get backoffLevel(): number {
    return this.backoff.level;
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const normalized = path.startsWith("/") ? path : `/${path}`;
    const url = new URL(`${this.opts.apiUrl}${normalized}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * GET a JSON resource. Retries 429, 5xx, timeouts and network errors;
   * throws `AuthenticationError`, `FatalFetchError`, or `TransientFetchError`
   * once retries run out.
   */
  async get(path: string, params: QueryParams = {}): Promise<FetchResult> {
    const url = this.buildUrl(path, params);
    let attempts = 0;

    try {
      const result = await withRetry(
        async () => {
          attempts++;
          await this.opts.rateLimiter.acquire();
          return this.attempt(url);
        },
        {
          maxRetries: this.opts.maxRetries,
          baseDelayMs: this.opts.baseDelayMs ?? BASE_RETRY_DELAY_MS,
          maxDelayMs: this.opts.maxDelayMs ?? MAX_RETRY_DELAY_MS,
          backoff: this.backoff,
          retryOn: (err) => err instanceof TransientFetchError,
          retryAfter: (err) => (err instanceof TransientFetchError ? err.retryAfterMs : null),
          onRetry: (err, attempt, delayMs) => {
            this.opts.logger.warn(
              `${errorMessage(err)}, retrying in ${delayMs}ms (attempt ${attempt}/${this.opts.maxRetries})`,
              { path },
            );
          },
        },
      );
      this.backoff.decay();
      return result;
    } catch (err) {
      if (err instanceof TransientFetchError) {
        throw new TransientFetchError({
          message: `GET ${path} failed after ${attempts} attempts: ${err.message}`,
          status: err.status,
          attempts,
          cause: err,
        });
      }
      throw err;
    }
  }

  private async attempt(url: string): Promise<FetchResult> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          Authorization: `Token ${this.opts.apiKey}`,
          "Content-Type": "application/json",
          "User-Agent": this.opts.userAgent,
        },
        signal: AbortSignal.timeout(this.opts.requestTimeoutMs),
      });
    } catch (err) {
      throw new TransientFetchError({
        message: `Network error: ${errorMessage(err)}`,
        status: null,
        cause: err,
      });
    }

    this.opts.rateLimiter.updateFromHeaders(headerMap(response.headers));

    // The timeout signal also covers the body read
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new TransientFetchError({
        message: `Network error reading response (HTTP ${response.status}): ${errorMessage(err)}`,
        status: response.status,
        cause: err,
      });
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        response.status,
        `Tiingo rejected the API key (HTTP ${response.status}): ${errorDetail(text)}`,
      );
    }

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      this.backoff.escalate();
      throw new TransientFetchError({
        message: "Rate limited (429)",
        status: 429,
        retryAfterMs,
      });
    }

    if (response.status >= 500) {
      throw new TransientFetchError({
        message: `Server error (${response.status})`,
        status: response.status,
      });
    }

    if (!response.ok) {
      throw new FatalFetchError({
        message: `HTTP ${response.status}: ${errorDetail(text)}`,
        status: response.status,
      });
    }

    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch (err) {
      throw new FatalFetchError({
        message: `Malformed JSON in response (HTTP ${response.status})`,
        status: response.status,
        cause: err,
      });
    }
  }
}

// ─── Helpers ───

function headerMap(headers: Headers): Record<string, string> {
  const map: Record<string, string> = {};
  headers.forEach((value, key) => {
    if (key.startsWith("x-ratelimit-")) map[key] = value;
  });
  return map;
}

/** Retry-After in seconds or as an HTTP date. */
export function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - Date.now());
}

function errorDetail(text: string): string {
  try {
    const body: unknown = JSON.parse(text);
    if (isErrorBody(body) && body.detail) return body.detail;
  } catch {
    // not JSON; fall through to the raw text
  }
  return text.slice(0, 200) || "no response body";
}

function isErrorBody(body: unknown): body is TiingoErrorBody {
  return (
    typeof body === "object" &&
    body !== null &&
    (!("detail" in body) || typeof body.detail === "string")
  );
}
