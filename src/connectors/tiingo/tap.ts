/**
 * Wires config, HTTP client, streams and the sync engine together.
 */

import type {
  Logger,
  MessageWriter,
  StateStore,
  StreamSelection,
} from "../core/index.js";
import { createLogger, createRateLimiter, SyncEngine } from "../core/index.js";
import type { FetchFn } from "./api.js";
import { TiingoApi } from "./api.js";
import { defaultUserAgent } from "./config.js";
import { createStreams } from "./streams.js";
import type { TiingoConfig } from "./types.js";

const HOUR_MS = 3_600_000;

export interface TapDependencies {
  stateStore: StateStore;
  writer: MessageWriter;
  logger?: Logger;
  selections?: Map<string, StreamSelection>;
  signal?: AbortSignal;
  fetchFn?: FetchFn;
  now?: () => Date;
  /** Retry delay tuning, mostly for tests. */
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export function createTiingoApi(
  config: TiingoConfig,
  deps: Pick<TapDependencies, "logger" | "fetchFn" | "baseDelayMs" | "maxDelayMs"> = {},
): TiingoApi {
  return new TiingoApi({
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    userAgent: config.userAgent ?? defaultUserAgent(),
    rateLimiter: createRateLimiter(
      config.maxRequestsPerHour === undefined
        ? {}
        : { maxRequests: config.maxRequestsPerHour, windowMs: HOUR_MS },
    ),
    logger: deps.logger ?? createLogger("tiingo:http"),
    maxRetries: config.maxRetries,
    requestTimeoutMs: config.requestTimeoutMs,
    baseDelayMs: deps.baseDelayMs,
    maxDelayMs: deps.maxDelayMs,
    fetchFn: deps.fetchFn,
  });
}

export function createTap(config: TiingoConfig, deps: TapDependencies): SyncEngine {
  const logger = deps.logger ?? createLogger("tap-tiingo");
  return new SyncEngine({
    streams: createStreams({
      symbols: config.symbols,
      startDate: config.startDate,
      endDate: config.endDate,
      pageSize: config.pageSize,
      now: deps.now,
    }),
    client: createTiingoApi(config, { ...deps, logger }),
    stateStore: deps.stateStore,
    writer: deps.writer,
    logger,
    selections: deps.selections,
    strictMode: config.strictMode,
    signal: deps.signal,
    now: deps.now,
  });
}
