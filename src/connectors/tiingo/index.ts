// HTTP client
export type { FetchFn, TiingoApiOptions } from "./api.js";
export { parseRetryAfter, TiingoApi } from "./api.js";
// Config
export type { LoadConfigOptions } from "./config.js";
export {
  DEFAULT_API_URL,
  DEFAULT_SYMBOLS,
  TAP_NAME,
  TAP_VERSION,
  WILDCARD_SYMBOLS,
  defaultUserAgent,
  loadConfig,
  parseConfig,
} from "./config.js";
// Streams
export type { TiingoStream, TiingoStreamOptions } from "./streams.js";
export {
  createStreams,
  DAILY_PRICES_SCHEMA,
  DailyPricesStream,
  DEFAULT_PRICES_START_DATE,
  TICKER_METADATA_SCHEMA,
  TickerMetadataStream,
} from "./streams.js";
// Wiring
export type { TapDependencies } from "./tap.js";
export { createTap, createTiingoApi } from "./tap.js";
// Types
export type {
  TiingoConfig,
  TiingoDailyPrice,
  TiingoTickerMetadata,
} from "./types.js";
