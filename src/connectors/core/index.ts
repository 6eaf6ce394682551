// Catalog
export type { Catalog, CatalogEntry, CatalogMetadata } from "./catalog.js";
export { buildCatalog, loadCatalogSelections, readSelections } from "./catalog.js";
// Dates
export { addDays, normalizeDate, parseInstant, toDateString, yesterday } from "./dates.js";
// Sync engine
export type { SyncEngineConfig } from "./engine.js";
export { SyncEngine } from "./engine.js";
// Errors
export {
  AuthenticationError,
  ConfigError,
  FatalFetchError,
  SchemaViolationError,
  StateStoreError,
  TapError,
  TransientFetchError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Message output
export { createMessageWriter, JsonLinesMessageWriter } from "./output.js";
// Pagination
export type { DateRangePaginatorOptions } from "./pagination.js";
export { DateRangePaginator, SinglePagePaginator } from "./pagination.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
// Run summary
export { EXIT_CANCELLED, EXIT_FAILURE, EXIT_OK, exitCodeFor, formatSummary } from "./report.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { BackoffState, withRetry } from "./retry.js";
// Schema mapping
export { coerceField, mapRecord, selectFields, toJsonSchema } from "./schema.js";
// State management
export { emptyState, FileStateStore, MemoryStateStore, parseState, StateManager } from "./state.js";
export type {
  CursorValue,
  FetchResult,
  FieldSchema,
  FieldType,
  HttpClient,
  JsonSchema,
  JsonValue,
  Logger,
  Message,
  MessageWriter,
  Page,
  Paginator,
  QueryParams,
  RateLimiter,
  RateLimiterConfig,
  ReplicationMethod,
  RequestCursor,
  StateStore,
  StreamDefinition,
  StreamRecord,
  StreamResult,
  StreamSchema,
  StreamSelection,
  StreamStatus,
  SyncError,
  SyncResult,
  SyncState,
} from "./types.js";
