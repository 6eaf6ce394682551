/** Core type definitions for tap-tiingo. */

// ─── JSON Values ───

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** One emitted data row, keyed by schema field name. */
export type StreamRecord = Record<string, JsonValue>;

// ─── Field Schema ───

export type FieldType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "timestamp"
  | "date"
  | "object";

export interface FieldSchema {
  type: FieldType;
  nullable: boolean;
  description?: string;
  /** Nested fields, only for `object`. */
  properties?: StreamSchema;
}

/** Ordered mapping of field name to declared type (insertion order is kept). */
export type StreamSchema = Record<string, FieldSchema>;

export interface JsonSchema {
  type: string | string[];
  format?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  additionalProperties?: boolean;
}

// ─── Streams ───

export type ReplicationMethod = "FULL_TABLE" | "INCREMENTAL";

export type StreamStatus =
  | "NOT_STARTED"
  | "IN_PROGRESS"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED";

export type QueryParams = Record<string, string | undefined>;

/** In-memory request position for one partition; never persisted. */
export interface RequestCursor {
  partition: string;
  path: string;
  params: QueryParams;
  page: number;
}

/** What a paginator gets to see about the page it just finished. */
export interface Page {
  rawCount: number;
  records: StreamRecord[];
}

export interface Paginator {
  next(cursor: RequestCursor, page: Page): RequestCursor | null;
}

export interface StreamDefinition {
  readonly kind: string;
  readonly name: string;
  readonly keyProperties: readonly string[];
  readonly replicationMethod: ReplicationMethod;
  /** Present only for INCREMENTAL streams. */
  readonly replicationKey: string | null;
  /** Context key naming a partition in persisted bookmarks. */
  readonly partitionKey: string;
  readonly schema: StreamSchema;
  partitions(): string[];
  /** First request for a partition, or null when there is nothing to fetch. */
  requestInitial(partition: string, bookmark: CursorValue | null): RequestCursor | null;
  nextRequest(cursor: RequestCursor, page: Page): RequestCursor | null;
  extractElements(body: unknown): unknown[];
  mapRecord(raw: unknown, cursor: RequestCursor): StreamRecord;
}

// ─── HTTP ───

export interface FetchResult {
  status: number;
  body: unknown;
}

export interface HttpClient {
  get(path: string, params?: QueryParams): Promise<FetchResult>;
}

// ─── Sync State ───

export type CursorValue = string | number;

export interface PartitionBookmark {
  context: Record<string, string>;
  replication_key: string;
  replication_key_value: CursorValue;
}

export interface StreamBookmark {
  partitions: PartitionBookmark[];
}

export interface SyncState {
  bookmarks: Record<string, StreamBookmark>;
}

export interface StateStore {
  load(): Promise<SyncState>;
  write(state: SyncState): Promise<void>;
}

// ─── Sync Result ───

export interface SyncError {
  stream: string;
  partition: string | null;
  error: string;
  retryable: boolean;
  /** Last committed bookmark for the partition, for resuming. */
  lastCursor: CursorValue | null;
}

export interface StreamResult {
  stream: string;
  status: StreamStatus;
  recordsEmitted: number;
  recordsSkipped: number;
  errors: SyncError[];
}

export interface SyncResult {
  streams: StreamResult[];
  recordsEmitted: number;
  cancelled: boolean;
  durationMs: number;
}

// ─── Catalog Selection ───

export interface StreamSelection {
  /** Selected field names; null selects every field. */
  fields: ReadonlySet<string> | null;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Message Output ───

export interface SchemaMessage {
  type: "SCHEMA";
  stream: string;
  schema: JsonSchema;
  key_properties: string[];
  bookmark_properties: string[];
}

export interface RecordMessage {
  type: "RECORD";
  stream: string;
  record: StreamRecord;
  time_extracted: string;
}

export interface StateMessage {
  type: "STATE";
  value: SyncState;
}

export type Message = SchemaMessage | RecordMessage | StateMessage;

export interface MessageWriter {
  write(message: Message): void;
}
