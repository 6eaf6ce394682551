/**
 * Error taxonomy for the sync engine.
 *
 * - `AuthenticationError` aborts the whole run.
 * - `TransientFetchError` is retried; once retries run out it fails the stream.
 * - `FatalFetchError` fails the current stream.
 * - `SchemaViolationError` skips the record or fails the stream, depending
 *   on the field and on strict mode.
 * - `StateStoreError` aborts the whole run.
 */

export class TapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TapError";
  }
}

export class AuthenticationError extends TapError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "AuthenticationError";
    this.status = status;
  }
}

export interface FetchErrorOptions {
  message: string;
  /** HTTP status, or null when no response arrived. */
  status: number | null;
  cause?: unknown;
}

export class TransientFetchError extends TapError {
  readonly status: number | null;
  readonly attempts: number;
  /** Server-requested wait, from a Retry-After header. */
  readonly retryAfterMs: number | null;

  constructor(
    options: FetchErrorOptions & { attempts?: number; retryAfterMs?: number | null },
  ) {
    super(options.message, { cause: options.cause });
    this.name = "TransientFetchError";
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class FatalFetchError extends TapError {
  readonly status: number | null;

  constructor(options: FetchErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = "FatalFetchError";
    this.status = options.status;
  }
}

export class SchemaViolationError extends TapError {
  readonly stream: string;
  /** Dotted field path, or null when the whole element is unusable. */
  readonly field: string | null;
  readonly value: unknown;

  constructor(stream: string, field: string | null, value: unknown, reason: string) {
    const where = field === null ? stream : `${stream}.${field}`;
    super(`Schema violation at ${where}: ${reason}`);
    this.name = "SchemaViolationError";
    this.stream = stream;
    this.field = field;
    this.value = value;
  }

  /** Top-level field name the violation belongs to. */
  get rootField(): string | null {
    return this.field === null ? null : this.field.split(".")[0];
  }
}

export class StateStoreError extends TapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateStoreError";
  }
}

export class ConfigError extends TapError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Raised between pages once the cancellation signal has fired. */
export class SyncAbortedError extends TapError {
  constructor() {
    super("Sync aborted");
    this.name = "SyncAbortedError";
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientFetchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
