import {
  AuthenticationError,
  errorMessage,
  isRetryable,
  SchemaViolationError,
  StateStoreError,
  SyncAbortedError,
} from "./errors.js";
import { createLogger } from "./logger.js";
import { recordMessage, schemaMessage, stateMessage } from "./output.js";
import { selectFields, selectSchema, toJsonSchema } from "./schema.js";
import { maxCursor, StateManager } from "./state.js";
import type {
  CursorValue,
  HttpClient,
  Logger,
  MessageWriter,
  RequestCursor,
  StateStore,
  StreamDefinition,
  StreamRecord,
  StreamResult,
  StreamSelection,
  SyncResult,
} from "./types.js";

export interface SyncEngineConfig {
  /** Streams in declared order. */
  streams: StreamDefinition[];
  client: HttpClient;
  stateStore: StateStore;
  writer: MessageWriter;
  logger?: Logger;
  /** Catalog selections; when absent every stream and field is selected. */
  selections?: Map<string, StreamSelection>;
  /** Escalate every schema violation instead of skipping the record. */
  strictMode?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
}

interface PageOutcome {
  records: StreamRecord[];
  maxCursor: CursorValue | null;
}

export class SyncEngine {
  private readonly config: SyncEngineConfig;
  private readonly logger: Logger;
  private readonly signal: AbortSignal;
  private readonly now: () => Date;

  constructor(config: SyncEngineConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger("sync");
    this.signal = config.signal ?? new AbortController().signal;
    this.now = config.now ?? (() => new Date());
  }

  listStreams(): string[] {
    return this.config.streams.map((s) => s.name);
  }

  selectedStreams(): StreamDefinition[] {
    const { selections } = this.config;
    if (!selections) return [...this.config.streams];
    return this.config.streams.filter((s) => selections.has(s.name));
  }

  /**
   * Sync every selected stream in declared order. Resolves with a per-stream
   * report; rejects only on authentication or state store failure.
   */
  async run(): Promise<SyncResult> {
    const startTime = Date.now();
    const state = new StateManager(await this.config.stateStore.load());
    const streams = this.selectedStreams();
    const results: StreamResult[] = streams.map((s) => ({
      stream: s.name,
      status: "NOT_STARTED",
      recordsEmitted: 0,
      recordsSkipped: 0,
      errors: [],
    }));

    let cancelled = false;
    for (const [i, stream] of streams.entries()) {
      if (this.signal.aborted) {
        cancelled = true;
        break;
      }
      const finished = await this.syncStream(stream, state, results[i]);
      if (!finished) {
        cancelled = true;
        break;
      }
    }

    if (cancelled) {
      await this.checkpoint(state);
      this.logger.warn("Sync cancelled, last checkpoint flushed");
    }

    return {
      streams: results,
      recordsEmitted: results.reduce((sum, r) => sum + r.recordsEmitted, 0),
      cancelled,
      durationMs: Date.now() - startTime,
    };
  }

  /** Returns false when the stream stopped on cancellation. */
  private async syncStream(
    stream: StreamDefinition,
    state: StateManager,
    result: StreamResult,
  ): Promise<boolean> {
    const selection = this.config.selections?.get(stream.name)?.fields ?? null;
    const alwaysKeep = this.alwaysKept(stream);
    const partitions = stream.partitions();

    result.status = "IN_PROGRESS";
    this.logger.info(`Starting ${stream.name} (${stream.replicationMethod})`, {
      partitions: partitions.length,
    });
    this.config.writer.write(
      schemaMessage(
        stream.name,
        toJsonSchema(selectSchema(stream.schema, selection, alwaysKeep)),
        stream.keyProperties,
        stream.replicationKey,
      ),
    );

    let partition: string | null = null;
    try {
      for (const [i, current] of partitions.entries()) {
        partition = current;
        const bookmark =
          stream.replicationKey === null
            ? null
            : state.getBookmark(stream.name, stream.partitionKey, current);
        let request: RequestCursor | null = stream.requestInitial(current, bookmark);

        while (request) {
          if (this.signal.aborted) throw new SyncAbortedError();

          const { body } = await this.config.client.get(request.path, request.params);
          const elements = stream.extractElements(body);
          const page = this.emitPage(stream, request, elements, selection, alwaysKeep, result);

          if (stream.replicationKey !== null && page.maxCursor !== null) {
            state.advanceBookmark(
              stream.name,
              stream.replicationKey,
              stream.partitionKey,
              current,
              page.maxCursor,
            );
          }
          await this.checkpoint(state);

          request = stream.nextRequest(request, {
            rawCount: elements.length,
            records: page.records,
          });
        }
        this.logger.progress(i + 1, partitions.length, stream.name);
      }
      result.status = "COMPLETED";
      this.logger.info(`Completed ${stream.name}`, {
        records: result.recordsEmitted,
        skipped: result.recordsSkipped,
      });
      return true;
    } catch (err) {
      if (err instanceof SyncAbortedError) {
        result.status = "CANCELLED";
        return false;
      }

      result.status = "FAILED";
      const lastCursor =
        partition === null || stream.replicationKey === null
          ? null
          : state.getBookmark(stream.name, stream.partitionKey, partition);
      this.logger.error(`Stream ${stream.name} failed: ${errorMessage(err)}`, {
        stream: stream.name,
        [stream.partitionKey]: partition,
        lastCursor,
      });

      if (err instanceof AuthenticationError || err instanceof StateStoreError) {
        throw err;
      }
      result.errors.push({
        stream: stream.name,
        partition,
        error: errorMessage(err),
        retryable: isRetryable(err),
        lastCursor,
      });
      return true;
    }
  }

  private emitPage(
    stream: StreamDefinition,
    request: RequestCursor,
    elements: unknown[],
    selection: ReadonlySet<string> | null,
    alwaysKeep: readonly string[],
    result: StreamResult,
  ): PageOutcome {
    const extractedAt = this.now();
    const records: StreamRecord[] = [];
    let pageMax: CursorValue | null = null;

    for (const element of elements) {
      let record: StreamRecord;
      try {
        record = stream.mapRecord(element, request);
      } catch (err) {
        if (!(err instanceof SchemaViolationError) || this.mustEscalate(stream, err)) {
          throw err;
        }
        result.recordsSkipped++;
        this.logger.warn(`Skipping record: ${err.message}`, {
          stream: stream.name,
          [stream.partitionKey]: request.partition,
        });
        continue;
      }

      if (stream.replicationKey !== null) {
        const value = record[stream.replicationKey];
        if (typeof value === "string" || typeof value === "number") {
          pageMax = maxCursor(pageMax, value);
        }
      }
      records.push(record);
      this.config.writer.write(
        recordMessage(stream.name, selectFields(record, selection, alwaysKeep), extractedAt),
      );
      result.recordsEmitted++;
    }

    return { records, maxCursor: pageMax };
  }

  /** Key and cursor violations always fail the stream. */
  private mustEscalate(stream: StreamDefinition, err: SchemaViolationError): boolean {
    if (this.config.strictMode) return true;
    const field = err.rootField;
    return field === null || this.alwaysKept(stream).includes(field);
  }

  private alwaysKept(stream: StreamDefinition): string[] {
    return stream.replicationKey === null
      ? [...stream.keyProperties]
      : [...stream.keyProperties, stream.replicationKey];
  }

  private async checkpoint(state: StateManager): Promise<void> {
    const snapshot = state.snapshot();
    try {
      await this.config.stateStore.write(snapshot);
    } catch (err) {
      if (err instanceof StateStoreError) throw err;
      throw new StateStoreError(`Checkpoint failed: ${errorMessage(err)}`, { cause: err });
    }
    this.config.writer.write(stateMessage(snapshot));
  }
}
