import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { StateStoreError } from "./errors.js";
import type {
  CursorValue,
  PartitionBookmark,
  StateStore,
  SyncState,
} from "./types.js";

const PartitionBookmarkSchema = z.object({
  context: z.record(z.string()),
  replication_key: z.string(),
  replication_key_value: z.union([z.string(), z.number()]),
});

const SyncStateSchema = z.object({
  bookmarks: z
    .record(z.object({ partitions: z.array(PartitionBookmarkSchema).default([]) }))
    .default({}),
});

export function emptyState(): SyncState {
  return { bookmarks: {} };
}

/** Validate a state document read from disk or passed on the command line. */
export function parseState(raw: unknown): SyncState {
  const result = SyncStateSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new StateStoreError(`Malformed state: ${issues.join("; ")}`);
  }
  return result.data;
}

function compareCursor(a: CursorValue, b: CursorValue): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/**
 * In-memory bookmark bookkeeping for one run. Bookmarks only move forward.
 */
export class StateManager {
  private readonly state: SyncState;

  constructor(initial: SyncState = emptyState()) {
    this.state = structuredClone(initial);
  }

  getBookmark(stream: string, partitionKey: string, partition: string): CursorValue | null {
    return this.find(stream, partitionKey, partition)?.replication_key_value ?? null;
  }

  /**
   * Move a partition's bookmark to `value` unless it already holds a later
   * one. Returns whether the bookmark changed.
   */
  advanceBookmark(
    stream: string,
    replicationKey: string,
    partitionKey: string,
    partition: string,
    value: CursorValue,
  ): boolean {
    const existing = this.find(stream, partitionKey, partition);
    if (existing) {
      if (compareCursor(value, existing.replication_key_value) <= 0) return false;
      existing.replication_key = replicationKey;
      existing.replication_key_value = value;
      return true;
    }

    const bookmark = (this.state.bookmarks[stream] ??= { partitions: [] });
    bookmark.partitions.push({
      context: { [partitionKey]: partition },
      replication_key: replicationKey,
      replication_key_value: value,
    });
    return true;
  }

  snapshot(): SyncState {
    return structuredClone(this.state);
  }

  private find(
    stream: string,
    partitionKey: string,
    partition: string,
  ): PartitionBookmark | undefined {
    return this.state.bookmarks[stream]?.partitions.find(
      (p) => p.context[partitionKey] === partition,
    );
  }
}

/** Later of two cursor values. */
export function maxCursor(a: CursorValue | null, b: CursorValue): CursorValue {
  return a === null || compareCursor(b, a) > 0 ? b : a;
}

// ─── Stores ───

/**
 * Durable state file. Writes go to a temp file which is then renamed over
 * the target, so a crash leaves either the old or the new checkpoint.
 */
export class FileStateStore implements StateStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<SyncState> {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return emptyState();
      throw new StateStoreError(`Cannot read state file ${this.filePath}`, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StateStoreError(`State file ${this.filePath} is not valid JSON`, {
        cause: err,
      });
    }
    return parseState(parsed);
  }

  async write(state: SyncState): Promise<void> {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      throw new StateStoreError(`Cannot write state file ${this.filePath}`, {
        cause: err,
      });
    }
  }
}

/** Keeps every written snapshot; used when no state file is configured. */
export class MemoryStateStore implements StateStore {
  readonly snapshots: SyncState[] = [];
  private readonly initial: SyncState;

  constructor(initial: SyncState = emptyState()) {
    this.initial = structuredClone(initial);
  }

  async load(): Promise<SyncState> {
    return structuredClone(this.latest ?? this.initial);
  }

  async write(state: SyncState): Promise<void> {
    this.snapshots.push(structuredClone(state));
  }

  get latest(): SyncState | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
