import type {
  JsonSchema,
  Message,
  MessageWriter,
  StreamRecord,
  SyncState,
} from "./types.js";

/** Anything with a string `write`, such as `process.stdout`. */
export interface TextSink {
  write(chunk: string): unknown;
}

/** Writes one JSON message per line, stdout by default. */
export class JsonLinesMessageWriter implements MessageWriter {
  private readonly out: TextSink;

  constructor(out: TextSink = process.stdout) {
    this.out = out;
  }

  write(message: Message): void {
    this.out.write(`${JSON.stringify(message)}\n`);
  }
}

export function createMessageWriter(out: TextSink = process.stdout): MessageWriter {
  return new JsonLinesMessageWriter(out);
}

// ─── Message builders ───

export function schemaMessage(
  stream: string,
  schema: JsonSchema,
  keyProperties: readonly string[],
  replicationKey: string | null,
): Message {
  return {
    type: "SCHEMA",
    stream,
    schema,
    key_properties: [...keyProperties],
    bookmark_properties: replicationKey === null ? [] : [replicationKey],
  };
}

export function recordMessage(
  stream: string,
  record: StreamRecord,
  timeExtracted: Date,
): Message {
  return {
    type: "RECORD",
    stream,
    record,
    time_extracted: timeExtracted.toISOString(),
  };
}

export function stateMessage(state: SyncState): Message {
  return { type: "STATE", value: state };
}
