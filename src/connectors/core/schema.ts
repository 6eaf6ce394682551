/**
 * Field-level coercion and validation against a declared stream schema.
 *
 * Every field type has one coercion function. A value that cannot be
 * coerced, or a missing value for a non-nullable field, raises
 * `SchemaViolationError` naming the dotted field path.
 */

import { normalizeDate, parseInstant } from "./dates.js";
import { SchemaViolationError } from "./errors.js";
import type {
  FieldSchema,
  FieldType,
  JsonSchema,
  JsonValue,
  StreamRecord,
  StreamSchema,
} from "./types.js";

type Coercion = (value: unknown) => JsonValue | undefined;

// ─── Per-type coercions (undefined = incompatible) ───

function coerceString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return undefined;
}

function coerceNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function coerceInteger(value: unknown): number | undefined {
  const num = coerceNumber(value);
  return num !== undefined && Number.isInteger(num) ? num : undefined;
}

function coerceBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

function coerceTimestamp(value: unknown): string | undefined {
  if (typeof value === "string") {
    return parseInstant(value)?.toISOString();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value).toISOString();
  }
  return undefined;
}

function coerceDate(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  return normalizeDate(value) ?? undefined;
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (isPlainObject(value)) {
    const out: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      out[key] = converted;
    }
    return out;
  }
  return undefined;
}

const COERCIONS: Record<Exclude<FieldType, "object">, Coercion> = {
  string: coerceString,
  number: coerceNumber,
  integer: coerceInteger,
  boolean: coerceBoolean,
  timestamp: coerceTimestamp,
  date: coerceDate,
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Mapping ───

/**
 * Coerce one field value. `path` is the dotted field name used in errors.
 */
export function coerceField(
  stream: string,
  path: string,
  field: FieldSchema,
  value: unknown,
): JsonValue {
  if (value === undefined || value === null) {
    if (field.nullable) return null;
    throw new SchemaViolationError(stream, path, value, "required field is missing");
  }

  if (field.type === "object") {
    if (!isPlainObject(value)) {
      throw new SchemaViolationError(stream, path, value, "expected an object");
    }
    if (!field.properties) {
      const converted = toJsonValue(value);
      if (converted === undefined) {
        throw new SchemaViolationError(stream, path, value, "not representable as JSON");
      }
      return converted;
    }
    return mapFields(stream, field.properties, value, `${path}.`);
  }

  const coerced = COERCIONS[field.type](value);
  if (coerced === undefined) {
    throw new SchemaViolationError(
      stream,
      path,
      value,
      `cannot coerce ${JSON.stringify(value)} to ${field.type}`,
    );
  }
  return coerced;
}

function mapFields(
  stream: string,
  schema: StreamSchema,
  raw: Record<string, unknown>,
  prefix: string,
): StreamRecord {
  const record: StreamRecord = {};
  for (const [name, field] of Object.entries(schema)) {
    record[name] = coerceField(stream, `${prefix}${name}`, field, raw[name]);
  }
  return record;
}

/**
 * Build a record holding exactly the schema's fields, in schema order.
 * Raw fields the schema does not declare are dropped.
 */
export function mapRecord(
  stream: string,
  schema: StreamSchema,
  raw: unknown,
): StreamRecord {
  if (!isPlainObject(raw)) {
    throw new SchemaViolationError(stream, null, raw, "element is not an object");
  }
  return mapFields(stream, schema, raw, "");
}

/**
 * Keep only selected fields. Fields in `alwaysKeep` survive any selection.
 */
export function selectFields(
  record: StreamRecord,
  selected: ReadonlySet<string> | null,
  alwaysKeep: readonly string[],
): StreamRecord {
  if (selected === null) return record;
  const out: StreamRecord = {};
  for (const [name, value] of Object.entries(record)) {
    if (selected.has(name) || alwaysKeep.includes(name)) out[name] = value;
  }
  return out;
}

export function selectSchema(
  schema: StreamSchema,
  selected: ReadonlySet<string> | null,
  alwaysKeep: readonly string[],
): StreamSchema {
  if (selected === null) return schema;
  const out: StreamSchema = {};
  for (const [name, field] of Object.entries(schema)) {
    if (selected.has(name) || alwaysKeep.includes(name)) out[name] = field;
  }
  return out;
}

// ─── JSON Schema ───

const JSON_TYPES: Record<FieldType, { type: string; format?: string }> = {
  string: { type: "string" },
  number: { type: "number" },
  integer: { type: "integer" },
  boolean: { type: "boolean" },
  timestamp: { type: "string", format: "date-time" },
  date: { type: "string", format: "date" },
  object: { type: "object" },
};

function fieldToJsonSchema(field: FieldSchema): JsonSchema {
  const { type, format } = JSON_TYPES[field.type];
  const out: JsonSchema = { type: field.nullable ? [type, "null"] : type };
  if (format) out.format = format;
  if (field.description) out.description = field.description;
  if (field.type === "object" && field.properties) {
    out.properties = propertiesToJsonSchema(field.properties);
  }
  return out;
}

function propertiesToJsonSchema(schema: StreamSchema): Record<string, JsonSchema> {
  const properties: Record<string, JsonSchema> = {};
  for (const [name, field] of Object.entries(schema)) {
    properties[name] = fieldToJsonSchema(field);
  }
  return properties;
}

export function toJsonSchema(schema: StreamSchema): JsonSchema {
  return {
    type: "object",
    properties: propertiesToJsonSchema(schema),
    additionalProperties: false,
  };
}

// ─── Stream invariants ───

const ORDERABLE: ReadonlySet<FieldType> = new Set([
  "timestamp",
  "date",
  "integer",
  "number",
  "string",
]);

/**
 * Check that key properties and the replication key are declared fields.
 * Throws on a malformed stream definition.
 */
export function assertStreamShape(
  name: string,
  schema: StreamSchema,
  keyProperties: readonly string[],
  replicationKey: string | null,
): void {
  for (const key of keyProperties) {
    const field = schema[key];
    if (!field) {
      throw new Error(`Stream "${name}": key property "${key}" is not in the schema`);
    }
    if (field.nullable) {
      throw new Error(`Stream "${name}": key property "${key}" must not be nullable`);
    }
  }
  if (replicationKey !== null) {
    const field = schema[replicationKey];
    if (!field) {
      throw new Error(
        `Stream "${name}": replication key "${replicationKey}" is not in the schema`,
      );
    }
    if (!ORDERABLE.has(field.type)) {
      throw new Error(
        `Stream "${name}": replication key "${replicationKey}" has unorderable type ${field.type}`,
      );
    }
  }
}
