import { describe, expect, it } from "vitest";
import { SchemaViolationError } from "../../../src/connectors/core/errors.js";
import {
  assertStreamShape,
  coerceField,
  mapRecord,
  selectFields,
  toJsonSchema,
} from "../../../src/connectors/core/schema.js";
import type { FieldSchema, StreamSchema } from "../../../src/connectors/core/types.js";

// ─── Helpers ───

function field(type: FieldSchema["type"], nullable = true): FieldSchema {
  return { type, nullable };
}

function coerce(f: FieldSchema, value: unknown) {
  return coerceField("s", "f", f, value);
}

describe("coerceField", () => {
  it("parses numeric strings as numbers", () => {
    expect(coerce(field("number"), "132.05")).toBe(132.05);
    expect(coerce(field("number"), " 7 ")).toBe(7);
  });

  it("rejects non-numeric strings for number fields", () => {
    expect(() => coerce(field("number"), "abc")).toThrow(SchemaViolationError);
    expect(() => coerce(field("number"), "")).toThrow(SchemaViolationError);
  });

  it("requires whole values for integer fields", () => {
    expect(coerce(field("integer"), "112117500")).toBe(112117500);
    expect(() => coerce(field("integer"), 1.5)).toThrow(SchemaViolationError);
  });

  it("accepts boolean literals and their string forms", () => {
    expect(coerce(field("boolean"), true)).toBe(true);
    expect(coerce(field("boolean"), "false")).toBe(false);
    expect(() => coerce(field("boolean"), "yes")).toThrow(SchemaViolationError);
  });

  it("normalizes timestamps to ISO-8601 UTC", () => {
    expect(coerce(field("timestamp"), "2023-01-03T00:00:00+02:00")).toBe(
      "2023-01-02T22:00:00.000Z",
    );
    expect(coerce(field("timestamp"), 0)).toBe("1970-01-01T00:00:00.000Z");
  });

  it("reduces dates to their UTC day", () => {
    expect(coerce(field("date"), "2023-01-03T00:00:00.000Z")).toBe("2023-01-03");
    expect(coerce(field("date"), "2023-01-03")).toBe("2023-01-03");
    expect(() => coerce(field("date"), "someday")).toThrow(SchemaViolationError);
  });

  it("turns numbers into strings for string fields", () => {
    expect(coerce(field("string"), 42)).toBe("42");
    expect(() => coerce(field("string"), { a: 1 })).toThrow(SchemaViolationError);
  });

  it("returns null for a missing nullable field", () => {
    expect(coerce(field("number"), undefined)).toBeNull();
    expect(coerce(field("number"), null)).toBeNull();
  });

  it("rejects a missing non-nullable field", () => {
    expect(() => coerce(field("string", false), undefined)).toThrow(
      "Schema violation at s.f: required field is missing",
    );
  });

  it("maps nested objects and reports dotted paths", () => {
    const address: FieldSchema = {
      type: "object",
      nullable: true,
      properties: { city: field("string", false), zip: field("integer") },
    };
    expect(coerce(address, { city: "Cupertino", zip: "95014", extra: 1 })).toEqual({
      city: "Cupertino",
      zip: 95014,
    });

    try {
      coerce(address, { zip: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaViolationError);
      if (err instanceof SchemaViolationError) {
        expect(err.field).toBe("f.city");
        expect(err.rootField).toBe("f");
      }
    }
  });

  it("passes schemaless objects through as JSON", () => {
    expect(coerce(field("object"), { a: [1, "x", null] })).toEqual({ a: [1, "x", null] });
  });
});

describe("mapRecord", () => {
  const schema: StreamSchema = {
    ticker: field("string", false),
    close: field("number"),
    volume: field("integer"),
  };

  it("keeps schema fields in schema order and drops unknown ones", () => {
    const record = mapRecord("prices", schema, { volume: "10", junk: true, close: "1.5", ticker: "AAPL" });
    expect(record).toEqual({ ticker: "AAPL", close: 1.5, volume: 10 });
    expect(Object.keys(record)).toEqual(["ticker", "close", "volume"]);
  });

  it("rejects elements that are not objects", () => {
    try {
      mapRecord("prices", schema, [1, 2]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaViolationError);
      if (err instanceof SchemaViolationError) expect(err.field).toBeNull();
    }
  });
});

describe("selectFields", () => {
  it("keeps selected fields plus the always-kept ones", () => {
    const record = { ticker: "AAPL", date: "2023-01-03", close: 1, open: 2 };
    expect(selectFields(record, new Set(["close"]), ["ticker", "date"])).toEqual({
      ticker: "AAPL",
      date: "2023-01-03",
      close: 1,
    });
  });

  it("returns the record unchanged without a selection", () => {
    const record = { ticker: "AAPL" };
    expect(selectFields(record, null, [])).toBe(record);
  });
});

describe("toJsonSchema", () => {
  it("marks nullable fields and formats", () => {
    expect(
      toJsonSchema({
        ticker: { type: "string", nullable: false, description: "Symbol" },
        date: field("date", false),
        at: field("timestamp"),
      }),
    ).toEqual({
      type: "object",
      additionalProperties: false,
      properties: {
        ticker: { type: "string", description: "Symbol" },
        date: { type: "string", format: "date" },
        at: { type: ["string", "null"], format: "date-time" },
      },
    });
  });
});

describe("assertStreamShape", () => {
  const schema: StreamSchema = {
    ticker: field("string", false),
    meta: field("object"),
    flag: field("boolean"),
  };

  it("accepts a well-formed stream", () => {
    expect(() => assertStreamShape("s", schema, ["ticker"], null)).not.toThrow();
  });

  it("rejects key properties missing from the schema", () => {
    expect(() => assertStreamShape("s", schema, ["date"], null)).toThrow(
      'Stream "s": key property "date" is not in the schema',
    );
  });

  it("rejects an unorderable replication key", () => {
    expect(() => assertStreamShape("s", schema, ["ticker"], "flag")).toThrow(
      'Stream "s": replication key "flag" has unorderable type boolean',
    );
  });
});
