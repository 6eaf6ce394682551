/**
 * Discovery catalog: describes every stream with its JSON Schema and
 * selection metadata, and reads selections back from an edited catalog.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { toJsonSchema } from "./schema.js";
import type {
  JsonSchema,
  ReplicationMethod,
  StreamDefinition,
  StreamSelection,
} from "./types.js";

// ─── Catalog Shape ───

export interface CatalogMetadata {
  breadcrumb: string[];
  metadata: {
    inclusion?: "automatic" | "available" | "unsupported";
    selected?: boolean;
    "selected-by-default"?: boolean;
    "table-key-properties"?: string[];
    "valid-replication-keys"?: string[];
    "forced-replication-method"?: ReplicationMethod;
  };
}

export interface CatalogEntry {
  tap_stream_id: string;
  stream: string;
  schema: JsonSchema;
  key_properties: string[];
  replication_method: ReplicationMethod;
  replication_key?: string;
  metadata: CatalogMetadata[];
}

export interface Catalog {
  streams: CatalogEntry[];
}

export function buildCatalog(streams: readonly StreamDefinition[]): Catalog {
  return {
    streams: streams.map((stream) => {
      const automatic = new Set<string>(stream.keyProperties);
      if (stream.replicationKey !== null) automatic.add(stream.replicationKey);

      const streamMeta: CatalogMetadata["metadata"] = {
        inclusion: "available",
        selected: true,
        "selected-by-default": true,
        "table-key-properties": [...stream.keyProperties],
        "forced-replication-method": stream.replicationMethod,
      };
      if (stream.replicationKey !== null) {
        streamMeta["valid-replication-keys"] = [stream.replicationKey];
      }

      const metadata: CatalogMetadata[] = [{ breadcrumb: [], metadata: streamMeta }];
      for (const field of Object.keys(stream.schema)) {
        metadata.push({
          breadcrumb: ["properties", field],
          metadata: {
            inclusion: automatic.has(field) ? "automatic" : "available",
            "selected-by-default": true,
          },
        });
      }

      const entry: CatalogEntry = {
        tap_stream_id: stream.name,
        stream: stream.name,
        schema: toJsonSchema(stream.schema),
        key_properties: [...stream.keyProperties],
        replication_method: stream.replicationMethod,
        metadata,
      };
      if (stream.replicationKey !== null) {
        entry.replication_key = stream.replicationKey;
      }
      return entry;
    }),
  };
}

// ─── Selection ───

const MetadataSchema = z.object({
  breadcrumb: z.array(z.string()),
  metadata: z
    .object({
      inclusion: z.enum(["automatic", "available", "unsupported"]).optional(),
      selected: z.boolean().optional(),
      "selected-by-default": z.boolean().optional(),
    })
    .passthrough(),
});

const CatalogSelectionSchema = z.object({
  streams: z.array(
    z
      .object({
        tap_stream_id: z.string(),
        metadata: z.array(MetadataSchema).default([]),
      })
      .passthrough(),
  ),
});

type ParsedMetadata = z.infer<typeof MetadataSchema>["metadata"];

function isSelected(meta: ParsedMetadata | undefined, fallback: boolean): boolean {
  if (!meta) return fallback;
  if (meta.inclusion === "automatic") return true;
  if (meta.inclusion === "unsupported") return false;
  return meta.selected ?? meta["selected-by-default"] ?? fallback;
}

/**
 * Read stream and field selections. Only selected streams appear in the
 * returned map. A selected stream without field-level metadata selects
 * all of its fields.
 */
export function readSelections(raw: unknown): Map<string, StreamSelection> {
  const parsed = CatalogSelectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (i) => `catalog.${i.path.join(".")}: ${i.message}`,
      ),
    );
  }

  const selections = new Map<string, StreamSelection>();
  for (const entry of parsed.data.streams) {
    const streamMeta = entry.metadata.find((m) => m.breadcrumb.length === 0);
    if (!isSelected(streamMeta?.metadata, false)) continue;

    const fieldMeta = entry.metadata.filter(
      (m) => m.breadcrumb.length === 2 && m.breadcrumb[0] === "properties",
    );
    if (fieldMeta.length === 0) {
      selections.set(entry.tap_stream_id, { fields: null });
      continue;
    }
    const fields = new Set<string>();
    for (const m of fieldMeta) {
      if (isSelected(m.metadata, true)) fields.add(m.breadcrumb[1]);
    }
    selections.set(entry.tap_stream_id, { fields });
  }
  return selections;
}

export function loadCatalogSelections(filePath: string): Map<string, StreamSelection> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError([`cannot read catalog ${filePath}: ${errorMessage(err)}`]);
  }
  return readSelections(raw);
}
