/**
 * Configuration loading: an optional JSON or YAML file, overlaid by
 * TIINGO_* environment variables, validated with zod.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { normalizeDate } from "../core/dates.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { TiingoConfig } from "./types.js";

export const TAP_NAME = "tap-tiingo";
export const TAP_VERSION = "0.1.0";
export const DEFAULT_API_URL = "https://api.tiingo.com";
export const DEFAULT_SYMBOLS: readonly string[] = ["AAPL", "GOOGL"];
/** What `"*"` expands to in a symbol list. */
export const WILDCARD_SYMBOLS: readonly string[] = ["AAPL", "GOOGL", "MSFT", "TSLA"];

/** Environment variable → config key. */
const ENV_KEYS: Record<string, string> = {
  TIINGO_API_KEY: "api_key",
  TIINGO_SYMBOLS: "symbols",
  TIINGO_START_DATE: "start_date",
  TIINGO_END_DATE: "end_date",
  TIINGO_API_URL: "api_url",
  TIINGO_USER_AGENT: "user_agent",
};

function parseSymbols(value: string | string[]): string[] {
  const list = Array.isArray(value) ? value : value.split(",");
  const seen = new Set<string>();
  for (const symbol of list) {
    const trimmed = symbol.trim();
    if (trimmed === "*") {
      for (const wildcard of WILDCARD_SYMBOLS) seen.add(wildcard);
    } else if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

const SymbolList = z
  .union([z.array(z.string()), z.string()])
  .transform((value, ctx) => {
    const symbols = parseSymbols(value);
    if (symbols.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must list at least one symbol",
      });
      return z.NEVER;
    }
    return symbols;
  });

const DateString = z.string().transform((value, ctx) => {
  const day = normalizeDate(value);
  if (day === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be an ISO-8601 date or timestamp, got "${value}"`,
    });
    return z.NEVER;
  }
  return day;
});

const RawConfigSchema = z
  .object({
    api_key: z.string({ required_error: "is required" }).min(1, "is required"),
    symbols: SymbolList.optional(),
    /** Older name for `symbols`. */
    tickers: SymbolList.optional(),
    start_date: DateString.optional(),
    end_date: DateString.optional(),
    api_url: z
      .string()
      .url()
      .default(DEFAULT_API_URL)
      .transform((url) => url.replace(/\/+$/, "")),
    user_agent: z.string().min(1).optional(),
    page_size: z.number().int().positive().optional(),
    strict_mode: z.boolean().default(false),
    max_retries: z.number().int().min(0).max(20).default(5),
    request_timeout_ms: z.number().int().positive().default(30_000),
    max_requests_per_hour: z.number().int().positive().optional(),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.start_date && cfg.end_date && cfg.start_date > cfg.end_date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end_date"],
        message: "must not be before start_date",
      });
    }
  });

/** Validate an already-parsed config object. */
export function parseConfig(raw: unknown): TiingoConfig {
  const result = RawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`),
    );
  }
  const cfg = result.data;
  return {
    apiKey: cfg.api_key,
    symbols: cfg.symbols ?? cfg.tickers ?? [...DEFAULT_SYMBOLS],
    startDate: cfg.start_date,
    endDate: cfg.end_date,
    apiUrl: cfg.api_url,
    userAgent: cfg.user_agent,
    pageSize: cfg.page_size,
    strictMode: cfg.strict_mode,
    maxRetries: cfg.max_retries,
    requestTimeoutMs: cfg.request_timeout_ms,
    maxRequestsPerHour: cfg.max_requests_per_hour,
  };
}

export function readConfigFile(filePath: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError([`cannot read config file ${filePath}: ${errorMessage(err)}`]);
  }

  const ext = path.extname(filePath).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? yamlParse(text) : JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`cannot parse config file ${filePath}: ${errorMessage(err)}`]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError([`config file ${filePath} must hold an object`]);
  }
  return { ...parsed };
}

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") values[configKey] = value;
  }
  return values;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/** File values first, environment variables on top. */
export function loadConfig(opts: LoadConfigOptions = {}): TiingoConfig {
  const fromFile = opts.configPath ? readConfigFile(opts.configPath) : {};
  const fromEnv = configFromEnv(opts.env ?? process.env);
  return parseConfig({ ...fromFile, ...fromEnv });
}

export function defaultUserAgent(): string {
  return `${TAP_NAME}/${TAP_VERSION}`;
}
