/**
 * Raw Tiingo payloads → flat snake_case rows ready for schema mapping.
 */

import { SchemaViolationError } from "../core/errors.js";
import { isPlainObject } from "../core/schema.js";
import type { TiingoDailyPrice, TiingoTickerMetadata } from "./types.js";

export const TICKER_METADATA_FIELDS: Record<keyof TiingoTickerMetadata, string> = {
  ticker: "ticker",
  name: "name",
  description: "description",
  startDate: "start_date",
  endDate: "end_date",
  exchangeCode: "exchange_code",
};

export const DAILY_PRICE_FIELDS: Record<keyof TiingoDailyPrice, string> = {
  date: "date",
  open: "open",
  high: "high",
  low: "low",
  close: "close",
  volume: "volume",
  adjOpen: "adj_open",
  adjHigh: "adj_high",
  adjLow: "adj_low",
  adjClose: "adj_close",
  adjVolume: "adj_volume",
  divCash: "div_cash",
  splitFactor: "split_factor",
};

function renameFields(
  stream: string,
  raw: unknown,
  mapping: Record<string, string>,
): Record<string, unknown> {
  if (!isPlainObject(raw)) {
    throw new SchemaViolationError(stream, null, raw, "element is not an object");
  }
  const row: Record<string, unknown> = {};
  for (const [from, to] of Object.entries(mapping)) {
    if (from in raw) row[to] = raw[from];
  }
  return row;
}

/**
 * The requested symbol is the record's ticker, so the key always matches
 * the configured symbol whatever casing the API echoes back.
 */
export function tickerMetadataRow(raw: unknown, symbol: string): Record<string, unknown> {
  return { ...renameFields("ticker_metadata", raw, TICKER_METADATA_FIELDS), ticker: symbol };
}

/** Per-day payloads carry no symbol; it comes from the request. */
export function dailyPriceRow(raw: unknown, symbol: string): Record<string, unknown> {
  return { ticker: symbol, ...renameFields("daily_prices", raw, DAILY_PRICE_FIELDS) };
}
