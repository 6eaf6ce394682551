import type { Logger, Message, MessageWriter, StreamRecord } from "../../../src/connectors/core/types.js";
import type { FetchFn } from "../../../src/connectors/tiingo/api.js";
import type { TiingoDailyPrice, TiingoTickerMetadata } from "../../../src/connectors/tiingo/types.js";

export const API_URL = "https://api.tiingo.test";

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  progress: () => {},
};

export function makeMetadata(ticker: string, overrides: Partial<TiingoTickerMetadata> = {}): TiingoTickerMetadata {
  return {
    ticker,
    name: `${ticker} Inc`,
    description: "Makes things",
    startDate: "1980-12-12",
    endDate: "2023-06-14",
    exchangeCode: "NASDAQ",
    ...overrides,
  };
}

/** One price row for `day`, with close derived from the day of month. */
export function makePrice(day: string, overrides: Partial<TiingoDailyPrice> = {}): TiingoDailyPrice {
  const close = 100 + Number(day.slice(8, 10));
  return {
    date: `${day}T00:00:00.000Z`,
    open: close - 1,
    high: close + 2,
    low: close - 2,
    close,
    volume: 1_000_000,
    adjOpen: close - 1,
    adjHigh: close + 2,
    adjLow: close - 2,
    adjClose: close,
    adjVolume: 1_000_000,
    divCash: 0,
    splitFactor: 1,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export interface FetchCall {
  url: URL;
  headers: Headers;
}

export interface FakeTiingo {
  fetchFn: FetchFn;
  calls: FetchCall[];
}

/**
 * In-process stand-in for the Tiingo daily endpoints. Prices are filtered by
 * the startDate and endDate query parameters. `override` may answer a call
 * first, e.g. with an error status.
 */
export function fakeTiingo(opts: {
  metadata?: Record<string, unknown>;
  prices?: Record<string, unknown[]>;
  override?: (url: URL, callIndex: number) => Response | undefined;
}): FakeTiingo {
  const calls: FetchCall[] = [];

  const fetchFn: FetchFn = async (url, init) => {
    const parsed = new URL(url);
    calls.push({ url: parsed, headers: new Headers(init.headers) });

    const overridden = opts.override?.(parsed, calls.length - 1);
    if (overridden) return overridden;

    const match = /^\/tiingo\/daily\/([^/]+)(\/prices)?$/.exec(parsed.pathname);
    if (!match) return jsonResponse({ detail: "Not found." }, 404);
    const symbol = decodeURIComponent(match[1]);

    if (!match[2]) {
      const meta = opts.metadata?.[symbol] ?? makeMetadata(symbol);
      return jsonResponse(meta);
    }

    const start = parsed.searchParams.get("startDate") ?? "";
    const end = parsed.searchParams.get("endDate") ?? "9999-12-31";
    const rows = (opts.prices?.[symbol] ?? []).filter((row) => {
      const day = dayOf(row);
      return day === null || (day >= start && day <= end);
    });
    return jsonResponse(rows);
  };

  return { fetchFn, calls };
}

function dayOf(row: unknown): string | null {
  if (typeof row !== "object" || row === null || !("date" in row)) return null;
  return typeof row.date === "string" ? row.date.slice(0, 10) : null;
}

export class CollectingWriter implements MessageWriter {
  readonly messages: Message[] = [];

  write(message: Message): void {
    this.messages.push(message);
  }

  records(stream: string): StreamRecord[] {
    return this.messages.flatMap((m) => (m.type === "RECORD" && m.stream === stream ? [m.record] : []));
  }
}
