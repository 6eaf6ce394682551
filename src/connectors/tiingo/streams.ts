/**
 * Tiingo stream definitions. Both streams are partitioned by ticker symbol,
 * processed in configured order.
 */

import { maxDate } from "../core/dates.js";
import { FatalFetchError } from "../core/errors.js";
import { DateRangePaginator, SinglePagePaginator } from "../core/pagination.js";
import { assertStreamShape, isPlainObject, mapRecord } from "../core/schema.js";
import type {
  CursorValue,
  Page,
  Paginator,
  ReplicationMethod,
  RequestCursor,
  StreamDefinition,
  StreamRecord,
  StreamSchema,
} from "../core/types.js";
import { dailyPriceRow, tickerMetadataRow } from "./transform.js";

/** Lower bound for daily prices when neither config nor state gives one. */
export const DEFAULT_PRICES_START_DATE = "2000-01-01";

export interface TiingoStreamOptions {
  symbols: readonly string[];
  startDate?: string;
  endDate?: string;
  pageSize?: number;
  now?: () => Date;
}

// ─── Schemas ───

export const TICKER_METADATA_SCHEMA: StreamSchema = {
  ticker: { type: "string", nullable: false, description: "Stock ticker symbol" },
  name: { type: "string", nullable: true, description: "Company name" },
  description: { type: "string", nullable: true, description: "Company description" },
  start_date: { type: "date", nullable: true, description: "Start date of data availability" },
  end_date: { type: "date", nullable: true, description: "End date of data availability" },
  exchange_code: { type: "string", nullable: true, description: "Exchange code" },
};

export const DAILY_PRICES_SCHEMA: StreamSchema = {
  ticker: { type: "string", nullable: false, description: "Stock ticker symbol" },
  date: { type: "date", nullable: false, description: "Trading day" },
  open: { type: "number", nullable: true, description: "Opening price" },
  high: { type: "number", nullable: true, description: "High price" },
  low: { type: "number", nullable: true, description: "Low price" },
  close: { type: "number", nullable: true, description: "Closing price" },
  volume: { type: "integer", nullable: true, description: "Trading volume" },
  adj_open: { type: "number", nullable: true, description: "Adjusted opening price" },
  adj_high: { type: "number", nullable: true, description: "Adjusted high price" },
  adj_low: { type: "number", nullable: true, description: "Adjusted low price" },
  adj_close: { type: "number", nullable: true, description: "Adjusted closing price" },
  adj_volume: { type: "integer", nullable: true, description: "Adjusted trading volume" },
  div_cash: { type: "number", nullable: true, description: "Dividend cash amount" },
  split_factor: { type: "number", nullable: true, description: "Stock split factor" },
};

// ─── Base ───

abstract class TickerPartitionedStream implements StreamDefinition {
  abstract readonly kind: "ticker_metadata" | "daily_prices";
  abstract readonly name: string;
  abstract readonly keyProperties: readonly string[];
  abstract readonly replicationMethod: ReplicationMethod;
  abstract readonly replicationKey: string | null;
  abstract readonly schema: StreamSchema;
  readonly partitionKey = "ticker";

  protected readonly options: TiingoStreamOptions;
  protected abstract readonly paginator: Paginator;

  constructor(options: TiingoStreamOptions) {
    this.options = options;
  }

  partitions(): string[] {
    return [...this.options.symbols];
  }

  nextRequest(cursor: RequestCursor, page: Page): RequestCursor | null {
    return this.paginator.next(cursor, page);
  }

  abstract requestInitial(partition: string, bookmark: CursorValue | null): RequestCursor | null;
  abstract extractElements(body: unknown): unknown[];
  abstract mapRecord(raw: unknown, cursor: RequestCursor): StreamRecord;
}

// ─── ticker_metadata ───

export class TickerMetadataStream extends TickerPartitionedStream {
  readonly kind = "ticker_metadata";
  readonly name = "ticker_metadata";
  readonly keyProperties = ["ticker"];
  readonly replicationMethod = "FULL_TABLE";
  readonly replicationKey = null;
  readonly schema = TICKER_METADATA_SCHEMA;
  protected readonly paginator = new SinglePagePaginator();

  constructor(options: TiingoStreamOptions) {
    super(options);
    assertStreamShape(this.name, this.schema, this.keyProperties, this.replicationKey);
  }

  requestInitial(partition: string): RequestCursor {
    return {
      partition,
      path: `/tiingo/daily/${encodeURIComponent(partition)}`,
      params: {},
      page: 0,
    };
  }

  /** The endpoint answers with a single object. */
  extractElements(body: unknown): unknown[] {
    if (!isPlainObject(body)) {
      throw new FatalFetchError({
        message: "ticker metadata response is not an object",
        status: null,
      });
    }
    return [body];
  }

  mapRecord(raw: unknown, cursor: RequestCursor): StreamRecord {
    return mapRecord(this.name, this.schema, tickerMetadataRow(raw, cursor.partition));
  }
}

// ─── daily_prices ───

export class DailyPricesStream extends TickerPartitionedStream {
  readonly kind = "daily_prices";
  readonly name = "daily_prices";
  readonly keyProperties = ["ticker", "date"];
  readonly replicationMethod = "INCREMENTAL";
  readonly replicationKey = "date";
  readonly schema = DAILY_PRICES_SCHEMA;
  protected readonly paginator: DateRangePaginator;

  constructor(options: TiingoStreamOptions) {
    super(options);
    assertStreamShape(this.name, this.schema, this.keyProperties, this.replicationKey);
    this.paginator = new DateRangePaginator({
      dateField: "date",
      startParam: "startDate",
      pageSize: options.pageSize,
      endDate: options.endDate,
      now: options.now,
    });
  }

  /**
   * Start from the later of the configured start date and the symbol's
   * bookmark. The bookmarked day itself is fetched again.
   */
  startDateFor(bookmark: CursorValue | null): string {
    const configured = this.options.startDate;
    if (typeof bookmark === "string") {
      return configured === undefined ? bookmark : maxDate(configured, bookmark);
    }
    return configured ?? DEFAULT_PRICES_START_DATE;
  }

  /** Null once the bookmark has already passed the configured end date. */
  requestInitial(partition: string, bookmark: CursorValue | null): RequestCursor | null {
    const startDate = this.startDateFor(bookmark);
    const { endDate } = this.options;
    if (endDate !== undefined && startDate > endDate) return null;
    return {
      partition,
      path: `/tiingo/daily/${encodeURIComponent(partition)}/prices`,
      params: { startDate, endDate },
      page: 0,
    };
  }

  extractElements(body: unknown): unknown[] {
    if (!Array.isArray(body)) {
      throw new FatalFetchError({
        message: "daily prices response is not an array",
        status: null,
      });
    }
    return body;
  }

  mapRecord(raw: unknown, cursor: RequestCursor): StreamRecord {
    return mapRecord(this.name, this.schema, dailyPriceRow(raw, cursor.partition));
  }
}

/** Closed set of streams this connector offers. */
export type TiingoStream = TickerMetadataStream | DailyPricesStream;

/** Streams in declared order. */
export function createStreams(options: TiingoStreamOptions): TiingoStream[] {
  return [new TickerMetadataStream(options), new DailyPricesStream(options)];
}
