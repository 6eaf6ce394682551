/** Tiingo connector type definitions. */

// ─── Configuration ───

export interface TiingoConfig {
  apiKey: string;
  symbols: string[];
  /** Lower bound for daily prices, `YYYY-MM-DD`. */
  startDate?: string;
  /** Inclusive upper bound for daily prices, `YYYY-MM-DD`. */
  endDate?: string;
  apiUrl: string;
  userAgent?: string;
  /** Rows per full prices page, when the API paginates. */
  pageSize?: number;
  strictMode: boolean;
  maxRetries: number;
  requestTimeoutMs: number;
  maxRequestsPerHour?: number;
}

// ─── Raw API payloads ───

/** `GET /tiingo/daily/{symbol}` */
export interface TiingoTickerMetadata {
  ticker: string;
  name: string;
  description: string;
  startDate: string;
  endDate: string;
  exchangeCode: string;
}

/** One element of `GET /tiingo/daily/{symbol}/prices` */
export interface TiingoDailyPrice {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  adjOpen: number;
  adjHigh: number;
  adjLow: number;
  adjClose: number;
  adjVolume: number;
  divCash: number;
  splitFactor: number;
}

/** Error body returned with 4xx responses. */
export interface TiingoErrorBody {
  detail?: string;
}
