/**
 * Pagination strategies. A paginator looks at the page that was just
 * processed and returns the next request for the same partition, or null
 * when the partition is exhausted.
 */

import { addDays, yesterday } from "./dates.js";
import type { Page, Paginator, RequestCursor } from "./types.js";

/** One request per partition. */
export class SinglePagePaginator implements Paginator {
  next(_cursor: RequestCursor, _page: Page): RequestCursor | null {
    return null;
  }
}

export interface DateRangePaginatorOptions {
  /** Record field holding the `YYYY-MM-DD` day. */
  dateField: string;
  /** Query parameter carrying the range's lower bound. */
  startParam?: string;
  /** Rows in a full page; unset when the API returns whole ranges. */
  pageSize?: number;
  /** Inclusive upper bound of the range. */
  endDate?: string;
  now?: () => Date;
}

/**
 * Walks a date range by moving the start bound one day past the last day
 * seen. Stops on an empty or short page, once the last complete day
 * (yesterday, UTC) or the end bound is reached, or when the server did not
 * move past the requested start.
 */
export class DateRangePaginator implements Paginator {
  private readonly dateField: string;
  private readonly startParam: string;
  private readonly pageSize: number | undefined;
  private readonly endDate: string | undefined;
  private readonly now: () => Date;

  constructor(opts: DateRangePaginatorOptions) {
    this.dateField = opts.dateField;
    this.startParam = opts.startParam ?? "startDate";
    this.pageSize = opts.pageSize;
    this.endDate = opts.endDate;
    this.now = opts.now ?? (() => new Date());
  }

  next(cursor: RequestCursor, page: Page): RequestCursor | null {
    if (page.rawCount === 0) return null;
    if (this.pageSize !== undefined && page.rawCount < this.pageSize) return null;

    const last = this.lastDay(page);
    if (last === null) return null;
    if (last >= yesterday(this.now())) return null;
    if (this.endDate !== undefined && last >= this.endDate) return null;

    const start = cursor.params[this.startParam];
    if (start !== undefined && last < start) return null;

    return {
      ...cursor,
      params: { ...cursor.params, [this.startParam]: addDays(last, 1) },
      page: cursor.page + 1,
    };
  }

  private lastDay(page: Page): string | null {
    let last: string | null = null;
    for (const record of page.records) {
      const day = record[this.dateField];
      if (typeof day === "string" && (last === null || day > last)) {
        last = day;
      }
    }
    return last;
  }
}
