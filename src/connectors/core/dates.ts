const DAY_MS = 86_400_000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse an ISO-8601 date or timestamp. Date-only strings are read as UTC
 * midnight. Returns null for anything unparseable.
 */
export function parseInstant(value: string): Date | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const ms = Date.parse(DATE_ONLY.test(trimmed) ? `${trimmed}T00:00:00Z` : trimmed);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** UTC calendar day of an instant, as `YYYY-MM-DD`. */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Normalize a date or timestamp string to its UTC day, or null. */
export function normalizeDate(value: string): string | null {
  const instant = parseInstant(value);
  return instant ? toDateString(instant) : null;
}

export function addDays(day: string, days: number): string {
  const instant = parseInstant(day);
  if (!instant) {
    throw new RangeError(`Invalid date: ${day}`);
  }
  return toDateString(new Date(instant.getTime() + days * DAY_MS));
}

/** The last complete UTC trading day relative to `now`. */
export function yesterday(now: Date): string {
  return toDateString(new Date(now.getTime() - DAY_MS));
}

/** Later of two `YYYY-MM-DD` days. */
export function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}
