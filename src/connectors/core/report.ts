import type { SyncResult } from "./types.js";

/** Human-readable run summary, one line per entry. */
export function formatSummary(result: SyncResult): string[] {
  const lines = ["═══ Sync Summary ═══"];
  for (const r of result.streams) {
    const mark = r.status === "COMPLETED" ? "✓" : r.status === "FAILED" ? "✗" : "⚠";
    lines.push(
      `${mark} ${r.stream} [${r.status}]: ${r.recordsEmitted} emitted, ${r.recordsSkipped} skipped`,
    );
    for (const err of r.errors.slice(0, 5)) {
      const at = err.partition === null ? "" : ` (${err.partition}, last cursor ${err.lastCursor ?? "none"})`;
      lines.push(`  ✗ ${err.error}${at}`);
    }
    if (r.errors.length > 5) {
      lines.push(`  ... and ${r.errors.length - 5} more errors`);
    }
  }
  lines.push(
    `${result.recordsEmitted} records in ${(result.durationMs / 1000).toFixed(1)}s${result.cancelled ? " (cancelled)" : ""}`,
  );
  return lines;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export function exitCodeFor(result: SyncResult): number {
  if (result.streams.some((r) => r.status === "FAILED")) return EXIT_FAILURE;
  if (result.cancelled) return EXIT_CANCELLED;
  return EXIT_OK;
}
