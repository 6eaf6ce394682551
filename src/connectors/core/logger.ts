import type { Logger } from "./types.js";

/**
 * Prefixed logger. Everything goes to stderr because stdout carries the
 * message stream.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(scope: string) {
    this.prefix = `[${scope}]`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ${msg}${extra}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ⚠ ${msg}${extra}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ✗ ${msg}${extra}`);
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stderr.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stderr.write("\n");
  }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
