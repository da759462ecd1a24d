/**
 * Leveled logger.
 *
 * Everything is written to stderr so that stdout stays free for command
 * output (e.g. `scrape --no-save` piping JSON). Lines look like:
 *
 *   2026-01-01T12:00:00.000Z INFO  [scraper] Scraped page {"url":"https://example.com"}
 */

import type { LogLevel } from "../config/types.js";

export type { LogLevel } from "../config/types.js";

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** A logger with the same threshold, tagged with a nested scope */
  child(scope: string): Logger;
}

function formatLine(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): string {
  const parts = [new Date().toISOString(), level.toUpperCase().padEnd(5)];
  if (scope) parts.push(`[${scope}]`);
  parts.push(message);
  if (meta && Object.keys(meta).length > 0) {
    parts.push(JSON.stringify(meta));
  }
  return parts.join(" ");
}

/**
 * Create a logger that drops messages below `level`.
 * Errors are always emitted regardless of the threshold.
 */
export function createLogger(level: LogLevel = "info", scope?: string): Logger {
  const threshold = levelWeights[level];
  const emit = (lvl: LogLevel, message: string, meta?: LogMeta) => {
    if (lvl !== "error" && levelWeights[lvl] < threshold) return;
    console.error(formatLine(lvl, scope, message, meta));
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (childScope) =>
      createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

/** A logger that discards everything; the default for library callers */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
