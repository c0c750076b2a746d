import type { LogLevel } from "@core-types";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

const envLevel = process.env.TABFIT_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

const WARNED_TAGS = new Set<string>();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export function logDebug(tag: string, msg: string): void {
  if (enabled('debug')) console.debug(`[${tag}] ${msg}`);
}

/**
 * Warn at most once per tag until resetWarnings().
 */
export function warnOnce(tag: string, msg: string): void {
  if (!enabled('warn') || WARNED_TAGS.has(tag)) return;
  console.warn(`[${tag}] ${msg}`);
  WARNED_TAGS.add(tag);
}

export function resetWarnings(): void {
  WARNED_TAGS.clear();
}
