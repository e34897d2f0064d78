// Structured logger for the dependency alert remediator.
// Supports log levels (debug, info, warn, error) and two line formats:
// human-readable text, or one JSON object per line for CI log ingestion.
// Limitations: No file-based logging or log rotation.

import type { LogFormat, LogLevel } from "./types.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let currentFormat: LogFormat = "text";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setLogFormat(format: LogFormat): void {
  currentFormat = format;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

export function formatLogLine(
  level: LogLevel,
  msg: string,
  ctx: Record<string, unknown> | undefined,
  format: LogFormat,
  now: Date = new Date()
): string {
  const ts = now.toISOString();
  if (format === "json") {
    return JSON.stringify({ ts, level, msg, ...(ctx ?? {}) });
  }
  const tag = level.toUpperCase().padEnd(5);
  let line = `[${ts}] ${tag} ${msg}`;
  if (ctx && Object.keys(ctx).length > 0) {
    line += ` ${JSON.stringify(ctx)}`;
  }
  return line;
}

function fmt(
  level: LogLevel,
  msg: string,
  ctx?: Record<string, unknown>
): string {
  return formatLogLine(level, msg, ctx, currentFormat);
}

export const logger = {
  debug(msg: string, ctx?: Record<string, unknown>): void {
    if (shouldLog("debug")) console.log(fmt("debug", msg, ctx));
  },
  info(msg: string, ctx?: Record<string, unknown>): void {
    if (shouldLog("info")) console.log(fmt("info", msg, ctx));
  },
  warn(msg: string, ctx?: Record<string, unknown>): void {
    if (shouldLog("warn")) console.warn(fmt("warn", msg, ctx));
  },
  error(msg: string, ctx?: Record<string, unknown>): void {
    if (shouldLog("error")) console.error(fmt("error", msg, ctx));
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
