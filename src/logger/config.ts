// Logging config: read from env only, before config.json loads

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** Minimum console level (default info) */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

/** Whether entries are persisted to the logs table (default true) */
export function getLogToDb(): boolean {
  const v = process.env.LOG_TO_DB;
  return !(v === "0" || v === "false");
}

/** Minimum persisted level (default warn) */
export function getDbLevel(): LogLevel {
  return parseLevel(process.env.LOG_DB_LEVEL, "warn");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}

export function shouldLogToDb(logToDb: boolean, dbLevel: LogLevel, entryLevel: LogLevel): boolean {
  return logToDb && levelOrder(entryLevel) >= levelOrder(dbLevel);
}
