// Logger: leveled console output per category; warn/error go to the logs table once a database is attached

import {
  getConsoleLevel,
  getLogToDb,
  getDbLevel,
  shouldLogToConsole,
  shouldLogToDb,
} from "./config.js";
import type { LogCategory, LogDbWriter, LogEntry, LogLevel, LogPayloadConvention } from "./types.js";

export type { LogCategory, LogEntry, LogLevel } from "./types.js";

type LogMeta = LogPayloadConvention & { feed_url?: string };

let dbWriter: LogDbWriter | null = null;

/** Attach (or detach with null) the logs-table writer */
export function setLogDbWriter(writer: LogDbWriter | null): void {
  dbWriter = writer;
}

function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function writeDb(writer: LogDbWriter, entry: LogEntry): void {
  try {
    writer(entry);
  } catch (err) {
    // one line on stderr, never through the logger itself
    process.stderr.write(`[logger] failed to write logs table: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  const { feed_url, ...rest } = meta ?? {};
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: Object.keys(rest).length > 0 ? rest : undefined,
    feed_url,
    created_at: new Date().toISOString(),
  };
  if (shouldLogToConsole(getConsoleLevel(), level)) {
    writeConsole(entry);
  }
  if (dbWriter && shouldLogToDb(getLogToDb(), getDbLevel(), level)) {
    writeDb(dbWriter, entry);
  }
}

/** Shared logger: console filtered by LOG_LEVEL, warn/error persisted when a database is attached */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};
