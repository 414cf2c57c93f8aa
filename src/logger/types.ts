// Log types and structured entries
// Console output is filtered by LOG_LEVEL; warn/error can also be persisted to the logs table for per-feed troubleshooting.

/** Log level: debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** Log category: one per module, used to filter console and the logs table */
export type LogCategory =
  | "fetcher"   // feed download and parse
  | "normalize" // raw item → record
  | "sync"      // fetch → merge → janitor work unit
  | "janitor"   // stale row reclamation
  | "combiner"  // unified feed recomputation
  | "scheduler" // timers, retries
  | "notify"    // new content dispatch
  | "db"        // SQLite
  | "app"       // HTTP server, startup
  | "config";   // config loading

/** Conventional payload fields (not enforced) */
export interface LogPayloadConvention {
  /** Error message, never the whole Error */
  err?: string;
  /** Source kind the entry concerns */
  kind?: string;
  /** Item id (link or guid) */
  item_id?: string;
  /** Retry attempt */
  attempt?: number;
  [k: string]: unknown;
}

/** One structured log entry */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** Optional context, stored as JSON when persisted */
  payload?: Record<string, unknown>;
  /** Feed URL the entry concerns, kept in its own column */
  feed_url?: string;
  created_at: string;
}

/** Persistence target for entries that pass the DB level */
export type LogDbWriter = (entry: LogEntry) => void;
