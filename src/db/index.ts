// Database: SQLite connection, schema, and the logs table

import Database from "better-sqlite3";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { DB_PATH } from "../config/paths.js";
import type { LogEntry, LogLevel } from "../logger/index.js";
import { setLogDbWriter } from "../logger/index.js";


export type Db = Database.Database;


let _db: Db | null = null;


/** Open a database and create the schema; pass ":memory:" for an in-process store */
export function openDatabase(file: string = ":memory:"): Db {
  const db = new Database(file);
  if (file !== ":memory:") {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  initSchema(db);
  return db;
}


/** Get (or open) the process database at .paperfeed/data/paperfeed.db */
export async function getDb(): Promise<Db> {
  if (_db) return _db;
  await mkdir(dirname(DB_PATH), { recursive: true });
  _db = openDatabase(DB_PATH);
  return _db;
}


/** Close the process database if open */
export function closeDb(): void {
  if (!_db) return;
  setLogDbWriter(null);
  _db.close();
  _db = null;
}


/** One table per source kind, plus logs */
function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS announcements (
      id            TEXT PRIMARY KEY,
      title         TEXT NOT NULL,
      summary       TEXT NOT NULL,
      link          TEXT NOT NULL,
      published_at  TEXT NOT NULL,
      fetched_at    TEXT NOT NULL,
      is_read       INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_announcements_published ON announcements(published_at);
    CREATE INDEX IF NOT EXISTS idx_announcements_fetched   ON announcements(fetched_at);

    CREATE TABLE IF NOT EXISTS blog_posts (
      id                        TEXT PRIMARY KEY,
      title                     TEXT NOT NULL,
      summary                   TEXT NOT NULL,
      link                      TEXT NOT NULL,
      author_name               TEXT NOT NULL,
      category                  TEXT,
      featured_image_url        TEXT,
      published_at              TEXT NOT NULL,
      fetched_at                TEXT NOT NULL,
      is_read                   INTEGER NOT NULL DEFAULT 0,
      is_favorite               INTEGER NOT NULL DEFAULT 0,
      reading_progress_percent  REAL NOT NULL DEFAULT 0,
      last_read_at              TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_blog_posts_published ON blog_posts(published_at);
    CREATE INDEX IF NOT EXISTS idx_blog_posts_fetched   ON blog_posts(fetched_at);
    CREATE INDEX IF NOT EXISTS idx_blog_posts_last_read ON blog_posts(last_read_at);

    CREATE TABLE IF NOT EXISTS logs (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      level       TEXT NOT NULL,
      category    TEXT NOT NULL,
      message     TEXT NOT NULL,
      payload     TEXT,
      feed_url    TEXT,
      created_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_logs_created ON logs(created_at);
  `);
}


/** Insert one log entry */
export function insertLog(db: Db, entry: LogEntry): void {
  db.prepare(`
    INSERT INTO logs (level, category, message, payload, feed_url, created_at)
    VALUES (@level, @category, @message, @payload, @feedUrl, @createdAt)
  `).run({
    level: entry.level,
    category: entry.category,
    message: entry.message,
    payload: entry.payload ? JSON.stringify(entry.payload) : null,
    feedUrl: entry.feed_url ?? null,
    createdAt: entry.created_at,
  });
}


/** Route logger persistence into this database */
export function attachLogTable(db: Db): void {
  setLogDbWriter((entry) => insertLog(db, entry));
}


/** Log row as stored (snake_case) */
export interface DbLog {
  id: number;
  level: LogLevel;
  category: string;
  message: string;
  payload: string | null;
  feed_url: string | null;
  created_at: string;
}


/** Newest log rows first, optionally by level */
export function queryLogs(db: Db, opts: { level?: LogLevel; limit?: number } = {}): DbLog[] {
  const { level, limit = 100 } = opts;
  const where = level ? "WHERE level = @level" : "";
  return db.prepare<{ level: string | null; limit: number }, DbLog>(`
    SELECT * FROM logs ${where}
    ORDER BY id DESC
    LIMIT @limit
  `).all({ level: level ?? null, limit });
}
