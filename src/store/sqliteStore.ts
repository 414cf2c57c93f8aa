// SqliteContentStore: shared better-sqlite3 implementation; subclasses supply table, columns and row mapping

import { EventEmitter } from "node:events";
import type { Db } from "../db/index.js";
import { logger } from "../logger/index.js";
import type { RecordByKind, SourceKind } from "../types/contentRecord.js";
import { mergePreserving } from "../sync/merge.js";
import type { MergePolicy } from "../sync/merge.js";
import type { ContentStore, MergeResult, Unsubscribe } from "./types.js";


/** Newest first; id breaks ties so repeated reads return the same order */
export const NEWEST_FIRST = "ORDER BY published_at DESC, id ASC";


type Params = Record<string, unknown>;


export abstract class SqliteContentStore<K extends SourceKind, Row extends { id: string }> implements ContentStore<K> {
  abstract readonly kind: K;
  protected abstract readonly table: string;
  protected abstract readonly columns: readonly (keyof Row & string)[];
  protected abstract readonly policy: MergePolicy<RecordByKind[K]>;
  protected abstract toRecord(row: Row): RecordByKind[K];
  protected abstract toRow(record: RecordByKind[K]): Row;

  private readonly emitter = new EventEmitter();

  constructor(protected readonly db: Db) {
    this.emitter.setMaxListeners(100);
  }


  /** Run a SELECT and map rows to records */
  protected rows(sql: string, params: Params = {}): RecordByKind[K][] {
    return this.db.prepare<Params, Row>(sql).all(params).map((row) => this.toRecord(row));
  }


  /** Run a write statement; notify listeners when a row changed */
  protected write(sql: string, params: Params = {}): number {
    const { changes } = this.db.prepare<Params>(sql).run(params);
    if (changes > 0) this.notify();
    return changes;
  }


  protected notify(): void {
    this.emitter.emit("change");
  }


  all(): RecordByKind[K][] {
    return this.rows(`SELECT * FROM ${this.table} ${NEWEST_FIRST}`);
  }


  latest(limit: number): RecordByKind[K][] {
    return this.rows(`SELECT * FROM ${this.table} ${NEWEST_FIRST} LIMIT @limit`, { limit });
  }


  unread(): RecordByKind[K][] {
    return this.rows(`SELECT * FROM ${this.table} WHERE is_read = 0 ${NEWEST_FIRST}`);
  }


  read(): RecordByKind[K][] {
    return this.rows(`SELECT * FROM ${this.table} WHERE is_read = 1 ${NEWEST_FIRST}`);
  }


  byId(id: string): RecordByKind[K] | undefined {
    return this.rows(`SELECT * FROM ${this.table} WHERE id = @id`, { id })[0];
  }


  countUnread(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${this.table} WHERE is_read = 0`).get();
    return row?.count ?? 0;
  }


  search(query: string): RecordByKind[K][] {
    const q = query.trim();
    if (!q) return [];
    // LIKE wildcards in user input are literal
    const pattern = `%${q.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
    return this.rows(
      `SELECT * FROM ${this.table}
       WHERE title LIKE @pattern ESCAPE '\\' OR summary LIKE @pattern ESCAPE '\\'
       ${NEWEST_FIRST}`,
      { pattern },
    );
  }


  onChange(listener: () => void): Unsubscribe {
    const safe = () => {
      try {
        listener();
      } catch (err) {
        logger.error("db", "change listener threw", { kind: this.kind, err: err instanceof Error ? err.message : String(err) });
      }
    };
    this.emitter.on("change", safe);
    return () => {
      this.emitter.off("change", safe);
    };
  }


  watch<T>(query: (store: this) => T, listener: (value: T) => void): Unsubscribe {
    const run = () => listener(query(this));
    run();
    return this.onChange(run);
  }


  /** Stored rows for the given ids, read inside the caller's transaction */
  private snapshot(ids: string[]): Map<string, RecordByKind[K]> {
    const rows = this.rows(
      `SELECT * FROM ${this.table} WHERE id IN (SELECT value FROM json_each(@ids))`,
      { ids: JSON.stringify(ids) },
    );
    return new Map(rows.map((r) => [r.id, r]));
  }


  private sameRow(a: RecordByKind[K], b: RecordByKind[K]): boolean {
    return JSON.stringify(this.toRow(a)) === JSON.stringify(this.toRow(b));
  }


  mergeUpsert(fresh: readonly RecordByKind[K][], now: Date): MergeResult {
    const cols = this.columns;
    const upsert = this.db.prepare<Row>(`
      INSERT OR REPLACE INTO ${this.table} (${cols.join(", ")})
      VALUES (${cols.map((c) => `@${c}`).join(", ")})
    `);
    const run = this.db.transaction((records: readonly RecordByKind[K][]) => {
      const stored = this.snapshot(records.map((r) => r.id));
      const plan = mergePreserving(records, stored, now, this.policy, (a, b) => this.sameRow(a, b));
      for (const record of plan.writes) upsert.run(this.toRow(record));
      return plan;
    });
    const plan = run(fresh);
    if (plan.writes.length > 0) this.notify();
    return { inserted: plan.inserted, updated: plan.updated, unchanged: plan.unchanged };
  }


  markRead(id: string): boolean {
    return this.write(`UPDATE ${this.table} SET is_read = 1 WHERE id = @id`, { id }) > 0;
  }


  markUnread(id: string): boolean {
    return this.write(`UPDATE ${this.table} SET is_read = 0 WHERE id = @id`, { id }) > 0;
  }


  markAllRead(): number {
    return this.write(`UPDATE ${this.table} SET is_read = 1 WHERE is_read = 0`);
  }


  deleteOlderThan(threshold: Date): number {
    return this.write(`DELETE FROM ${this.table} WHERE fetched_at < @threshold`, { threshold: threshold.toISOString() });
  }


  deleteAll(): number {
    return this.write(`DELETE FROM ${this.table}`);
  }
}
