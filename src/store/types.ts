// ContentStore contract: persisted, queryable, change-observable record set for one source kind

import type { RecordByKind, SourceKind } from "../types/contentRecord.js";


export type Unsubscribe = () => void;


/** Counts reported by a merge-preserving upsert */
export interface MergeResult {
  inserted: number;
  updated: number;
  unchanged: number;
}


export interface ContentStore<K extends SourceKind = SourceKind> {
  readonly kind: K;

  /** Newest first */
  all(): RecordByKind[K][];
  latest(limit: number): RecordByKind[K][];
  unread(): RecordByKind[K][];
  read(): RecordByKind[K][];
  byId(id: string): RecordByKind[K] | undefined;
  countUnread(): number;
  /** Case-insensitive substring match on title or summary, newest first */
  search(query: string): RecordByKind[K][];

  /** Called after every committed mutation that changed at least one row */
  onChange(listener: () => void): Unsubscribe;
  /** Run `query` now and again after every change */
  watch<T>(query: (store: this) => T, listener: (value: T) => void): Unsubscribe;

  /** Snapshot + merge + write in one transaction; absent ids are left alone */
  mergeUpsert(fresh: readonly RecordByKind[K][], now: Date): MergeResult;
  /** false when the id does not exist */
  markRead(id: string): boolean;
  markUnread(id: string): boolean;
  /** Number of rows that changed */
  markAllRead(): number;
  /** Delete rows with fetchedAt strictly before `threshold`; returns the count */
  deleteOlderThan(threshold: Date): number;
  deleteAll(): number;
}


/** One store per kind, typed so `stores[kind]` keeps the kind */
export type StoreMap = { [K in SourceKind]: ContentStore<K> };
