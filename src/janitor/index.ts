// StalenessJanitor: delete rows whose fetchedAt fell out of the retention window

import type { SourceKind } from "../types/contentRecord.js";
import type { ContentStore, StoreMap } from "../store/types.js";
import { logger } from "../logger/index.js";
import { DAY_MS } from "../utils/refreshInterval.js";


export const DEFAULT_RETENTION_MS = 30 * DAY_MS;


export interface JanitorOptions {
  retentionMs?: number;
  now?: Date;
}


/** Rows with fetchedAt strictly before this are stale */
export function retentionThreshold(now: Date, retentionMs: number): Date {
  return new Date(now.getTime() - retentionMs);
}


/** Purge one store; returns the number of deleted rows */
export function purgeStale(store: ContentStore, opts: JanitorOptions = {}): number {
  const { retentionMs = DEFAULT_RETENTION_MS, now = new Date() } = opts;
  const threshold = retentionThreshold(now, retentionMs);
  const deleted = store.deleteOlderThan(threshold);
  if (deleted > 0) {
    logger.info("janitor", "purged stale records", { kind: store.kind, deleted, threshold: threshold.toISOString() });
  }
  return deleted;
}


/** Purge every store */
export function runJanitor(stores: StoreMap, opts: JanitorOptions = {}): Record<SourceKind, number> {
  return {
    announcement: purgeStale(stores.announcement, opts),
    blog_post: purgeStale(stores.blog_post, opts),
  };
}
