// Sync job: fetch → normalize → merge-preserving upsert → janitor → notify, for one source kind

import { SyncCancelledError, errorMessage } from "../errors/index.js";
import type { EventBus } from "../events/index.js";
import type { FetchOutcome } from "../fetcher/types.js";
import { purgeStale, DEFAULT_RETENTION_MS } from "../janitor/index.js";
import { logger } from "../logger/index.js";
import { normalizeItems } from "../normalizer/index.js";
import type { NotificationDispatcher } from "../notify/index.js";
import type { ContentStore, MergeResult, StoreMap } from "../store/types.js";
import type { SourceKind } from "../types/contentRecord.js";

export { mergePreserving, announcementPolicy, blogPostPolicy } from "./merge.js";
export type { MergePlan, MergePolicy } from "./merge.js";


/** Anything that can download and parse a feed; FeedFetcher is the real one */
export interface FeedSource {
  fetch(url: string, opts?: { signal?: AbortSignal }): Promise<FetchOutcome>;
}


export interface SyncDeps {
  stores: StoreMap;
  fetcher: FeedSource;
  feedUrls: Record<SourceKind, string>;
  retentionMs?: number;
  summaryLength?: number;
  notifier?: NotificationDispatcher;
  /** Default true */
  notifyNewContent?: boolean;
  events?: EventBus;
}


export interface SyncOptions {
  signal?: AbortSignal;
  /** Sync time; fetchedAt of every written row */
  now?: Date;
}


export type SyncStage = "fetch" | "store" | "cancelled";


export interface SyncSuccess {
  status: "success";
  kind: SourceKind;
  /** Raw items returned by the fetcher */
  fetched: number;
  /** Items the normalizer dropped */
  skipped: number;
  inserted: number;
  updated: number;
  unchanged: number;
  /** Stale rows removed by the janitor afterwards */
  purged: number;
}


export interface SyncFailure {
  status: "failure";
  kind: SourceKind;
  stage: SyncStage;
  error: Error;
}


export type SyncOutcome = SyncSuccess | SyncFailure;


function failure(kind: SourceKind, stage: SyncStage, error: Error): SyncFailure {
  logger.warn("sync", "sync failed", { kind, stage, err: error.message });
  return { status: "failure", kind, stage, error };
}


/** Committed state never changes after cancellation is observed */
function cancelled(kind: SourceKind, signal?: AbortSignal): SyncFailure | null {
  if (!signal?.aborted) return null;
  return failure(kind, "cancelled", new SyncCancelledError());
}


/** Run one sync and broadcast sync:done; never throws, never retries */
export async function runSync<K extends SourceKind>(kind: K, deps: SyncDeps, opts: SyncOptions = {}): Promise<SyncOutcome> {
  const outcome = await syncOnce(kind, deps, opts);
  deps.events?.emit(
    "sync:done",
    outcome.status === "success"
      ? { kind, status: "success", inserted: outcome.inserted, updated: outcome.updated }
      : { kind, status: "failure", stage: outcome.stage, inserted: 0, updated: 0 },
  );
  return outcome;
}


async function syncOnce<K extends SourceKind>(kind: K, deps: SyncDeps, opts: SyncOptions): Promise<SyncOutcome> {
  const { signal } = opts;
  const now = opts.now ?? new Date();
  const store: ContentStore<K> = deps.stores[kind];
  const url = deps.feedUrls[kind];
  logger.info("sync", "sync started", { kind, feed_url: url });

  const early = cancelled(kind, signal);
  if (early) return early;

  const fetched = await deps.fetcher.fetch(url, { signal });
  const afterFetch = cancelled(kind, signal);
  if (afterFetch) return afterFetch;
  if (!fetched.ok) return failure(kind, "fetch", fetched.error);

  const batch = normalizeItems(kind, fetched.items, {
    fetchedAt: now,
    channelTitle: fetched.channelTitle,
    summaryLength: deps.summaryLength,
  });

  const beforeCommit = cancelled(kind, signal);
  if (beforeCommit) return beforeCommit;

  let merged: MergeResult;
  try {
    merged = store.mergeUpsert(batch.records, now);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return failure(kind, "store", error);
  }

  let purged = 0;
  try {
    purged = purgeStale(store, { retentionMs: deps.retentionMs ?? DEFAULT_RETENTION_MS, now });
  } catch (err) {
    logger.warn("janitor", "purge failed", { kind, err: errorMessage(err) });
  }

  if (merged.inserted > 0 && deps.notifier && deps.notifyNewContent !== false) {
    try {
      await deps.notifier.notifyNewContent(kind, merged.inserted);
    } catch (err) {
      logger.warn("notify", "notification failed", { kind, err: errorMessage(err) });
    }
  }

  const outcome: SyncSuccess = {
    status: "success",
    kind,
    fetched: fetched.items.length,
    skipped: batch.skipped.length,
    ...merged,
    purged,
  };
  logger.info("sync", "sync finished", { ...outcome, feed_url: url });
  return outcome;
}
