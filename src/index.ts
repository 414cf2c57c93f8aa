// Library entry: everything needed to embed the sync pipeline without the HTTP server

export * from "./types/contentRecord.js";
export * from "./errors/index.js";
export { configSchema, parseConfig, loadConfig, ConfigError } from "./config/index.js";
export type { AppConfig } from "./config/index.js";
export { openDatabase, attachLogTable, queryLogs } from "./db/index.js";
export type { Db, DbLog } from "./db/index.js";
export { logger, setLogDbWriter } from "./logger/index.js";
export { EventBus } from "./events/index.js";
export type { NewContentEvent, SyncDoneEvent } from "./events/index.js";
export { FeedFetcher, createFeedParser, fetchText } from "./fetcher/index.js";
export type { FeedParser, FetchOutcome, FetchText, RawFeedItem } from "./fetcher/index.js";
export { normalizeItem, normalizeItems, normalizeAnnouncement, normalizeBlogPost } from "./normalizer/index.js";
export type { NormalizeResult, NormalizedBatch, SkipReason } from "./normalizer/index.js";
export { AnnouncementStore, BlogPostStore, createStores } from "./store/index.js";
export type { ContentStore, ContentStores, MergeResult, StoreMap, Unsubscribe } from "./store/index.js";
export { runSync, mergePreserving, announcementPolicy, blogPostPolicy } from "./sync/index.js";
export type { FeedSource, SyncDeps, SyncOutcome, SyncSuccess, SyncFailure, MergePolicy, MergePlan } from "./sync/index.js";
export { combineRecords, compareNewestFirst, UnifiedFeedCombiner, DEFAULT_PREVIEW_LIMIT } from "./combiner/index.js";
export type { CombineOptions, UnreadCounts } from "./combiner/index.js";
export { runJanitor, purgeStale, DEFAULT_RETENTION_MS } from "./janitor/index.js";
export { EventBusNotifier, newContentMessage } from "./notify/index.js";
export type { NotificationDispatcher } from "./notify/index.js";
export { createScheduler, backoffDelay, DEFAULT_RETRY } from "./scheduler/index.js";
export type { Scheduler, SchedulerOptions, RetryPolicy } from "./scheduler/index.js";
export { createApp } from "./app/router.js";
export type { AppServices } from "./app/router.js";
