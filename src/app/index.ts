// App entry: load config, open the database, start the scheduler, serve the HTTP API

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./router.js";
import { UnifiedFeedCombiner } from "../combiner/index.js";
import { loadConfig } from "../config/index.js";
import type { AppConfig } from "../config/index.js";
import { initUserDir } from "../config/paths.js";
import { attachLogTable, closeDb, getDb } from "../db/index.js";
import { errorMessage } from "../errors/index.js";
import { EventBus } from "../events/index.js";
import { FeedFetcher } from "../fetcher/index.js";
import { logger } from "../logger/index.js";
import { EventBusNotifier } from "../notify/index.js";
import { createScheduler } from "../scheduler/index.js";
import { createStores } from "../store/index.js";
import type { SyncDeps } from "../sync/index.js";
import type { SourceKind } from "../types/contentRecord.js";
import { DAY_MS, refreshIntervalToMs } from "../utils/refreshInterval.js";


function intervalMs(config: AppConfig, kind: SourceKind): number {
  return refreshIntervalToMs(config.feeds[kind].syncInterval);
}


async function main(): Promise<void> {
  await initUserDir();
  const config = await loadConfig();
  logger.info("config", "config loaded", {
    announcements: config.feeds.announcement.url,
    blogPosts: config.feeds.blog_post.url,
    retentionDays: config.retentionDays,
  });
  const db = await getDb();
  attachLogTable(db);

  const events = new EventBus();
  const stores = createStores(db);
  const deps: SyncDeps = {
    stores,
    fetcher: new FeedFetcher({ timeoutMs: config.fetchTimeoutMs }),
    feedUrls: { announcement: config.feeds.announcement.url, blog_post: config.feeds.blog_post.url },
    retentionMs: config.retentionDays * DAY_MS,
    summaryLength: config.summaryLength,
    notifier: new EventBusNotifier(events),
    notifyNewContent: config.notifications.newContent,
    events,
  };
  const scheduler = createScheduler(deps, {
    intervals: { announcement: intervalMs(config, "announcement"), blog_post: intervalMs(config, "blog_post") },
    retry: { maxAttempts: config.retry.maxAttempts, baseDelayMs: config.retry.baseDelayMs, factor: 2 },
  });
  const combiner = new UnifiedFeedCombiner(stores);
  const app = createApp({ stores, combiner, scheduler, events, db, previewLimit: config.previewLimit });

  const server = serve({ fetch: app.fetch, port: config.port });
  scheduler.start();
  logger.info("app", `paperfeed: http://127.0.0.1:${config.port}/`);

  const shutdown = (signal: string) => {
    logger.info("app", "shutting down", { signal });
    scheduler.stop()
      .catch((err) => logger.error("app", "scheduler stop failed", { err: errorMessage(err) }))
      .finally(() => {
        server.close();
        closeDb();
        process.exit(0);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}


main().catch((err) => {
  logger.error("app", "startup failed", { err: errorMessage(err) });
  process.exit(1);
});
