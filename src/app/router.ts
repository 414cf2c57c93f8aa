// Router: Hono HTTP layer over the stores, combiner and scheduler; services are injected for tests

import { Hono } from "hono";
import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { UnifiedFeedCombiner } from "../combiner/index.js";
import { DEFAULT_PREVIEW_LIMIT } from "../combiner/index.js";
import type { Db } from "../db/index.js";
import { queryLogs } from "../db/index.js";
import { NotFoundError, ValidationError, errorMessage } from "../errors/index.js";
import type { EventBus } from "../events/index.js";
import { logger } from "../logger/index.js";
import type { Scheduler } from "../scheduler/index.js";
import type { ContentStores } from "../store/index.js";
import type { SyncOutcome } from "../sync/index.js";
import { isSourceKind } from "../types/contentRecord.js";
import type { BlogPostRecord, SourceKind } from "../types/contentRecord.js";


export interface AppServices {
  stores: ContentStores;
  combiner: UnifiedFeedCombiner;
  scheduler: Pick<Scheduler, "runNow">;
  events: EventBus;
  /** Source of GET /api/logs; omitted means the route answers 404 */
  db?: Db;
  previewLimit?: number;
}


const HEARTBEAT_MS = 25_000;


const flag = z.enum(["1", "0", "true", "false"]).transform((v) => v === "1" || v === "true");


const feedQuery = z.object({
  limit: z.coerce.number().int().positive().optional(),
  unread: flag.optional(),
});


const announcementQuery = z.object({
  filter: z.enum(["all", "unread", "read"]).default("all"),
  q: z.string().optional(),
});


const blogPostQuery = z.object({
  filter: z.enum(["all", "unread", "favorites", "recent"]).default("all"),
  category: z.string().min(1).optional(),
  q: z.string().optional(),
});


const logQuery = z.object({
  level: z.enum(["error", "warn", "info", "debug"]).optional(),
  limit: z.coerce.number().int().positive().max(500).default(100),
});


const idBody = z.object({ id: z.string().min(1) });


const progressBody = z.object({
  id: z.string().min(1),
  percent: z.number().finite(),
});


function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "));
  }
  return result.data;
}


async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationError("body must be JSON");
  }
  return parseWith(schema, raw);
}


function kindParam(c: Context): SourceKind {
  const kind = c.req.param("kind");
  if (!kind || !isSourceKind(kind)) throw new NotFoundError(`unknown source kind: ${kind ?? ""}`);
  return kind;
}


function mustExist(found: boolean, id: string): void {
  if (!found) throw new NotFoundError(`no record with id ${id}`);
}


/** SyncOutcome with the error reduced to its message */
export function outcomeJson(outcome: SyncOutcome) {
  if (outcome.status === "success") return outcome;
  return { status: outcome.status, kind: outcome.kind, stage: outcome.stage, error: outcome.error.message };
}


/** Keep only ids present in a search result, preserving list order */
function within<R extends { id: string }>(list: R[], hits: R[]): R[] {
  const ids = new Set(hits.map((h) => h.id));
  return list.filter((r) => ids.has(r.id));
}


export function createApp(services: AppServices) {
  const { stores, combiner, scheduler, events } = services;
  const previewLimit = services.previewLimit ?? DEFAULT_PREVIEW_LIMIT;
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof ValidationError) return c.json({ error: err.message }, 400);
    if (err instanceof NotFoundError) return c.json({ error: err.message }, 404);
    logger.error("app", "request failed", { path: c.req.path, err: errorMessage(err) });
    return c.json({ error: errorMessage(err) }, 500);
  });

  // Unified preview across both sources
  app.get("/api/feed", (c) => {
    const { limit, unread } = parseWith(feedQuery, c.req.query());
    const items = combiner.latest({ limit: limit ?? previewLimit, unreadOnly: unread ?? false });
    return c.json({ items });
  });

  app.get("/api/feed/events", (c) => {
    const { limit, unread } = parseWith(feedQuery, c.req.query());
    return streamSSE(c, async (stream) => {
      const send = (event: string, data: unknown) => {
        stream.writeSSE({ event, data: JSON.stringify(data) }).catch((err) => {
          logger.debug("app", "sse write failed", { event, err: errorMessage(err) });
        });
      };
      const offs = [
        combiner.subscribe({ limit: limit ?? previewLimit, unreadOnly: unread ?? false }, (items) => send("feed", { items })),
        combiner.subscribeUnreadCount((counts) => send("unread-count", counts)),
        events.on("content:new", (e) => send("content:new", e)),
        events.on("sync:done", (e) => send("sync:done", e)),
      ];
      const heartbeat = setInterval(() => send("ping", {}), HEARTBEAT_MS);
      stream.onAbort(() => {
        for (const off of offs) off();
        clearInterval(heartbeat);
      });
      await new Promise<void>((resolve) => stream.onAbort(resolve));
    });
  });

  app.get("/api/unread-count", (c) => c.json(combiner.unreadCounts()));

  // Announcements
  app.get("/api/announcements", (c) => {
    const { filter, q } = parseWith(announcementQuery, c.req.query());
    const store = stores.announcement;
    const list = filter === "unread" ? store.unread() : filter === "read" ? store.read() : store.all();
    const items = q?.trim() ? within(list, store.search(q)) : list;
    return c.json({ items });
  });

  app.post("/api/announcements/read", async (c) => {
    const { id } = await readBody(c, idBody);
    mustExist(stores.announcement.markRead(id), id);
    return c.json({ ok: true });
  });

  app.post("/api/announcements/unread", async (c) => {
    const { id } = await readBody(c, idBody);
    mustExist(stores.announcement.markUnread(id), id);
    return c.json({ ok: true });
  });

  app.post("/api/announcements/read-all", (c) => c.json({ ok: true, updated: stores.announcement.markAllRead() }));

  // Blog posts
  app.get("/api/blog-posts", (c) => {
    const { filter, category, q } = parseWith(blogPostQuery, c.req.query());
    const store = stores.blog_post;
    let list: BlogPostRecord[];
    switch (filter) {
      case "unread":
        list = store.unread();
        break;
      case "favorites":
        list = store.favorites();
        break;
      case "recent":
        list = store.recentlyRead();
        break;
      default:
        list = store.all();
    }
    if (category) list = list.filter((p) => p.category === category);
    if (q?.trim()) list = within(list, store.search(q));
    return c.json({ items: list });
  });

  app.get("/api/blog-posts/categories", (c) => c.json({ categories: stores.blog_post.categories() }));

  app.post("/api/blog-posts/read", async (c) => {
    const { id } = await readBody(c, idBody);
    mustExist(stores.blog_post.markRead(id), id);
    return c.json({ ok: true });
  });

  app.post("/api/blog-posts/unread", async (c) => {
    const { id } = await readBody(c, idBody);
    mustExist(stores.blog_post.markUnread(id), id);
    return c.json({ ok: true });
  });

  app.post("/api/blog-posts/favorite", async (c) => {
    const { id } = await readBody(c, idBody);
    const isFavorite = stores.blog_post.toggleFavorite(id);
    if (isFavorite === null) throw new NotFoundError(`no record with id ${id}`);
    return c.json({ ok: true, isFavorite });
  });

  app.post("/api/blog-posts/progress", async (c) => {
    const { id, percent } = await readBody(c, progressBody);
    mustExist(stores.blog_post.updateReadingProgress(id, percent), id);
    return c.json({ ok: true, readingProgressPercent: stores.blog_post.byId(id)?.readingProgressPercent ?? null });
  });

  // Sync and cache maintenance
  app.post("/api/sync/:kind", async (c) => {
    const kind = kindParam(c);
    const outcome = await scheduler.runNow(kind, { retry: false });
    return c.json(outcomeJson(outcome), outcome.status === "success" ? 200 : 502);
  });

  app.delete("/api/content/:kind", (c) => {
    const kind = kindParam(c);
    const deleted = stores[kind].deleteAll();
    logger.info("app", "content cleared", { kind, deleted });
    return c.json({ ok: true, deleted });
  });

  app.get("/api/logs", (c) => {
    if (!services.db) throw new NotFoundError("log storage is not enabled");
    const { level, limit } = parseWith(logQuery, c.req.query());
    return c.json({ logs: queryLogs(services.db, { level, limit }) });
  });

  return app;
}
