// Test fixtures: record builders, a fake feed source, a deferred promise

import { FeedFetchError } from "../src/errors/index.js";
import type { FetchOutcome, RawFeedItem } from "../src/fetcher/types.js";
import type { FeedSource } from "../src/sync/index.js";
import type { AnnouncementRecord, BlogPostRecord } from "../src/types/contentRecord.js";


export const T0 = new Date("2024-05-01T12:00:00.000Z");


export function minutesAfter(base: Date, n: number): Date {
  return new Date(base.getTime() + n * 60_000);
}


export function daysBefore(base: Date, n: number): Date {
  return new Date(base.getTime() - n * 24 * 60 * 60 * 1000);
}


export function announcement(id: string, overrides: Partial<AnnouncementRecord> = {}): AnnouncementRecord {
  return {
    sourceKind: "announcement",
    id,
    title: `Announcement ${id}`,
    summary: "",
    link: id,
    publishedAt: T0,
    fetchedAt: T0,
    isRead: false,
    ...overrides,
  };
}


export function blogPost(id: string, overrides: Partial<BlogPostRecord> = {}): BlogPostRecord {
  return {
    sourceKind: "blog_post",
    id,
    title: `Post ${id}`,
    summary: "",
    link: id,
    authorName: "Test Author",
    category: null,
    featuredImageUrl: null,
    publishedAt: T0,
    fetchedAt: T0,
    isRead: false,
    isFavorite: false,
    readingProgressPercent: 0,
    lastReadAt: null,
    ...overrides,
  };
}


export function rawItem(overrides: Partial<RawFeedItem> = {}): RawFeedItem {
  return { categories: [], ...overrides };
}


export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}


export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}


type Responder = (url: string, signal?: AbortSignal) => FetchOutcome | Promise<FetchOutcome>;


/** In-process feed source; answers from a queue of responders, the last one repeats */
export class FakeFeedSource implements FeedSource {
  readonly calls: string[] = [];
  private readonly responders: Responder[];

  constructor(...responders: Responder[]) {
    this.responders = responders;
  }

  async fetch(url: string, opts: { signal?: AbortSignal } = {}): Promise<FetchOutcome> {
    this.calls.push(url);
    const responder = this.responders.length > 1 ? this.responders.shift() : this.responders[0];
    if (!responder) throw new Error("FakeFeedSource has no responder");
    return responder(url, opts.signal);
  }
}


export function ok(items: RawFeedItem[], channelTitle?: string): Responder {
  return (url) => ({ ok: true, url, channelTitle, items });
}


export function failing(message = "HTTP 500", status = 500): Responder {
  return (url) => ({ ok: false, url, error: new FeedFetchError(url, message, { status }) });
}


/** Hangs until the signal aborts, then reports a failed fetch */
export function hangUntilAborted(): Responder {
  return (url, signal) =>
    new Promise((resolve) => {
      signal?.addEventListener("abort", () => resolve({ ok: false, url, error: new FeedFetchError(url, "aborted") }), { once: true });
    });
}


export const FEED_URLS = {
  announcement: "https://feeds.test/announcements.xml",
  blog_post: "https://feeds.test/posts.xml",
} as const;
