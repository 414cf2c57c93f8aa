// FeedFetcher: download one feed, parse it with an injected rss-parser instance, return raw items; never touches the store

import Parser from "rss-parser";
import { FeedFetchError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { toRawFeedItem } from "./rawItem.js";
import type { FeedParser, FetchOutcome, FetchText, ParsedFeed, RawFeedItem } from "./types.js";

export type { FeedParser, FetchOutcome, FetchText, FetchTextOptions, ParsedFeed, RawFeedItem } from "./types.js";
export { textOf, toRawFeedItem } from "./rawItem.js";


const DEFAULT_TIMEOUT_MS = 15_000;


const DEFAULT_HEADERS: Record<string, string> = {
  "User-Agent": "paperfeed/0.1",
  "Accept": "application/rss+xml,application/atom+xml,application/xml,text/xml,*/*",
};


/** A fresh parser per fetcher; no process-wide instance */
export function createFeedParser(): FeedParser {
  return new Parser();
}


/** Default downloader: global fetch with a timeout, chained to the caller's AbortSignal */
export const fetchText: FetchText = async (url, { signal, timeoutMs, headers }) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new FeedFetchError(url, `timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) onAbort();
  signal?.addEventListener("abort", onAbort, { once: true });
  try {
    const res = await fetch(url, { headers, signal: controller.signal });
    if (!res.ok) throw new FeedFetchError(url, `HTTP ${res.status} ${res.statusText}`.trim(), { status: res.status });
    return await res.text();
  } catch (err) {
    if (err instanceof FeedFetchError) throw err;
    const reason: unknown = controller.signal.reason;
    if (reason instanceof FeedFetchError) throw reason;
    throw new FeedFetchError(url, err instanceof Error ? err.message : String(err), { cause: err });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
};


export interface FeedFetcherOptions {
  parser?: FeedParser;
  fetchText?: FetchText;
  timeoutMs?: number;
  headers?: Record<string, string>;
}


export class FeedFetcher {
  private readonly parser: FeedParser;
  private readonly fetchText: FetchText;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(opts: FeedFetcherOptions = {}) {
    this.parser = opts.parser ?? createFeedParser();
    this.fetchText = opts.fetchText ?? fetchText;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = { ...DEFAULT_HEADERS, ...opts.headers };
  }


  /** Fetch and parse; transport, HTTP, abort and document parse errors become `{ ok: false }` */
  async fetch(url: string, opts: { signal?: AbortSignal } = {}): Promise<FetchOutcome> {
    const startedAt = Date.now();
    try {
      opts.signal?.throwIfAborted();
      const xml = await this.fetchText(url, { signal: opts.signal, timeoutMs: this.timeoutMs, headers: this.headers });
      const feed = await this.parse(url, xml);
      const items: RawFeedItem[] = [];
      for (const entry of feed.items) {
        const raw = toRawFeedItem(entry);
        if (raw.ok) {
          items.push(raw.item);
        } else {
          logger.debug("fetcher", "dropped malformed entry", { feed_url: url, reason: raw.reason });
        }
      }
      logger.debug("fetcher", "feed parsed", { feed_url: url, items: items.length, durationMs: Date.now() - startedAt });
      return { ok: true, url, channelTitle: feed.title?.trim() || undefined, items };
    } catch (err) {
      const error = err instanceof FeedFetchError
        ? err
        : new FeedFetchError(url, err instanceof Error ? err.message : String(err), { cause: err });
      logger.warn("fetcher", "feed fetch failed", { feed_url: url, err: error.message, status: error.status });
      return { ok: false, url, error };
    }
  }


  private async parse(url: string, xml: string): Promise<ParsedFeed> {
    try {
      return await this.parser.parseString(xml);
    } catch (err) {
      throw new FeedFetchError(url, `unparseable feed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }
}
