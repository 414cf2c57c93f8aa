// Fetcher types: strict raw item, injected parser and downloader, fetch outcome

import type { FeedFetchError } from "../errors/index.js";


/** One feed entry as parsed, before normalization; every field may be missing */
export interface RawFeedItem {
  title?: string;
  link?: string;
  guid?: string;
  /** Explicit description / Atom summary (may contain markup) */
  description?: string;
  /** Full body (content:encoded / Atom content) */
  content?: string;
  /** Date string in whatever format the feed uses */
  pubDate?: string;
  author?: string;
  categories: string[];
}


/** Parsed document; rss-parser's Parser satisfies this */
export interface ParsedFeed {
  title?: string;
  items: unknown[];
}


export interface FeedParser {
  parseString(xml: string): Promise<ParsedFeed>;
}


export interface FetchTextOptions {
  signal?: AbortSignal;
  timeoutMs: number;
  headers: Record<string, string>;
}


/** Download a document body; throws FeedFetchError on transport or HTTP failure */
export type FetchText = (url: string, opts: FetchTextOptions) => Promise<string>;


export type FetchOutcome =
  | { ok: true; url: string; channelTitle?: string; items: RawFeedItem[] }
  | { ok: false; url: string; error: FeedFetchError };
