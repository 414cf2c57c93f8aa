// Normalizer: RawFeedItem → ContentRecord through ordered fallback chains, or an explicit skip with reason

import type { RawFeedItem } from "../fetcher/types.js";
import type { AnnouncementRecord, BlogPostRecord, RecordByKind, SourceKind } from "../types/contentRecord.js";
import { parseFeedDate } from "../utils/date.js";
import { firstImageUrl, isHttpUrl, stripMarkup, truncate } from "../utils/html.js";
import { logger } from "../logger/index.js";


export const DEFAULT_SUMMARY_LENGTH = 300;


/** Author used when neither the item nor the feed names one */
export const UNKNOWN_AUTHOR = "Unknown";


export type SkipReason = "missing-id" | "missing-title" | "error";


export type NormalizeResult<K extends SourceKind> =
  | { ok: true; record: RecordByKind[K] }
  | { ok: false; reason: SkipReason; detail?: string };


export interface NormalizeContext {
  /** Time of this sync; default publish time for undated items */
  fetchedAt: Date;
  /** Feed title, used as the blog author of last resort */
  channelTitle?: string;
  summaryLength?: number;
}


interface CommonFields {
  id: string;
  title: string;
  summary: string;
  link: string;
  publishedAt: Date;
  fetchedAt: Date;
}


type CommonResult = { ok: true; fields: CommonFields } | { ok: false; reason: SkipReason; detail?: string };


function summarize(raw: RawFeedItem, max: number): string {
  for (const candidate of [raw.description, raw.content]) {
    if (!candidate) continue;
    const text = stripMarkup(candidate);
    if (text) return truncate(text, max);
  }
  return "";
}


function normalizeCommon(raw: RawFeedItem, ctx: NormalizeContext): CommonResult {
  const id = raw.link?.trim() || raw.guid?.trim();
  if (!id) return { ok: false, reason: "missing-id" };
  const title = raw.title?.trim();
  if (!title) return { ok: false, reason: "missing-title", detail: id };
  const { date, source } = parseFeedDate(raw.pubDate, ctx.fetchedAt);
  if (source === "fallback" && raw.pubDate) {
    logger.debug("normalize", "unparseable date, using fetch time", { item_id: id, pubDate: raw.pubDate });
  }
  return {
    ok: true,
    fields: {
      id,
      title,
      summary: summarize(raw, ctx.summaryLength ?? DEFAULT_SUMMARY_LENGTH),
      link: raw.link?.trim() || (isHttpUrl(raw.guid) ? raw.guid : ""),
      publishedAt: date,
      fetchedAt: ctx.fetchedAt,
    },
  };
}


export function normalizeAnnouncement(raw: RawFeedItem, ctx: NormalizeContext): NormalizeResult<"announcement"> {
  const common = normalizeCommon(raw, ctx);
  if (!common.ok) return common;
  const record: AnnouncementRecord = { sourceKind: "announcement", ...common.fields, isRead: false };
  return { ok: true, record };
}


export function normalizeBlogPost(raw: RawFeedItem, ctx: NormalizeContext): NormalizeResult<"blog_post"> {
  const common = normalizeCommon(raw, ctx);
  if (!common.ok) return common;
  const record: BlogPostRecord = {
    sourceKind: "blog_post",
    ...common.fields,
    authorName: raw.author?.trim() || ctx.channelTitle?.trim() || UNKNOWN_AUTHOR,
    category: raw.categories.map((c) => c.trim()).find((c) => c !== "") ?? null,
    featuredImageUrl: firstImageUrl(raw.content ?? "") ?? firstImageUrl(raw.description ?? ""),
    isRead: false,
    isFavorite: false,
    readingProgressPercent: 0,
    lastReadAt: null,
  };
  return { ok: true, record };
}


const normalizers: { [K in SourceKind]: (raw: RawFeedItem, ctx: NormalizeContext) => NormalizeResult<K> } = {
  announcement: normalizeAnnouncement,
  blog_post: normalizeBlogPost,
};


export function normalizeItem<K extends SourceKind>(kind: K, raw: RawFeedItem, ctx: NormalizeContext): NormalizeResult<K> {
  const normalize: (raw: RawFeedItem, ctx: NormalizeContext) => NormalizeResult<K> = normalizers[kind];
  return normalize(raw, ctx);
}


export interface SkippedItem {
  index: number;
  reason: SkipReason;
  detail?: string;
}


export interface NormalizedBatch<K extends SourceKind> {
  records: RecordByKind[K][];
  skipped: SkippedItem[];
}


/** Normalize a whole fetch; one item failing (or throwing) drops that item only */
export function normalizeItems<K extends SourceKind>(kind: K, raws: readonly RawFeedItem[], ctx: NormalizeContext): NormalizedBatch<K> {
  const records: RecordByKind[K][] = [];
  const skipped: SkippedItem[] = [];
  raws.forEach((raw, index) => {
    try {
      const result = normalizeItem(kind, raw, ctx);
      if (result.ok) {
        records.push(result.record);
      } else {
        skipped.push({ index, reason: result.reason, detail: result.detail });
      }
    } catch (err) {
      skipped.push({ index, reason: "error", detail: err instanceof Error ? err.message : String(err) });
    }
  });
  for (const s of skipped) {
    logger.debug("normalize", "item skipped", { kind, index: s.index, reason: s.reason, detail: s.detail });
  }
  return { records, skipped };
}
