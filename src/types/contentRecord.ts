/**
 * Unified content record: one announcement or one blog post.
 * Fetcher → Normalizer → ContentStore → Combiner
 */


/** Which feed (and which table) a record belongs to */
export type SourceKind = "announcement" | "blog_post";


export const SOURCE_KINDS: readonly SourceKind[] = ["announcement", "blog_post"];


export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((k) => k === value);
}


interface BaseRecord {
  /** Stable identity from the feed: canonical link, else guid */
  id: string;
  title: string;
  /** Plain-text excerpt */
  summary: string;
  link: string;
  /** Feed-provided publish time; fetch time when the feed gives none */
  publishedAt: Date;
  /** Time of the last successful sync that contained this id */
  fetchedAt: Date;
  /** User-owned */
  isRead: boolean;
}


export interface AnnouncementRecord extends BaseRecord {
  sourceKind: "announcement";
}


export interface BlogPostRecord extends BaseRecord {
  sourceKind: "blog_post";
  authorName: string;
  category: string | null;
  featuredImageUrl: string | null;
  /** User-owned */
  isFavorite: boolean;
  /** User-owned, 0..100 */
  readingProgressPercent: number;
  /** User-owned */
  lastReadAt: Date | null;
}


export type ContentRecord = AnnouncementRecord | BlogPostRecord;


/** Maps a kind to its record type */
export interface RecordByKind {
  announcement: AnnouncementRecord;
  blog_post: BlogPostRecord;
}
