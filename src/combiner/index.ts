// UnifiedFeedCombiner: merge both stores into one newest-first preview, recomputed on every store change

import type { AnnouncementRecord, BlogPostRecord, ContentRecord } from "../types/contentRecord.js";
import type { ContentStore, Unsubscribe } from "../store/types.js";
import { logger } from "../logger/index.js";


export const DEFAULT_PREVIEW_LIMIT = 3;


export interface CombineOptions {
  /** Maximum records returned; Infinity for all */
  limit?: number;
  unreadOnly?: boolean;
}


/** publishedAt desc, then id asc, then sourceKind asc */
export function compareNewestFirst(a: ContentRecord, b: ContentRecord): number {
  const byTime = b.publishedAt.getTime() - a.publishedAt.getTime();
  if (byTime !== 0) return byTime;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  if (a.sourceKind !== b.sourceKind) return a.sourceKind < b.sourceKind ? -1 : 1;
  return 0;
}


/** Pure merge of the two record sets */
export function combineRecords(
  announcements: readonly AnnouncementRecord[],
  blogPosts: readonly BlogPostRecord[],
  opts: CombineOptions = {},
): ContentRecord[] {
  const { limit = DEFAULT_PREVIEW_LIMIT, unreadOnly = false } = opts;
  if (!(limit > 0)) return [];
  const merged: ContentRecord[] = [...announcements, ...blogPosts];
  const candidates = unreadOnly ? merged.filter((r) => !r.isRead) : merged;
  candidates.sort(compareNewestFirst);
  return Number.isFinite(limit) ? candidates.slice(0, Math.floor(limit)) : candidates;
}


export interface UnreadCounts {
  announcements: number;
  blogPosts: number;
  total: number;
}


export interface CombinerStores {
  announcement: ContentStore<"announcement">;
  blog_post: ContentStore<"blog_post">;
}


export class UnifiedFeedCombiner {
  constructor(private readonly stores: CombinerStores) {}


  /** One-shot computation */
  latest(opts: CombineOptions = {}): ContentRecord[] {
    const { announcement, blog_post } = this.stores;
    const unreadOnly = opts.unreadOnly ?? false;
    return combineRecords(
      unreadOnly ? announcement.unread() : announcement.all(),
      unreadOnly ? blog_post.unread() : blog_post.all(),
      opts,
    );
  }


  unreadCounts(): UnreadCounts {
    const announcements = this.stores.announcement.countUnread();
    const blogPosts = this.stores.blog_post.countUnread();
    return { announcements, blogPosts, total: announcements + blogPosts };
  }


  /** Emit now and after every change in either store */
  subscribe(opts: CombineOptions, listener: (records: ContentRecord[]) => void): Unsubscribe {
    return this.onAnyChange(() => listener(this.latest(opts)));
  }


  /** Emit now and whenever the summed unread count changes */
  subscribeUnreadCount(listener: (counts: UnreadCounts) => void): Unsubscribe {
    let last: number | undefined;
    return this.onAnyChange(() => {
      const counts = this.unreadCounts();
      if (counts.total === last) return;
      last = counts.total;
      listener(counts);
    });
  }


  private onAnyChange(run: () => void): Unsubscribe {
    run();
    const offs = [this.stores.announcement.onChange(run), this.stores.blog_post.onChange(run)];
    logger.debug("combiner", "subscriber attached");
    return () => {
      for (const off of offs) off();
    };
  }
}
