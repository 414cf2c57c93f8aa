// Merge-preserving upsert planning: fresh fetch + stored snapshot → rows to write, user-owned fields carried over

import type { AnnouncementRecord, BlogPostRecord, ContentRecord } from "../types/contentRecord.js";


/** Per-kind handling of user-owned fields */
export interface MergePolicy<R extends ContentRecord> {
  /** Copy user-owned fields from the stored row onto the fresh record */
  preserve(fresh: R, stored: R): R;
  /** Reset user-owned fields for an id seen for the first time */
  defaults(fresh: R): R;
}


export const announcementPolicy: MergePolicy<AnnouncementRecord> = {
  preserve: (fresh, stored) => ({ ...fresh, isRead: stored.isRead }),
  defaults: (fresh) => ({ ...fresh, isRead: false }),
};


export const blogPostPolicy: MergePolicy<BlogPostRecord> = {
  preserve: (fresh, stored) => ({
    ...fresh,
    isRead: stored.isRead,
    isFavorite: stored.isFavorite,
    readingProgressPercent: stored.readingProgressPercent,
    lastReadAt: stored.lastReadAt,
  }),
  defaults: (fresh) => ({
    ...fresh,
    isRead: false,
    isFavorite: false,
    readingProgressPercent: 0,
    lastReadAt: null,
  }),
};


export type MergeAction = "insert" | "update" | "unchanged";


export interface MergeEntry<R extends ContentRecord> {
  action: MergeAction;
  record: R;
}


export interface MergePlan<R extends ContentRecord> {
  entries: MergeEntry<R>[];
  /** Records that must be written (insert + update) */
  writes: R[];
  inserted: number;
  updated: number;
  unchanged: number;
}


function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}


/**
 * Plan the merge of a fresh fetch against the stored rows for the same ids.
 *
 * Existing ids keep their user-owned fields and their first publishedAt, get
 * refreshed descriptive fields and a fetchedAt that never moves backwards.
 * New ids get default user fields and fetchedAt = now. When a fetch repeats
 * an id the first occurrence wins. `same` decides whether a merged record
 * differs from the stored one; unchanged records are not rewritten.
 */
export function mergePreserving<R extends ContentRecord>(
  fresh: readonly R[],
  stored: ReadonlyMap<string, R>,
  now: Date,
  policy: MergePolicy<R>,
  same: (a: R, b: R) => boolean,
): MergePlan<R> {
  const seen = new Set<string>();
  const entries: MergeEntry<R>[] = [];
  for (const item of fresh) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    const prev = stored.get(item.id);
    if (!prev) {
      entries.push({ action: "insert", record: { ...policy.defaults(item), fetchedAt: now } });
      continue;
    }
    const merged: R = {
      ...policy.preserve(item, prev),
      publishedAt: prev.publishedAt,
      fetchedAt: laterOf(prev.fetchedAt, now),
    };
    entries.push({ action: same(merged, prev) ? "unchanged" : "update", record: merged });
  }
  const writes = entries.filter((e) => e.action !== "unchanged").map((e) => e.record);
  return {
    entries,
    writes,
    inserted: entries.filter((e) => e.action === "insert").length,
    updated: entries.filter((e) => e.action === "update").length,
    unchanged: entries.filter((e) => e.action === "unchanged").length,
  };
}
