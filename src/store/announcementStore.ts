// AnnouncementStore: announcements table

import type { AnnouncementRecord } from "../types/contentRecord.js";
import { announcementPolicy } from "../sync/merge.js";
import { SqliteContentStore } from "./sqliteStore.js";


/** Row shape (snake_case, booleans as 0/1) */
export interface AnnouncementRow {
  id: string;
  title: string;
  summary: string;
  link: string;
  published_at: string;
  fetched_at: string;
  is_read: number;
}


export class AnnouncementStore extends SqliteContentStore<"announcement", AnnouncementRow> {
  readonly kind = "announcement";
  protected readonly table = "announcements";
  protected readonly columns = ["id", "title", "summary", "link", "published_at", "fetched_at", "is_read"] as const;
  protected readonly policy = announcementPolicy;

  protected toRecord(row: AnnouncementRow): AnnouncementRecord {
    return {
      sourceKind: "announcement",
      id: row.id,
      title: row.title,
      summary: row.summary,
      link: row.link,
      publishedAt: new Date(row.published_at),
      fetchedAt: new Date(row.fetched_at),
      isRead: row.is_read === 1,
    };
  }

  protected toRow(record: AnnouncementRecord): AnnouncementRow {
    return {
      id: record.id,
      title: record.title,
      summary: record.summary,
      link: record.link,
      published_at: record.publishedAt.toISOString(),
      fetched_at: record.fetchedAt.toISOString(),
      is_read: record.isRead ? 1 : 0,
    };
  }
}
