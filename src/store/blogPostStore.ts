// BlogPostStore: blog_posts table, plus favorites, reading progress and categories

import type { BlogPostRecord } from "../types/contentRecord.js";
import { blogPostPolicy } from "../sync/merge.js";
import { NEWEST_FIRST, SqliteContentStore } from "./sqliteStore.js";


/** Row shape (snake_case, booleans as 0/1) */
export interface BlogPostRow {
  id: string;
  title: string;
  summary: string;
  link: string;
  author_name: string;
  category: string | null;
  featured_image_url: string | null;
  published_at: string;
  fetched_at: string;
  is_read: number;
  is_favorite: number;
  reading_progress_percent: number;
  last_read_at: string | null;
}


/** Default size of the recently-read list */
export const RECENTLY_READ_LIMIT = 10;


export class BlogPostStore extends SqliteContentStore<"blog_post", BlogPostRow> {
  readonly kind = "blog_post";
  protected readonly table = "blog_posts";
  protected readonly columns = [
    "id", "title", "summary", "link", "author_name", "category", "featured_image_url",
    "published_at", "fetched_at", "is_read", "is_favorite", "reading_progress_percent", "last_read_at",
  ] as const;
  protected readonly policy = blogPostPolicy;

  protected toRecord(row: BlogPostRow): BlogPostRecord {
    return {
      sourceKind: "blog_post",
      id: row.id,
      title: row.title,
      summary: row.summary,
      link: row.link,
      authorName: row.author_name,
      category: row.category,
      featuredImageUrl: row.featured_image_url,
      publishedAt: new Date(row.published_at),
      fetchedAt: new Date(row.fetched_at),
      isRead: row.is_read === 1,
      isFavorite: row.is_favorite === 1,
      readingProgressPercent: row.reading_progress_percent,
      lastReadAt: row.last_read_at != null ? new Date(row.last_read_at) : null,
    };
  }

  protected toRow(record: BlogPostRecord): BlogPostRow {
    return {
      id: record.id,
      title: record.title,
      summary: record.summary,
      link: record.link,
      author_name: record.authorName,
      category: record.category,
      featured_image_url: record.featuredImageUrl,
      published_at: record.publishedAt.toISOString(),
      fetched_at: record.fetchedAt.toISOString(),
      is_read: record.isRead ? 1 : 0,
      is_favorite: record.isFavorite ? 1 : 0,
      reading_progress_percent: record.readingProgressPercent,
      last_read_at: record.lastReadAt?.toISOString() ?? null,
    };
  }

  favorites(): BlogPostRecord[] {
    return this.rows(`SELECT * FROM blog_posts WHERE is_favorite = 1 ${NEWEST_FIRST}`);
  }

  /** Most recently read first */
  recentlyRead(limit = RECENTLY_READ_LIMIT): BlogPostRecord[] {
    return this.rows(
      `SELECT * FROM blog_posts WHERE last_read_at IS NOT NULL ORDER BY last_read_at DESC, id ASC LIMIT @limit`,
      { limit },
    );
  }

  byCategory(category: string): BlogPostRecord[] {
    return this.rows(`SELECT * FROM blog_posts WHERE category = @category ${NEWEST_FIRST}`, { category });
  }

  /** Distinct non-null categories, alphabetical */
  categories(): string[] {
    return this.db
      .prepare<[], { category: string }>(`SELECT DISTINCT category FROM blog_posts WHERE category IS NOT NULL ORDER BY category ASC`)
      .all()
      .map((r) => r.category);
  }

  /** Flip isFavorite; returns the new value, or null when the id does not exist */
  toggleFavorite(id: string): boolean | null {
    const changed = this.write(`UPDATE blog_posts SET is_favorite = 1 - is_favorite WHERE id = @id`, { id });
    if (changed === 0) return null;
    return this.byId(id)?.isFavorite ?? null;
  }

  /** Record reading progress (clamped to 0..100) and lastReadAt; false when the id does not exist */
  updateReadingProgress(id: string, percent: number, at: Date = new Date()): boolean {
    if (!Number.isFinite(percent)) throw new RangeError(`reading progress must be a finite number, got ${percent}`);
    const clamped = Math.min(100, Math.max(0, percent));
    return this.write(
      `UPDATE blog_posts SET reading_progress_percent = @percent, last_read_at = @at WHERE id = @id`,
      { id, percent: clamped, at: at.toISOString() },
    ) > 0;
  }
}
