// Store registry: one ContentStore per source kind over a shared database

import type { Db } from "../db/index.js";
import { AnnouncementStore } from "./announcementStore.js";
import { BlogPostStore } from "./blogPostStore.js";

export { AnnouncementStore } from "./announcementStore.js";
export { BlogPostStore, RECENTLY_READ_LIMIT } from "./blogPostStore.js";
export type { ContentStore, MergeResult, StoreMap, Unsubscribe } from "./types.js";


export interface ContentStores {
  announcement: AnnouncementStore;
  blog_post: BlogPostStore;
}


export function createStores(db: Db): ContentStores {
  return {
    announcement: new AnnouncementStore(db),
    blog_post: new BlogPostStore(db),
  };
}
