// Notifications: "new content available" boundary; channel setup and delivery live in the app shell

import type { EventBus } from "../events/index.js";
import { logger } from "../logger/index.js";
import type { SourceKind } from "../types/contentRecord.js";


export interface NotificationDispatcher {
  notifyNewContent(kind: SourceKind, count: number): void | Promise<void>;
}


const NOUNS: Record<SourceKind, [singular: string, plural: string]> = {
  announcement: ["announcement", "announcements"],
  blog_post: ["blog post", "blog posts"],
};


/** Title and body for a new-content notification */
export function newContentMessage(kind: SourceKind, count: number): { title: string; body: string } {
  const [one, many] = NOUNS[kind];
  const title = `New ${many.replace(/\b\w/g, (c) => c.toUpperCase())}`;
  const body = count === 1 ? `1 new ${one} available` : `${count} new ${many} available`;
  return { title, body };
}


/** Default dispatcher: logs and broadcasts content:new on the event bus (SSE clients pick it up) */
export class EventBusNotifier implements NotificationDispatcher {
  constructor(private readonly bus: EventBus) {}

  notifyNewContent(kind: SourceKind, count: number): void {
    if (count <= 0) return;
    const { title, body } = newContentMessage(kind, count);
    logger.info("notify", title, { kind, count, body });
    this.bus.emit("content:new", { kind, count });
  }
}
