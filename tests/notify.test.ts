import { describe, it, expect } from "vitest";
import { EventBus } from "../src/events/index.js";
import type { NewContentEvent } from "../src/events/index.js";
import { EventBusNotifier, newContentMessage } from "../src/notify/index.js";


describe("newContentMessage", () => {
  it("pluralizes per kind", () => {
    expect(newContentMessage("blog_post", 1)).toEqual({ title: "New Blog Posts", body: "1 new blog post available" });
    expect(newContentMessage("announcement", 4)).toEqual({ title: "New Announcements", body: "4 new announcements available" });
  });
});


describe("EventBusNotifier", () => {
  it("broadcasts content:new", () => {
    const bus = new EventBus();
    const seen: NewContentEvent[] = [];
    const off = bus.on("content:new", (e) => seen.push(e));
    const notifier = new EventBusNotifier(bus);
    notifier.notifyNewContent("announcement", 2);
    notifier.notifyNewContent("announcement", 0);
    off();
    notifier.notifyNewContent("blog_post", 1);
    expect(seen).toEqual([{ kind: "announcement", count: 2 }]);
  });
});
