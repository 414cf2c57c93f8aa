import { describe, it, expect } from "vitest";
import { normalizeAnnouncement, normalizeBlogPost, normalizeItems, UNKNOWN_AUTHOR } from "../src/normalizer/index.js";
import { T0, rawItem } from "./helpers.js";


const ctx = { fetchedAt: T0 };


describe("normalizeAnnouncement", () => {
  it("maps a complete item", () => {
    const result = normalizeAnnouncement(rawItem({
      title: "  Maintenance window ",
      link: "https://site.test/a/1",
      guid: "urn:uuid:1",
      description: "<p>Hello <b>world</b></p><p>Again &amp; again</p>",
      pubDate: "2024-05-01",
    }), ctx);
    expect(result).toEqual({
      ok: true,
      record: {
        sourceKind: "announcement",
        id: "https://site.test/a/1",
        title: "Maintenance window",
        summary: "Hello world Again & again",
        link: "https://site.test/a/1",
        publishedAt: new Date("2024-05-01T00:00:00.000Z"),
        fetchedAt: T0,
        isRead: false,
      },
    });
  });

  it("falls back to the guid for identity and keeps a non-URL guid out of link", () => {
    const result = normalizeAnnouncement(rawItem({ title: "T", guid: "urn:uuid:1" }), ctx);
    expect(result.ok && result.record).toMatchObject({ id: "urn:uuid:1", link: "" });
  });

  it("uses an http guid as the link", () => {
    const result = normalizeAnnouncement(rawItem({ title: "T", guid: "https://site.test/g/1" }), ctx);
    expect(result.ok && result.record.link).toBe("https://site.test/g/1");
  });

  it("skips items without identity or title", () => {
    expect(normalizeAnnouncement(rawItem({ title: "T" }), ctx)).toEqual({ ok: false, reason: "missing-id" });
    expect(normalizeAnnouncement(rawItem({ link: "https://site.test/x", title: "   " }), ctx)).toEqual({
      ok: false,
      reason: "missing-title",
      detail: "https://site.test/x",
    });
  });

  it("falls back to content for the summary and truncates it", () => {
    const result = normalizeAnnouncement(
      rawItem({ title: "T", link: "https://site.test/1", content: "<div>abcdefghijklmnop</div>" }),
      { fetchedAt: T0, summaryLength: 10 },
    );
    expect(result.ok && result.record.summary).toBe("abcdefghi…");
  });

  it("uses the fetch time when the date cannot be parsed", () => {
    const result = normalizeAnnouncement(rawItem({ title: "T", link: "https://site.test/1", pubDate: "sometime soon" }), ctx);
    expect(result.ok && result.record.publishedAt).toEqual(T0);
  });
});


describe("normalizeBlogPost", () => {
  it("takes author, first category and first absolute image", () => {
    const result = normalizeBlogPost(rawItem({
      title: "Post",
      link: "https://site.test/p/1",
      author: "Ada",
      categories: ["  ", "Guides", "News"],
      content: '<p><img src="/relative.png"><img src="https://img.test/cover.png"></p>',
    }), ctx);
    expect(result.ok && result.record).toMatchObject({
      authorName: "Ada",
      category: "Guides",
      featuredImageUrl: "https://img.test/cover.png",
      isFavorite: false,
      readingProgressPercent: 0,
      lastReadAt: null,
    });
  });

  it("falls back to the feed title, then to a placeholder author", () => {
    const item = rawItem({ title: "Post", link: "https://site.test/p/1" });
    const fromChannel = normalizeBlogPost(item, { fetchedAt: T0, channelTitle: "Example Blog" });
    expect(fromChannel.ok && fromChannel.record.authorName).toBe("Example Blog");
    const anonymous = normalizeBlogPost(item, ctx);
    expect(anonymous.ok && anonymous.record).toMatchObject({ authorName: UNKNOWN_AUTHOR, category: null, featuredImageUrl: null });
  });

  it("reads the image from the description when the body has none", () => {
    const result = normalizeBlogPost(rawItem({
      title: "Post",
      link: "https://site.test/p/1",
      description: '<img src="https://img.test/thumb.jpg"> teaser',
    }), ctx);
    expect(result.ok && result.record.featuredImageUrl).toBe("https://img.test/thumb.jpg");
  });
});


describe("normalizeItems", () => {
  it("drops bad items without failing the batch", () => {
    const batch = normalizeItems("announcement", [
      rawItem({ title: "One", link: "https://site.test/1" }),
      rawItem({ link: "https://site.test/2" }),
      rawItem({ title: "Three", link: "https://site.test/3" }),
    ], ctx);
    expect(batch.records.map((r) => r.id)).toEqual(["https://site.test/1", "https://site.test/3"]);
    expect(batch.skipped).toEqual([{ index: 1, reason: "missing-title", detail: "https://site.test/2" }]);
  });
});
