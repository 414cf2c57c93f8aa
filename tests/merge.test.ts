import { describe, it, expect } from "vitest";
import { announcementPolicy, blogPostPolicy, mergePreserving } from "../src/sync/merge.js";
import type { AnnouncementRecord } from "../src/types/contentRecord.js";
import { T0, announcement, blogPost, daysBefore, minutesAfter } from "./helpers.js";


const sameJson = <R>(a: R, b: R) => JSON.stringify(a) === JSON.stringify(b);


describe("mergePreserving", () => {
  it("gives new ids default user fields and fetchedAt = now", () => {
    const now = minutesAfter(T0, 10);
    const plan = mergePreserving([announcement("a", { isRead: true })], new Map(), now, announcementPolicy, sameJson);
    expect(plan.inserted).toBe(1);
    expect(plan.writes).toHaveLength(1);
    expect(plan.writes[0].isRead).toBe(false);
    expect(plan.writes[0].fetchedAt).toEqual(now);
  });

  it("keeps read state and the first publishedAt, refreshes descriptive fields", () => {
    const now = minutesAfter(T0, 60);
    const stored = new Map<string, AnnouncementRecord>([
      ["a", announcement("a", { title: "Old", isRead: true, publishedAt: T0, fetchedAt: T0 })],
    ]);
    const fresh = announcement("a", { title: "New", publishedAt: minutesAfter(T0, 30) });
    const plan = mergePreserving([fresh], stored, now, announcementPolicy, sameJson);
    expect(plan.updated).toBe(1);
    expect(plan.writes[0]).toMatchObject({ title: "New", isRead: true, publishedAt: T0, fetchedAt: now });
  });

  it("never moves fetchedAt backwards", () => {
    const later = minutesAfter(T0, 120);
    const stored = new Map([["a", announcement("a", { fetchedAt: later })]]);
    const plan = mergePreserving([announcement("a")], stored, T0, announcementPolicy, sameJson);
    expect(plan.entries[0].record.fetchedAt).toEqual(later);
    expect(plan.unchanged).toBe(1);
    expect(plan.writes).toEqual([]);
  });

  it("keeps the first occurrence of an id repeated within one fetch", () => {
    const plan = mergePreserving(
      [announcement("a", { title: "first" }), announcement("a", { title: "second" })],
      new Map(),
      T0,
      announcementPolicy,
      sameJson,
    );
    expect(plan.entries).toHaveLength(1);
    expect(plan.writes[0].title).toBe("first");
  });

  it("reports unchanged rows without writing them", () => {
    const stored = new Map([["a", announcement("a")]]);
    const plan = mergePreserving([announcement("a")], stored, T0, announcementPolicy, sameJson);
    expect(plan).toMatchObject({ inserted: 0, updated: 0, unchanged: 1 });
  });

  it("preserves every user-owned blog post field", () => {
    const readAt = daysBefore(T0, 1);
    const stored = new Map([
      ["p", blogPost("p", { isRead: true, isFavorite: true, readingProgressPercent: 42, lastReadAt: readAt })],
    ]);
    const plan = mergePreserving([blogPost("p", { summary: "edited" })], stored, T0, blogPostPolicy, sameJson);
    expect(plan.writes[0]).toMatchObject({
      summary: "edited",
      isRead: true,
      isFavorite: true,
      readingProgressPercent: 42,
      lastReadAt: readAt,
    });
  });
});
