import { afterEach, describe, it, expect, vi } from "vitest";
import { FeedFetchError } from "../src/errors/index.js";
import { FeedFetcher, fetchText, textOf, toRawFeedItem } from "../src/fetcher/index.js";
import type { FetchText } from "../src/fetcher/index.js";


const FEED_URL = "https://feeds.test/posts.xml";


const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example Blog</title>
    <link>https://site.test</link>
    <description>Posts</description>
    <item>
      <title>First post</title>
      <link>https://site.test/p/1</link>
      <guid>https://site.test/p/1</guid>
      <pubDate>Wed, 01 May 2024 10:00:00 GMT</pubDate>
      <category>Guides</category>
    </item>
    <item>
      <title>Second post</title>
      <link>https://site.test/p/2</link>
    </item>
  </channel>
</rss>`;


describe("FeedFetcher", () => {
  it("parses a document into raw items", async () => {
    const fetchText = vi.fn<FetchText>(async () => RSS);
    const outcome = await new FeedFetcher({ fetchText }).fetch(FEED_URL);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.channelTitle).toBe("Example Blog");
    expect(outcome.items).toHaveLength(2);
    expect(outcome.items[0]).toMatchObject({
      title: "First post",
      link: "https://site.test/p/1",
      guid: "https://site.test/p/1",
      pubDate: "Wed, 01 May 2024 10:00:00 GMT",
      categories: ["Guides"],
    });
    expect(outcome.items[1].categories).toEqual([]);
    expect(fetchText).toHaveBeenCalledWith(FEED_URL, expect.objectContaining({ timeoutMs: 15_000 }));
  });

  it("reports transport errors as a failed outcome", async () => {
    const fetchText: FetchText = async (url) => {
      throw new FeedFetchError(url, "HTTP 503 Service Unavailable", { status: 503 });
    };
    const outcome = await new FeedFetcher({ fetchText }).fetch(FEED_URL);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.status).toBe(503);
    expect(outcome.error.url).toBe(FEED_URL);
  });

  it("reports a document that is not a feed", async () => {
    const outcome = await new FeedFetcher({ fetchText: async () => "<html><body>nope</body></html>" }).fetch(FEED_URL);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toMatch(/^unparseable feed: /);
  });

  it("does not download once the signal is aborted", async () => {
    const fetchText = vi.fn<FetchText>(async () => RSS);
    const controller = new AbortController();
    controller.abort();
    const outcome = await new FeedFetcher({ fetchText }).fetch(FEED_URL, { signal: controller.signal });
    expect(outcome.ok).toBe(false);
    expect(fetchText).not.toHaveBeenCalled();
  });
});


describe("fetchText", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body of a successful response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(RSS, { status: 200 })));
    await expect(fetchText(FEED_URL, { timeoutMs: 1000, headers: {} })).resolves.toBe(RSS);
  });

  it("turns an HTTP error status into FeedFetchError", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 404, statusText: "Not Found" })));
    const error = await fetchText(FEED_URL, { timeoutMs: 1000, headers: {} }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FeedFetchError);
    expect(error).toMatchObject({ message: "HTTP 404 Not Found", status: 404, url: FEED_URL });
  });

  it("wraps network errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    await expect(fetchText(FEED_URL, { timeoutMs: 1000, headers: {} })).rejects.toThrow(FeedFetchError);
  });
});


describe("toRawFeedItem", () => {
  it("reads Atom-style fields", () => {
    const result = toRawFeedItem({
      title: { _: "Atom entry", $: { type: "text" } },
      id: "tag:site.test,2024:1",
      summary: "Short",
      content: "<p>Long</p>",
      isoDate: "2024-05-01T10:00:00.000Z",
      creator: "Ada",
      categories: [{ $: { term: "News" } }],
    });
    expect(result).toEqual({
      ok: true,
      item: {
        title: "Atom entry",
        link: undefined,
        guid: "tag:site.test,2024:1",
        description: "Short",
        content: "<p>Long</p>",
        pubDate: "2024-05-01T10:00:00.000Z",
        author: "Ada",
        categories: ["News"],
      },
    });
  });

  it("rejects entries that are not objects", () => {
    expect(toRawFeedItem("just a string").ok).toBe(false);
  });

  it("reads text from the shapes xml2js produces", () => {
    expect(textOf(["first", "second"])).toBe("first");
    expect(textOf({ name: "Grace" })).toBe("Grace");
    expect(textOf("   ")).toBeUndefined();
    expect(textOf(42)).toBe("42");
  });
});
