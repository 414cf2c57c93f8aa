import { afterEach, describe, it, expect, vi } from "vitest";
import { attachLogTable, openDatabase, queryLogs } from "../src/db/index.js";
import { logger, setLogDbWriter } from "../src/logger/index.js";


describe("logger", () => {
  afterEach(() => {
    setLogDbWriter(null);
    vi.restoreAllMocks();
  });

  it("persists warn and error entries to the logs table", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const db = openDatabase();
    attachLogTable(db);
    logger.info("sync", "routine");
    logger.warn("fetcher", "feed fetch failed", { feed_url: "https://feeds.test/a.xml", status: 503 });
    const logs = queryLogs(db);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: "warn",
      category: "fetcher",
      message: "feed fetch failed",
      payload: '{"status":503}',
      feed_url: "https://feeds.test/a.xml",
    });
    expect(queryLogs(db, { level: "error" })).toEqual([]);
  });

  it("writes a tagged line to the console", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    logger.warn("janitor", "purge failed", { kind: "announcement" });
    expect(warn).toHaveBeenCalledWith('[janitor] purge failed {"kind":"announcement"}');
  });
});
