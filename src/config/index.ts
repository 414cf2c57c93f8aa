// App config: .paperfeed/config.json merged over defaults, env vars on top, validated with zod

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CONFIG_PATH } from "./paths.js";
import { VALID_INTERVALS } from "../utils/refreshInterval.js";
import type { SourceKind } from "../types/contentRecord.js";


const feedSchema = (url: string, syncInterval: (typeof VALID_INTERVALS)[number]) =>
  z.object({
    url: z.string().url().default(url),
    syncInterval: z.enum(VALID_INTERVALS).default(syncInterval),
  }).default({});


export const configSchema = z.object({
  feeds: z.object({
    announcement: feedSchema("https://example.com/feeds/announcements.xml", "4h"),
    blog_post: feedSchema("https://example.com/feeds/posts.xml", "1day"),
  }).default({}),
  /** Rows whose fetchedAt is older than this are purged */
  retentionDays: z.number().positive().default(30),
  /** Size of the rotating preview */
  previewLimit: z.number().int().positive().default(3),
  /** Max summary characters */
  summaryLength: z.number().int().positive().default(300),
  fetchTimeoutMs: z.number().int().positive().default(15_000),
  notifications: z.object({
    newContent: z.boolean().default(true),
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().nonnegative().default(30_000),
  }).default({}),
  port: z.number().int().positive().default(3751),
});


export type AppConfig = z.infer<typeof configSchema>;


export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}


type Env = Record<string, string | undefined>;


function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}


function child(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = parent[key];
  const next = isRecord(existing) ? { ...existing } : {};
  parent[key] = next;
  return next;
}


/** Write env overrides into the raw (pre-validation) config object */
function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out = { ...raw };
  const feedUrls: Array<[SourceKind, string | undefined]> = [
    ["announcement", env.ANNOUNCEMENTS_FEED_URL],
    ["blog_post", env.BLOG_POSTS_FEED_URL],
  ];
  for (const [kind, url] of feedUrls) {
    if (url) child(child(out, "feeds"), kind).url = url;
  }
  if (env.RETENTION_DAYS) out.retentionDays = Number(env.RETENTION_DAYS);
  if (env.PORT) out.port = Number(env.PORT);
  if (env.NOTIFY_NEW_CONTENT === "0" || env.NOTIFY_NEW_CONTENT === "false") child(out, "notifications").newContent = false;
  if (env.NOTIFY_NEW_CONTENT === "1" || env.NOTIFY_NEW_CONTENT === "true") child(out, "notifications").newContent = true;
  return out;
}


/** Validate a raw config object (file contents) plus env overrides */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  const base = isRecord(raw) ? raw : {};
  const result = configSchema.safeParse(applyEnv(base, env));
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid config: ${detail}`);
  }
  return result.data;
}


/** Read .paperfeed/config.json (missing file means defaults) and validate */
export async function loadConfig(path = CONFIG_PATH, env: Env = process.env): Promise<AppConfig> {
  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw new ConfigError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return parseConfig(raw, env);
}
