// Raw item extraction: validate one rss-parser entry with zod and map it onto RawFeedItem

import { z } from "zod";
import type { RawFeedItem } from "./types.js";


/** Text of a parser value: plain string, xml2js `{ _: text }`, or the first of an array */
export function textOf(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return textOf(value[0]);
  if (value != null && typeof value === "object") {
    if ("_" in value) return textOf(value._);
    if ("name" in value) return textOf(value.name);
  }
  return undefined;
}


/** Category entries: strings, `{ _: text }` with attributes, or Atom `{ $: { term } }` */
function categoriesOf(value: unknown): string[] {
  if (value == null) return [];
  const list = Array.isArray(value) ? value : [value];
  const out: string[] = [];
  for (const entry of list) {
    const direct = textOf(entry);
    if (direct) {
      out.push(direct);
      continue;
    }
    if (entry != null && typeof entry === "object" && "$" in entry) {
      const attrs = entry.$;
      if (attrs != null && typeof attrs === "object" && "term" in attrs) {
        const term = textOf(attrs.term);
        if (term) out.push(term);
      }
    }
  }
  return out;
}


const text = z.unknown().transform(textOf);


/** Fields read from one rss-parser item; anything else is ignored */
const parserItemSchema = z.object({
  title: text,
  link: text,
  guid: text,
  id: text,
  summary: text,
  content: text,
  "content:encoded": text,
  pubDate: text,
  isoDate: text,
  author: text,
  creator: text,
  "dc:creator": text,
  categories: z.unknown().transform(categoriesOf),
});


export type RawItemResult =
  | { ok: true; item: RawFeedItem }
  | { ok: false; reason: string };


/** Parse one entry of `feed.items` into a RawFeedItem */
export function toRawFeedItem(entry: unknown): RawItemResult {
  const parsed = parserItemSchema.safeParse(entry);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues[0]?.message ?? "invalid item" };
  }
  const p = parsed.data;
  const item: RawFeedItem = {
    title: p.title,
    link: p.link,
    // Atom entries carry their identity in <id>
    guid: p.guid ?? p.id,
    description: p.summary ?? p.content,
    content: p["content:encoded"] ?? p.content,
    pubDate: p.pubDate ?? p.isoDate,
    author: p.author ?? p.creator ?? p["dc:creator"],
    categories: p.categories,
  };
  return { ok: true, item };
}
