// HTML helpers for feed bodies: plain-text excerpt and first image

import { parse } from "node-html-parser";


const BLOCK_TAG = /<(\/?)(p|div|br|li|ul|ol|h[1-6]|tr|td|blockquote|section|article|figure|figcaption|hr)\b/gi;


/** Markup stripped, entities decoded, whitespace collapsed */
export function stripMarkup(html: string): string {
  // block boundaries become word boundaries
  const root = parse(html.replace(BLOCK_TAG, " <$1$2"));
  for (const node of root.querySelectorAll("script, style")) node.remove();
  return root.text.replace(/\s+/g, " ").trim();
}


/** Cut to at most `max` code points, ending with an ellipsis when shortened; surrogate pairs stay whole */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, max - 1).join("").trimEnd()}…`;
}


export function isHttpUrl(value: string | undefined): value is string {
  if (!value) return false;
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}


/** src of the first <img> that is an absolute http(s) URL */
export function firstImageUrl(html: string): string | null {
  for (const img of parse(html).querySelectorAll("img")) {
    const src = img.getAttribute("src")?.trim();
    if (isHttpUrl(src)) return src;
  }
  return null;
}
