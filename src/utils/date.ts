// Feed date parsing: ISO-8601 → epoch milliseconds → RFC-822 → fallback; never throws


/** Which rule produced the date */
export type DateSource = "iso" | "epoch" | "rfc822" | "fallback";


const ISO_8601 = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;
const EPOCH_MS = /^\d{1,15}$/;
const RFC_822 = /^(?:[A-Za-z]{3},?\s+)?\d{1,2}\s+[A-Za-z]{3}\s+\d{2,4}\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*([A-Za-z]{1,5}|[+-]\d{4}))?$/;


function valid(d: Date): Date | null {
  return Number.isNaN(d.getTime()) ? null : d;
}


/** Zone-less times are read as UTC */
function parseIso(s: string): Date | null {
  const m = ISO_8601.exec(s);
  if (!m) return null;
  const [, day, time, zone] = m;
  if (!time) return valid(new Date(`${day}T00:00:00Z`));
  return valid(new Date(`${day}T${time}${zone ?? "Z"}`));
}


function parseEpochMillis(s: string): Date | null {
  if (!EPOCH_MS.test(s)) return null;
  return valid(new Date(Number(s)));
}


/** Zone-less times, and zone names the runtime does not know (CEST, AEST), are read as UTC */
function parseRfc822(s: string): Date | null {
  const m = RFC_822.exec(s);
  if (!m) return null;
  const zone = m[1];
  if (!zone) return valid(new Date(`${s} GMT`));
  const zoned = valid(new Date(s));
  if (zoned || !/^[A-Za-z]+$/.test(zone)) return zoned;
  return valid(new Date(`${s.slice(0, -zone.length).trimEnd()} GMT`));
}


/** Parse a feed date string; unparseable or missing input yields `fallback` */
export function parseFeedDate(input: string | undefined, fallback: Date): { date: Date; source: DateSource } {
  const s = input?.trim();
  if (s) {
    const iso = parseIso(s);
    if (iso) return { date: iso, source: "iso" };
    const epoch = parseEpochMillis(s);
    if (epoch) return { date: epoch, source: "epoch" };
    const rfc = parseRfc822(s);
    if (rfc) return { date: rfc, source: "rfc822" };
  }
  return { date: fallback, source: "fallback" };
}
