// RefreshInterval: interval names accepted in config and their length in ms


/** Named sync intervals */
export type RefreshInterval = "10min" | "30min" | "1h" | "4h" | "6h" | "12h" | "1day" | "3day" | "7day";


/** Valid interval values (runtime validation) */
export const VALID_INTERVALS = ["10min", "30min", "1h", "4h", "6h", "12h", "1day", "3day", "7day"] as const satisfies readonly RefreshInterval[];


/** Convert a RefreshInterval into milliseconds */
export function refreshIntervalToMs(interval: RefreshInterval): number {
  const map: Record<RefreshInterval, number> = {
    "10min": 10 * 60 * 1000,
    "30min": 30 * 60 * 1000,
    "1h": 60 * 60 * 1000,
    "4h": 4 * 60 * 60 * 1000,
    "6h": 6 * 60 * 60 * 1000,
    "12h": 12 * 60 * 60 * 1000,
    "1day": 24 * 60 * 60 * 1000,
    "3day": 3 * 24 * 60 * 60 * 1000,
    "7day": 7 * 24 * 60 * 60 * 1000,
  };
  return map[interval];
}


export const DAY_MS = 24 * 60 * 60 * 1000;
