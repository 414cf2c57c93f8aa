// Runtime paths: everything the process writes lives under .paperfeed/

import { mkdir } from "node:fs/promises";
import { join } from "node:path";


/** User data root: .paperfeed/ (not versioned) */
export const USER_DIR = process.env.PAPERFEED_HOME ?? join(process.cwd(), ".paperfeed");


/** SQLite directory: .paperfeed/data/ */
export const DATA_DIR = join(USER_DIR, "data");


/** SQLite database file */
export const DB_PATH = join(DATA_DIR, "paperfeed.db");


/** Optional JSON config: .paperfeed/config.json */
export const CONFIG_PATH = join(USER_DIR, "config.json");


/** Create the user data directories */
export async function initUserDir(): Promise<void> {
  await mkdir(USER_DIR, { recursive: true });
  await mkdir(DATA_DIR, { recursive: true });
}
