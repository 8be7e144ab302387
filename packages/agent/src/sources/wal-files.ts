/**
 * WAL segment count from the local data directory.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { TaskFetchFailure } from "../errors.js";
import type { StatSource } from "./types.js";

/** Each WAL segment is named as a 24-character hexadecimal number */
const WAL_SEGMENT_RE = /^[0-9A-F]{24}$/;

/** pg_xlog was renamed pg_wal in Postgres 10 */
export function walDirectory(dataDir: string, serverVersion: number): string {
  return join(dataDir, serverVersion >= 100_000 ? "pg_wal" : "pg_xlog");
}

export async function countWalFiles(walDir: string): Promise<number> {
  const names = await readdir(walDir);
  return names.filter((name) => WAL_SEGMENT_RE.test(name)).length;
}

export const walFileAmount: StatSource<number> = {
  async fetch({ resources }) {
    if (!resources.dataDir) {
      throw new TaskFetchFailure("postgres data directory is not available on this host");
    }
    const walDir = walDirectory(resources.dataDir, resources.serverVersion);
    try {
      return await countWalFiles(walDir);
    } catch (err) {
      throw new TaskFetchFailure(`failed reading WAL directory ${walDir}`, { cause: err });
    }
  },
};
