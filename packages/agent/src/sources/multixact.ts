/**
 * Multixact member space usage, estimated from the SLRU segment files under
 * `pg_multixact/members` in the local data directory.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { TaskFetchFailure } from "../errors.js";
import { maxMultixactAge } from "./postgres-queries.js";
import type { StatSource } from "./types.js";

/** 32 pages of 1636 members per 256 kB segment (8 kB blocks) */
export const MEMBERS_PER_SEGMENT = 32 * 1636;

/** Member offsets are 32-bit; the space wraps after 2^32 members */
export const MEMBER_SPACE = 2 ** 32;

const SEGMENT_RE = /^[0-9A-F]{4,}$/;

export interface MultixactMembers {
  /** Approximate members in use */
  members: number;
  /** Age of the oldest multixact id, or null if none are in use */
  mxidAge: number | null;
}

export async function countMemberSegments(dataDir: string): Promise<number> {
  const names = await readdir(join(dataDir, "pg_multixact", "members"));
  return names.filter((name) => SEGMENT_RE.test(name)).length;
}

export const multixactMembers: StatSource<MultixactMembers> = {
  async fetch(ctx) {
    const { dataDir } = ctx.resources;
    if (!dataDir) {
      throw new TaskFetchFailure("postgres data directory is not available on this host");
    }
    let segments: number;
    try {
      segments = await countMemberSegments(dataDir);
    } catch (err) {
      throw new TaskFetchFailure(`failed reading multixact members in ${dataDir}`, { cause: err });
    }
    const mxidAge = await maxMultixactAge.fetch(ctx);
    return { members: segments * MEMBERS_PER_SEGMENT, mxidAge };
  },
};
