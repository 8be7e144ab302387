import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { silentLogger } from "../test/fixtures.js";
import { majorVersion, resolveDataDir } from "./data-dir.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "pg-metrics-data-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("majorVersion", () => {
  it("formats pre-10 and 10+ version numbers", () => {
    expect(majorVersion(160_002)).toBe("16");
    expect(majorVersion(100_023)).toBe("10");
    expect(majorVersion(90_605)).toBe("9.6");
  });
});

describe("resolveDataDir", () => {
  it("prefers the configured path", async () => {
    expect(await resolveDataDir(dir, 160_000, silentLogger, { PGDATA: "/nonexistent" })).toBe(dir);
  });

  it("falls back to PGDATA", async () => {
    expect(await resolveDataDir(null, 160_000, silentLogger, { PGDATA: dir })).toBe(dir);
  });

  it("resolves to null when the path is not a directory", async () => {
    const file = join(dir, "postgresql.conf");
    await writeFile(file, "");
    expect(await resolveDataDir(file, 160_000, silentLogger, {})).toBeNull();
    expect(await resolveDataDir(join(dir, "missing"), 160_000, silentLogger, {})).toBeNull();
  });
});
