import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TaskFetchFailure } from "../errors.js";
import { offlineResources } from "../test/fixtures.js";
import { countWalFiles, walDirectory, walFileAmount } from "./wal-files.js";

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), "pg-metrics-wal-"));
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

const fetchContext = (resources = offlineResources()) => ({
  database: "app",
  signal: new AbortController().signal,
  resources,
});

describe("walDirectory", () => {
  it("uses pg_wal from Postgres 10 on", () => {
    expect(walDirectory("/data", 100_000)).toBe(join("/data", "pg_wal"));
    expect(walDirectory("/data", 90_624)).toBe(join("/data", "pg_xlog"));
  });
});

describe("walFileAmount", () => {
  it("counts only WAL segment names", async () => {
    const wal = join(dataDir, "pg_wal");
    await mkdir(join(wal, "archive_status"), { recursive: true });
    await writeFile(join(wal, "000000010000000000000001"), "");
    await writeFile(join(wal, "000000010000000000000002"), "");
    await writeFile(join(wal, "000000010000000000000002.partial"), "");
    await writeFile(join(wal, "00000002.history"), "");

    expect(await countWalFiles(wal)).toBe(2);
    expect(await walFileAmount.fetch(fetchContext(offlineResources({ dataDir, serverVersion: 160_000 })))).toBe(2);
  });

  it("fails without a data directory", async () => {
    await expect(walFileAmount.fetch(fetchContext())).rejects.toThrow(TaskFetchFailure);
  });

  it("fails when the WAL directory cannot be read", async () => {
    await expect(
      walFileAmount.fetch(fetchContext(offlineResources({ dataDir, serverVersion: 90_600 }))),
    ).rejects.toThrow(`failed reading WAL directory ${join(dataDir, "pg_xlog")}`);
  });
});
