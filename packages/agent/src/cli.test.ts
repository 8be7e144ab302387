import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { USAGE, runCli } from "./cli.js";
import { silentLogger } from "./test/fixtures.js";

function capture() {
  let text = "";
  const stdout = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString("utf8");
      callback();
    },
  });
  return { stdout, output: () => text };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "pg-metrics-cli-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("runCli", () => {
  it("prints usage for help", async () => {
    const { stdout, output } = capture();
    expect(await runCli(["help"], { stdout, env: {}, logger: silentLogger })).toBe(0);
    expect(output()).toBe(USAGE);
  });

  it("prints usage without a command", async () => {
    const { stdout, output } = capture();
    expect(await runCli([], { stdout, env: {}, logger: silentLogger })).toBe(0);
    expect(output()).toBe(USAGE);
  });

  it("rejects unknown commands", async () => {
    const { stdout, output } = capture();
    expect(await runCli(["collect"], { stdout, env: {}, logger: silentLogger })).toBe(1);
    expect(output()).toBe(`Unknown command: collect\n\n${USAGE}`);
  });

  it("rejects unknown options", async () => {
    const { stdout } = capture();
    expect(await runCli(["all", "--verbose"], { stdout, env: {}, logger: silentLogger })).toBe(1);
  });

  it("exits 1 when the configuration is missing", async () => {
    const { stdout, output } = capture();
    const code = await runCli(["all", "-c", join(dir, "missing.yml")], { stdout, env: {}, logger: silentLogger });
    expect(code).toBe(1);
    expect(output()).toBe("");
  });

  it("exits 1 when a configured metric is unknown", async () => {
    const config = join(dir, "agent.yml");
    await writeFile(
      config,
      `postgres:\n  user: metrics\n  databases: [app]\ndb_functions:\n  - ["get_stats_made_up", 60]\n`,
    );
    const { stdout } = capture();
    expect(await runCli(["long-running", "--config", config], { stdout, env: {}, logger: silentLogger })).toBe(1);
  });

  it("rejects a negative warm-up", async () => {
    const { stdout } = capture();
    expect(await runCli(["all", "--warmup=-1"], { stdout, env: {}, logger: silentLogger })).toBe(1);
  });
});
