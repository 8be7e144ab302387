import { describe, it, expect } from "vitest";
import { mergeConfigs } from "./merge.js";

describe("mergeConfigs", () => {
  it("merges objects key by key with the overriding side winning", () => {
    const merged = mergeConfigs(
      { postgres: { user: "metrics", port: 5433 }, ffwd: { port: 19001 } },
      { postgres: { host: "127.0.0.1", port: 5432 }, ffwd: { host: "127.0.0.1", port: 19000 }, log: { log_level: "info" } },
    );
    expect(merged).toEqual({
      postgres: { user: "metrics", port: 5433, host: "127.0.0.1" },
      ffwd: { port: 19001, host: "127.0.0.1" },
      log: { log_level: "info" },
    });
  });

  it("keeps overriding function entries and adds the defaults they do not name", () => {
    const merged = mergeConfigs(
      [
        ["get_stats_disk_usage_for_database", 180],
        ["get_stats_tx_rate_for_database", 500],
      ],
      [
        ["get_stats_seconds_since_last_vacuum_per_table", 60],
        ["get_stats_tx_rate_for_database", 60],
      ],
    );
    expect(merged).toEqual([
      ["get_stats_disk_usage_for_database", 180],
      ["get_stats_tx_rate_for_database", 500],
      ["get_stats_seconds_since_last_vacuum_per_table", 60],
    ]);
  });

  it("lets scalars and null override defaults", () => {
    expect(mergeConfigs({ data_dir: null }, { data_dir: "/srv/pg" })).toEqual({ data_dir: null });
    expect(mergeConfigs("debug", "info")).toBe("debug");
  });

  it("does not modify its inputs", () => {
    const overrides = { db_functions: [["a", 1]] };
    const defaults = { db_functions: [["b", 2]] };
    mergeConfigs(overrides, defaults);
    expect(overrides).toEqual({ db_functions: [["a", 1]] });
    expect(defaults).toEqual({ db_functions: [["b", 2]] });
  });
});
