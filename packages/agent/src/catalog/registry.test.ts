import { describe, it, expect } from "vitest";
import { SetupFailure } from "../errors.js";
import { gauge } from "../formatters/gauge.js";
import { defineMetric } from "./definition.js";
import { createDefaultRegistry } from "./postgres-metrics.js";
import { MetricRegistry, buildTasks, createTargets } from "./registry.js";

const metric = (name: string) =>
  defineMetric({
    name,
    description: name,
    source: { fetch: async () => 1 },
    format: gauge((raw: number) => [{ what: name, value: raw, unit: "u" }]),
  });

describe("MetricRegistry", () => {
  it("looks definitions up by name", () => {
    const registry = new MetricRegistry([metric("a"), metric("b")]);
    expect(registry.get("a")?.name).toBe("a");
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.names()).toEqual(["a", "b"]);
  });

  it("refuses duplicate names", () => {
    expect(() => new MetricRegistry([metric("a"), metric("a")])).toThrow("metric already registered: a");
  });
});

describe("buildTasks", () => {
  const registry = new MetricRegistry([metric("per_db"), metric("other_db"), metric("cluster")]);

  it("puts cluster tasks first and keeps configured order", () => {
    const tasks = buildTasks(
      {
        dbFunctions: [["other_db", 180], ["per_db", 60]],
        globalDbFunctions: [["cluster", 30]],
        databases: ["app", "audit"],
      },
      registry,
    );

    expect(tasks).toEqual([
      { name: "cluster", scope: "cluster", intervalSeconds: 30, databases: [] },
      { name: "other_db", scope: "database", intervalSeconds: 180, databases: ["app", "audit"] },
      { name: "per_db", scope: "database", intervalSeconds: 60, databases: ["app", "audit"] },
    ]);
  });

  it("rejects unknown metric names", () => {
    const build = () =>
      buildTasks({ dbFunctions: [["nope", 60]], globalDbFunctions: [], databases: ["app"] }, registry);
    expect(build).toThrow(SetupFailure);
    expect(build).toThrow("metric function 'nope' not found (configured under db_functions)");
  });

  it("rejects an empty database list", () => {
    expect(() => buildTasks({ dbFunctions: [], globalDbFunctions: [], databases: [] }, registry)).toThrow(
      "no target databases defined in configuration",
    );
  });

  it("rejects non-positive intervals", () => {
    expect(() =>
      buildTasks({ dbFunctions: [], globalDbFunctions: [["cluster", 0]], databases: ["app"] }, registry),
    ).toThrow("metric function 'cluster' has an invalid interval: 0");
  });
});

describe("createTargets", () => {
  it("expands per-database tasks and binds cluster tasks to the given database", () => {
    const registry = new MetricRegistry([metric("per_db"), metric("cluster")]);
    const tasks = buildTasks(
      { dbFunctions: [["per_db", 60]], globalDbFunctions: [["cluster", 60]], databases: ["app", "audit"] },
      registry,
    );

    const targets = createTargets(tasks, registry, "app");

    expect(targets.map((t) => [t.task.name, t.database])).toEqual([
      ["cluster", null],
      ["per_db", "app"],
      ["per_db", "audit"],
    ]);
    expect(targets.every((t) => t.nextDueAt === null && t.lastRunAt === null)).toBe(true);
  });
});

describe("createDefaultRegistry", () => {
  it("knows every metric the default configuration names", () => {
    const registry = createDefaultRegistry();
    expect(registry.names()).toEqual([
      "get_stats_disk_usage_for_database",
      "get_stats_tx_rate_for_database",
      "get_stats_seconds_since_last_vacuum_per_table",
      "get_stats_oldest_transaction_timestamp",
      "get_stats_index_hit_rates",
      "get_stats_table_bloat",
      "get_stats_incoming_replication_status",
      "get_stats_client_connections",
      "get_stats_lock_statistics",
      "get_stats_heap_hit_statistics",
      "get_stats_replication_delays",
      "get_stats_wal_file_amount",
      "get_xid_remaining_ratio",
      "get_multixact_remaining_ratio",
      "get_multixact_members_per_mxid",
      "get_multixact_members_remaining_ratio",
    ]);
  });
});
