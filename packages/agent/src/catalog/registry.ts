/**
 * Metric registry and task building.
 *
 * Configuration names metrics by string; every name is resolved here once
 * at startup, so an unknown name is a SetupFailure rather than a failure in
 * the middle of the polling loop.
 */

import type { MetricScope, MetricTask } from "@pg-metrics/shared";
import { SetupFailure } from "../errors.js";
import type { TaskTarget } from "../scheduler/target.js";
import type { MetricDefinition } from "./definition.js";

/** `[metric name, interval in seconds]` as written in configuration */
export type FunctionEntry = readonly [name: string, intervalSeconds: number];

export interface TaskConfig {
  /** Run once per configured database */
  dbFunctions: readonly FunctionEntry[];
  /** Run once for the cluster, against the first database */
  globalDbFunctions: readonly FunctionEntry[];
  databases: readonly string[];
}

export class MetricRegistry {
  private definitions = new Map<string, MetricDefinition>();

  constructor(definitions: Iterable<MetricDefinition> = []) {
    for (const def of definitions) this.register(def);
  }

  register(definition: MetricDefinition): void {
    if (this.definitions.has(definition.name)) {
      throw new Error(`metric already registered: ${definition.name}`);
    }
    this.definitions.set(definition.name, definition);
  }

  get(name: string): MetricDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}

/**
 * Build MetricTasks from configuration: cluster-wide tasks first, then
 * per-database tasks, each list in its configured order.
 */
export function buildTasks(config: TaskConfig, registry: MetricRegistry): MetricTask[] {
  if (config.databases.length === 0) {
    throw new SetupFailure("no target databases defined in configuration");
  }

  const toTask = (key: string, scope: MetricScope) => ([name, intervalSeconds]: FunctionEntry): MetricTask => {
    if (!registry.get(name)) {
      throw new SetupFailure(`metric function '${name}' not found (configured under ${key})`);
    }
    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
      throw new SetupFailure(`metric function '${name}' has an invalid interval: ${intervalSeconds}`);
    }
    return Object.freeze({
      name,
      scope,
      intervalSeconds,
      databases: scope === "database" ? Object.freeze([...config.databases]) : Object.freeze([]),
    });
  };

  return [
    ...config.globalDbFunctions.map(toTask("global_db_functions", "cluster")),
    ...config.dbFunctions.map(toTask("db_functions", "database")),
  ];
}

/**
 * Expand tasks into scheduler targets: one per database for per-database
 * tasks, one for cluster tasks (connected to `clusterDatabase`).
 */
export function createTargets(
  tasks: readonly MetricTask[],
  registry: MetricRegistry,
  clusterDatabase: string,
): TaskTarget[] {
  return tasks.flatMap((task) => {
    const definition = registry.get(task.name);
    if (!definition) {
      throw new SetupFailure(`metric function '${task.name}' not found`);
    }
    if (task.scope === "cluster") {
      return [definition.createTarget({ task, database: null, connectDatabase: clusterDatabase })];
    }
    return task.databases.map((database) =>
      definition.createTarget({ task, database, connectDatabase: database }),
    );
  });
}
