/**
 * Types for the metric records produced by the agent.
 *
 * These describe the canonical output unit (one Metrics 2.0 style record)
 * and the configured tasks that produce them.
 */

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Free-form string attributes attached to a record */
export type MetricTags = Readonly<Record<string, string>>;

/** A single measurement, ready for delivery */
export interface MetricRecord {
  /** Dotted metric name, e.g. "postgresql.database-size" */
  readonly key: string;
  readonly value: number;
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** Always carries `host`; per-database metrics also carry `database` */
  readonly tags: MetricTags;
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

/**
 * Where a metric is collected from:
 *  - "database": once per configured database
 *  - "cluster": once for the whole cluster (first configured database)
 */
export type MetricScope = "database" | "cluster";

/** A configured metric and its collection interval */
export interface MetricTask {
  /** Registered metric name, e.g. "get_stats_tx_rate_for_database" */
  readonly name: string;
  readonly scope: MetricScope;
  readonly intervalSeconds: number;
  /** Target databases; non-empty iff scope is "database" */
  readonly databases: readonly string[];
}
