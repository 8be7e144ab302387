/**
 * Built-in metric catalogue. Names match the configuration keys the
 * default config file uses.
 */

import { gauge } from "../formatters/gauge.js";
import { rate } from "../formatters/rate.js";
import type { MetricPoint } from "../formatters/record.js";
import {
  XID_WRAPAROUND_LIMIT,
  clientConnections,
  databaseSize,
  heapBlocks,
  incomingReplication,
  indexUsage,
  lockCounts,
  maxMultixactAge,
  maxXidAge,
  oldestTransactionAge,
  replicationDelays,
  secondsSinceLastVacuum,
  tableBloat,
  transactionCounters,
  type HeapBlocks,
  type IncomingReplication,
  type IndexUsage,
  type LockCount,
  type ReplicationDelay,
  type TableValue,
  type TransactionCounters,
} from "../sources/postgres-queries.js";
import {
  MEMBER_SPACE,
  multixactMembers,
  type MultixactMembers,
} from "../sources/multixact.js";
import { walFileAmount } from "../sources/wal-files.js";
import { defineMetric, type MetricDefinition } from "./definition.js";
import { MetricRegistry } from "./registry.js";

// ---------------------------------------------------------------------------
// Point mappers (pure, exported for tests)
// ---------------------------------------------------------------------------

export function transactionPoints(raw: TransactionCounters | null): MetricPoint[] {
  if (!raw) return [];
  return [
    { what: "transaction-rate", value: raw.transactions, unit: "transaction", tags: { type: "transactions" } },
    { what: "transaction-rollbacks", value: raw.rollbacks, unit: "transaction", tags: { type: "transactions" } },
  ];
}

export function heapBlockPoints(raw: HeapBlocks | null): MetricPoint[] {
  if (!raw) return [];
  return [
    { what: "blocks-read-from-disk", value: raw.read, unit: "blocks", tags: { type: "heap-reads" } },
    { what: "blocks-read-from-buffer", value: raw.hit, unit: "blocks", tags: { type: "heap-reads" } },
  ];
}

/** Share of heap blocks served from the buffer cache during the last interval */
export function heapHitRatio(rates: ReadonlyMap<string, number>): MetricPoint[] {
  const read = rates.get("blocks-read-from-disk{type=heap-reads}");
  const hit = rates.get("blocks-read-from-buffer{type=heap-reads}");
  if (read === undefined || hit === undefined) return [];
  const total = hit + read;
  const ratio = hit === 0 || total === 0 ? 0 : hit / total;
  return [{ what: "blocks-heap-hit-ratio", value: ratio, unit: "buffer_hit%" }];
}

export function indexHitPoints(rows: IndexUsage[]): MetricPoint[] {
  const points: MetricPoint[] = [];
  for (const { table, indexScans, seqScans } of rows) {
    if (indexScans === null || seqScans === null) continue;
    const ratio = indexScans === 0 ? 0 : indexScans / (indexScans + seqScans);
    points.push({ what: "index-hit", value: ratio, unit: "index_hit%", tags: { table } });
  }
  return points;
}

/** Granted and waiting lock counts per lock type, then totals */
export function lockPoints(rows: LockCount[]): MetricPoint[] {
  const byType = new Map<string, { waiting: number; granted: number }>();
  const total = { waiting: 0, granted: 0 };
  for (const { locktype, granted, count } of rows) {
    let entry = byType.get(locktype);
    if (!entry) {
      entry = { waiting: 0, granted: 0 };
      byType.set(locktype, entry);
    }
    if (granted) {
      entry.granted += count;
      total.granted += count;
    } else {
      entry.waiting += count;
      total.waiting += count;
    }
  }

  const points: MetricPoint[] = [];
  const push = (locktype: string, counts: { waiting: number; granted: number }) => {
    points.push(
      { what: "locks_granted", value: counts.granted, unit: "lock", tags: { type: "locks", locktype } },
      { what: "locks_waiting", value: counts.waiting, unit: "lock", tags: { type: "locks", locktype } },
    );
  };
  for (const [locktype, counts] of byType) push(locktype, counts);
  push("total", total);
  return points;
}

/** Percentage of the id space left before wraparound protection kicks in */
export function remainingPercent(age: number | null): number | null {
  if (age === null) return null;
  return Math.max(0, (1 - age / XID_WRAPAROUND_LIMIT) * 100);
}

export function membersPerMxid({ members, mxidAge }: MultixactMembers): MetricPoint[] {
  if (mxidAge === null) return [];
  const value = mxidAge === 0 ? 0 : members / mxidAge;
  return [{ what: "multixact-members-per-mxid", value, unit: "members/id" }];
}

export function membersRemaining({ members }: MultixactMembers): MetricPoint[] {
  const value = Math.max(0, (1 - members / MEMBER_SPACE) * 100);
  return [{ what: "multixact-members-remaining", value, unit: "%" }];
}

const single = (what: string, unit: string) => (value: number | null): MetricPoint[] =>
  value === null ? [] : [{ what, value, unit }];

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const postgresMetrics: MetricDefinition[] = [
  // per database
  defineMetric({
    name: "get_stats_disk_usage_for_database",
    description: "Size of the database on disk",
    source: databaseSize,
    format: gauge(single("database-size", "B")),
  }),
  defineMetric({
    name: "get_stats_tx_rate_for_database",
    description: "Transactions and rollbacks per second",
    source: transactionCounters,
    format: rate({ counters: transactionPoints }),
  }),
  defineMetric({
    name: "get_stats_seconds_since_last_vacuum_per_table",
    description: "Seconds since each table was last vacuumed",
    source: secondsSinceLastVacuum,
    format: gauge((rows: TableValue[]) =>
      rows.flatMap(({ table, value }) =>
        value === null ? [] : [{ what: "last-vacuum", value, unit: "s", tags: { table } }],
      ),
    ),
  }),
  defineMetric({
    name: "get_stats_oldest_transaction_timestamp",
    description: "Age of the oldest open transaction",
    source: oldestTransactionAge,
    format: gauge(single("sec-since-oldest-xact-start", "s")),
  }),
  defineMetric({
    name: "get_stats_index_hit_rates",
    description: "Share of index scans per table",
    source: indexUsage,
    format: gauge(indexHitPoints),
  }),
  defineMetric({
    name: "get_stats_table_bloat",
    description: "Dead tuple ratio per table (pgstattuple)",
    source: tableBloat,
    format: gauge((rows: TableValue[]) =>
      rows.flatMap(({ table, value }) =>
        value === null ? [] : [{ what: "table-bloat", value: value / 100, unit: "bloat%", tags: { table } }],
      ),
    ),
  }),
  defineMetric({
    name: "get_stats_incoming_replication_status",
    description: "Whether the WAL receiver is streaming from its upstream",
    source: incomingReplication,
    format: gauge((rows: IncomingReplication[]) =>
      rows.map(({ upstream, running }) => ({
        what: "incoming-replication-running",
        value: running,
        unit: "msg",
        tags: { master: upstream },
      })),
    ),
  }),

  // cluster wide
  defineMetric({
    name: "get_stats_client_connections",
    description: "Open client connections",
    source: clientConnections,
    format: gauge(single("client-connections", "connection")),
  }),
  defineMetric({
    name: "get_stats_lock_statistics",
    description: "Granted and waiting locks per lock type",
    source: lockCounts,
    format: gauge(lockPoints),
  }),
  defineMetric({
    name: "get_stats_heap_hit_statistics",
    description: "Heap blocks read from disk and buffer per second, and the hit ratio",
    source: heapBlocks,
    format: rate({ counters: heapBlockPoints, derive: heapHitRatio }),
  }),
  defineMetric({
    name: "get_stats_replication_delays",
    description: "Replication lag per replica in bytes",
    source: replicationDelays,
    format: gauge((rows: ReplicationDelay[]) =>
      rows.map(({ client, bytes }) => ({
        what: "replication-delay-bytes",
        value: bytes,
        unit: "B",
        tags: { slave: client },
      })),
    ),
  }),
  defineMetric({
    name: "get_stats_wal_file_amount",
    description: "WAL segments in the data directory",
    source: walFileAmount,
    format: gauge(single("wal-file-amount", "file")),
  }),
  defineMetric({
    name: "get_xid_remaining_ratio",
    description: "Transaction ids left before wraparound",
    source: maxXidAge,
    format: gauge((age: number | null) => single("xid-remaining", "%")(remainingPercent(age))),
  }),
  defineMetric({
    name: "get_multixact_remaining_ratio",
    description: "Multixact ids left before wraparound",
    source: maxMultixactAge,
    format: gauge((age: number | null) => single("mxid-remaining", "%")(remainingPercent(age))),
  }),
  defineMetric({
    name: "get_multixact_members_per_mxid",
    description: "Average multixact members per multixact id in use",
    source: multixactMembers,
    format: gauge(membersPerMxid),
  }),
  defineMetric({
    name: "get_multixact_members_remaining_ratio",
    description: "Multixact member space left before wraparound",
    source: multixactMembers,
    format: gauge(membersRemaining),
  }),
];

/** Registry holding the built-in catalogue */
export function createDefaultRegistry(): MetricRegistry {
  return new MetricRegistry(postgresMetrics);
}
