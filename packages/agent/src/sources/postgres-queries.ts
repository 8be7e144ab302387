/**
 * SQL stat sources.
 *
 * Each source queries the target database and returns the rows in a
 * typed, formatter-friendly shape. Numeric columns are cast to
 * int or float8 in SQL so postgres.js hands back JS numbers.
 */

import { TaskFetchFailure, errorMessage } from "../errors.js";
import { cancelOnAbort } from "./deadline.js";
import type { FetchContext, StatSource } from "./types.js";

// ---------------------------------------------------------------------------
// Raw result shapes
// ---------------------------------------------------------------------------

export interface TransactionCounters {
  /** Commits plus rollbacks since statistics reset */
  transactions: number;
  rollbacks: number;
}

export interface TableValue {
  table: string;
  value: number | null;
}

export interface IndexUsage {
  table: string;
  indexScans: number | null;
  seqScans: number | null;
}

export interface LockCount {
  locktype: string;
  granted: boolean;
  count: number;
}

export interface HeapBlocks {
  read: number;
  hit: number;
}

export interface ReplicationDelay {
  client: string;
  bytes: number;
}

export interface IncomingReplication {
  upstream: string;
  running: number;
}

/** Postgres refuses new transaction ids well before 2^31 are consumed */
export const XID_WRAPAROUND_LIMIT = 2 ** 31;

function sqlFor({ resources, database }: FetchContext) {
  return resources.sql(database);
}

// ---------------------------------------------------------------------------
// Per-database sources
// ---------------------------------------------------------------------------

export const databaseSize: StatSource<number | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ bytes: number }[]>`
        SELECT pg_database_size(datname)::float8 AS bytes
        FROM pg_database WHERE datname = current_database()
      `,
      ctx.signal,
    );
    return row?.bytes ?? null;
  },
};

export const transactionCounters: StatSource<TransactionCounters | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ transactions: number | null; rollbacks: number | null }[]>`
        SELECT (xact_commit + xact_rollback)::float8 AS transactions,
               xact_rollback::float8 AS rollbacks
        FROM pg_stat_database WHERE datname = current_database()
      `,
      ctx.signal,
    );
    if (!row || row.transactions === null || row.rollbacks === null) return null;
    return { transactions: row.transactions, rollbacks: row.rollbacks };
  },
};

/** Seconds since the last manual or automatic vacuum; 0 if never vacuumed */
export const secondsSinceLastVacuum: StatSource<TableValue[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const rows = await cancelOnAbort(
      sql<{ table: string; value: number }[]>`
        SELECT relname AS table,
               floor(COALESCE(
                 EXTRACT(EPOCH FROM now() - GREATEST(last_vacuum, last_autovacuum)), 0
               ))::float8 AS value
        FROM pg_stat_user_tables
      `,
      ctx.signal,
    );
    return rows.map((r) => ({ table: r.table, value: r.value }));
  },
};

export const oldestTransactionAge: StatSource<number | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ seconds: number }[]>`
        SELECT floor(EXTRACT(EPOCH FROM now() - xact_start))::float8 AS seconds
        FROM pg_stat_activity
        WHERE xact_start IS NOT NULL AND datname = current_database()
        ORDER BY xact_start ASC LIMIT 1
      `,
      ctx.signal,
    );
    return row?.seconds ?? null;
  },
};

export const indexUsage: StatSource<IndexUsage[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const rows = await cancelOnAbort(
      sql<{ table: string; index_scans: number | null; seq_scans: number | null }[]>`
        SELECT relname AS table,
               idx_scan::float8 AS index_scans,
               seq_scan::float8 AS seq_scans
        FROM pg_stat_user_tables
      `,
      ctx.signal,
    );
    return rows.map((r) => ({ table: r.table, indexScans: r.index_scans, seqScans: r.seq_scans }));
  },
};

/**
 * Dead tuple percentage per table, via the pgstattuple wrapper prepare-db
 * installs. Each table is scanned on its own; a table that cannot be
 * scanned (dropped since it was listed, locked out) is logged and skipped.
 */
export const tableBloat: StatSource<TableValue[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const tables = await cancelOnAbort(
      sql<{ table: string; oid: number }[]>`
        SELECT relname AS table, oid::int8::float8 AS oid
        FROM pg_class
        WHERE relkind = 'r'
          AND relname NOT LIKE 'pg_%'
          AND relname NOT LIKE 'sql_%'
      `,
      ctx.signal,
    );

    const result: TableValue[] = [];
    for (const { table, oid } of tables) {
      try {
        const [row] = await cancelOnAbort(
          sql<{ value: number | null }[]>`
            SELECT dead_tuple_percent::float8 AS value FROM pgstattuple_for_table_oid(${oid}::bigint)
          `,
          ctx.signal,
        );
        if (row) result.push({ table, value: row.value });
      } catch (err) {
        if (ctx.signal.aborted) throw err;
        ctx.resources.logger.warn(
          { database: ctx.database, table, err: errorMessage(err) },
          "skipping table bloat for table",
        );
      }
    }
    return result;
  },
};

const CONNINFO_HOST_RE = /(?:^|\s)host=(\S+)/;

export const incomingReplication: StatSource<IncomingReplication[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const rows = await cancelOnAbort(
      sql<{ conninfo: string | null; running: number }[]>`
        SELECT conninfo,
               (CASE WHEN status = 'streaming' THEN 1 ELSE 0 END)::int AS running
        FROM public.stat_incoming_replication
      `,
      ctx.signal,
    );
    return rows.map((r) => ({
      upstream: CONNINFO_HOST_RE.exec(r.conninfo ?? "")?.[1] ?? "UNKNOWN",
      running: r.running,
    }));
  },
};

// ---------------------------------------------------------------------------
// Cluster-wide sources
// ---------------------------------------------------------------------------

export const clientConnections: StatSource<number | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ count: number }[]>`SELECT count(*)::int AS count FROM pg_stat_activity`,
      ctx.signal,
    );
    return row?.count ?? null;
  },
};

export const lockCounts: StatSource<LockCount[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const rows = await cancelOnAbort(
      sql<{ locktype: string; granted: boolean; count: number }[]>`
        SELECT locktype, granted, count(*)::int AS count
        FROM pg_locks GROUP BY locktype, granted
      `,
      ctx.signal,
    );
    return rows.map((r) => ({ locktype: r.locktype, granted: r.granted, count: r.count }));
  },
};

export const heapBlocks: StatSource<HeapBlocks | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ read: number | null; hit: number | null }[]>`
        SELECT sum(heap_blks_read)::float8 AS read, sum(heap_blks_hit)::float8 AS hit
        FROM pg_statio_user_tables
      `,
      ctx.signal,
    );
    if (!row || row.read === null || row.hit === null) return null;
    return { read: row.read, hit: row.hit };
  },
};

/**
 * Bytes each replica lags behind. On a standby the local receive position
 * is used instead, which covers cascading replication.
 */
export const replicationDelays: StatSource<ReplicationDelay[]> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [recovery] = await cancelOnAbort(
      sql<{ in_recovery: boolean }[]>`SELECT pg_is_in_recovery() AS in_recovery`,
      ctx.signal,
    );

    const current = recovery?.in_recovery ? "pg_last_xlog_receive_location()" : "pg_current_xlog_location()";
    let text =
      `SELECT client_addr::text AS client, ` +
      `pg_xlog_location_diff(${current}, replay_location)::float8 AS bytes ` +
      `FROM public.pg_stat_repl`;
    if (ctx.resources.serverVersion >= 100_000) {
      text = text.replaceAll("_xlog", "_wal").replaceAll("_location", "_lsn");
    }

    const rows = await cancelOnAbort(
      sql.unsafe<{ client: string | null; bytes: number | null }[]>(text),
      ctx.signal,
    );
    return rows.map((r) => ({ client: r.client ?? "local", bytes: r.bytes ?? 0 }));
  },
};

export const maxXidAge: StatSource<number | null> = {
  async fetch(ctx) {
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ age: number | null }[]>`SELECT max(age(datfrozenxid))::float8 AS age FROM pg_database`,
      ctx.signal,
    );
    return row?.age ?? null;
  },
};

/** `mxid_age` exists from Postgres 9.5 on */
export const maxMultixactAge: StatSource<number | null> = {
  async fetch(ctx) {
    if (ctx.resources.serverVersion < 90_500) {
      throw new TaskFetchFailure("mxid_age requires Postgres 9.5 or newer");
    }
    const sql = sqlFor(ctx);
    const [row] = await cancelOnAbort(
      sql<{ age: number | null }[]>`
        SELECT max(mxid_age(relminmxid))::float8 AS age
        FROM pg_class WHERE relminmxid <> '0'
      `,
      ctx.signal,
    );
    return row?.age ?? null;
  },
};
