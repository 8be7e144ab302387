import { describe, it, expect, vi } from "vitest";
import type postgres from "postgres";
import type { Logger } from "pino";
import { TaskFetchFailure } from "../errors.js";
import { offlineResources } from "../test/fixtures.js";
import {
  incomingReplication,
  lockCounts,
  maxMultixactAge,
  replicationDelays,
  tableBloat,
  transactionCounters,
} from "./postgres-queries.js";

// ---------------------------------------------------------------------------
// Mock postgres.js client: tagged-template calls and unsafe() answer from
// queues, each answer a thenable with cancel() like a pending query.
// ---------------------------------------------------------------------------

function pending(rows: unknown[]) {
  return Object.assign(Promise.resolve(rows), { cancel: vi.fn() });
}

function createMockSql(tagged: unknown[][], unsafe: unknown[][] = []) {
  const unsafeFn = vi.fn((_text: string) => pending(unsafe.shift() ?? []));
  const tag = Object.assign(
    vi.fn((_strings: TemplateStringsArray, ..._values: unknown[]) => pending(tagged.shift() ?? [])),
    { unsafe: unsafeFn },
  );
  return { sql: tag as unknown as postgres.Sql, tag, unsafe: unsafeFn };
}

function contextFor(sql: postgres.Sql, serverVersion = 160_000) {
  return {
    database: "app",
    signal: new AbortController().signal,
    resources: offlineResources({ sql: () => sql, serverVersion }),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("replicationDelays", () => {
  it("uses the _wal/_lsn functions from Postgres 10 on", async () => {
    const mock = createMockSql([[{ in_recovery: false }]], [[{ client: "10.0.0.2", bytes: 2048 }]]);

    const rows = await replicationDelays.fetch(contextFor(mock.sql, 160_000));

    expect(rows).toEqual([{ client: "10.0.0.2", bytes: 2048 }]);
    expect(mock.unsafe.mock.calls[0]?.[0]).toBe(
      "SELECT client_addr::text AS client, " +
        "pg_wal_lsn_diff(pg_current_wal_lsn(), replay_lsn)::float8 AS bytes " +
        "FROM public.pg_stat_repl",
    );
  });

  it("measures from the receive position on a standby before Postgres 10", async () => {
    const mock = createMockSql([[{ in_recovery: true }]], [[{ client: null, bytes: null }]]);

    const rows = await replicationDelays.fetch(contextFor(mock.sql, 90_600));

    expect(rows).toEqual([{ client: "local", bytes: 0 }]);
    expect(mock.unsafe.mock.calls[0]?.[0]).toBe(
      "SELECT client_addr::text AS client, " +
        "pg_xlog_location_diff(pg_last_xlog_receive_location(), replay_location)::float8 AS bytes " +
        "FROM public.pg_stat_repl",
    );
  });
});

describe("incomingReplication", () => {
  it("reads the upstream host from conninfo", async () => {
    const mock = createMockSql([
      [
        { conninfo: "user=replicator host=10.0.0.1 port=5432", running: 1 },
        { conninfo: null, running: 0 },
      ],
    ]);

    expect(await incomingReplication.fetch(contextFor(mock.sql))).toEqual([
      { upstream: "10.0.0.1", running: 1 },
      { upstream: "UNKNOWN", running: 0 },
    ]);
  });
});

describe("lockCounts", () => {
  it("maps grouped rows", async () => {
    const mock = createMockSql([[{ locktype: "relation", granted: true, count: 4 }]]);
    expect(await lockCounts.fetch(contextFor(mock.sql))).toEqual([{ locktype: "relation", granted: true, count: 4 }]);
  });
});

describe("transactionCounters", () => {
  it("returns null when the database has no statistics row", async () => {
    const mock = createMockSql([[]]);
    expect(await transactionCounters.fetch(contextFor(mock.sql))).toBeNull();
  });
});

describe("maxMultixactAge", () => {
  it("refuses servers older than 9.5 without querying", async () => {
    const mock = createMockSql([]);
    await expect(maxMultixactAge.fetch(contextFor(mock.sql, 90_400))).rejects.toThrow(TaskFetchFailure);
    expect(mock.tag).not.toHaveBeenCalled();
  });
});

describe("tableBloat", () => {
  it("scans each table and skips the ones that fail", async () => {
    const tables = [
      { table: "orders", oid: 16384 },
      { table: "dropped", oid: 16390 },
      { table: "events", oid: 16402 },
    ];
    const answers: (() => Promise<unknown[]>)[] = [
      async () => tables,
      async () => [{ value: 12.5 }],
      async () => Promise.reject(new Error('relation with OID 16390 does not exist')),
      async () => [{ value: null }],
    ];
    const tag = vi.fn((_strings: TemplateStringsArray, ..._values: unknown[]) =>
      Object.assign((answers.shift() ?? (async () => []))(), { cancel: vi.fn() }),
    );
    const warn = vi.fn();
    const ctx = {
      database: "app",
      signal: new AbortController().signal,
      resources: offlineResources({
        sql: () => tag as unknown as postgres.Sql,
        logger: { warn } as unknown as Logger,
      }),
    };

    expect(await tableBloat.fetch(ctx)).toEqual([
      { table: "orders", value: 12.5 },
      { table: "events", value: null },
    ]);
    expect(tag.mock.calls.slice(1).map((call) => call[1])).toEqual([16384, 16390, 16402]);
    expect(warn).toHaveBeenCalledWith(
      { database: "app", table: "dropped", err: "relation with OID 16390 does not exist" },
      "skipping table bloat for table",
    );
  });
});
