import { describe, it, expect } from "vitest";
import { FormatFailure } from "../errors.js";
import { createRecord, parseRecord, serializeRecord } from "./record.js";

describe("createRecord", () => {
  it("namespaces the key and orders tags host, database, unit, extras", () => {
    const record = createRecord(
      { what: "last-vacuum", value: 42, unit: "s", tags: { table: "orders" } },
      { host: "db1", database: "shop" },
      1_700_000_000_123.9,
    );

    expect(record.key).toBe("postgresql.last-vacuum");
    expect(record.value).toBe(42);
    expect(record.timestamp).toBe(1_700_000_000_123);
    expect(Object.keys(record.tags)).toEqual(["host", "database", "unit", "table"]);
    expect(record.tags).toEqual({ host: "db1", database: "shop", unit: "s", table: "orders" });
  });

  it("omits the database tag for cluster-wide metrics", () => {
    const record = createRecord({ what: "client-connections", value: 7, unit: "connection" }, { host: "db1" }, 1000);
    expect(record.tags).toEqual({ host: "db1", unit: "connection" });
  });

  it("returns a frozen record", () => {
    const record = createRecord({ what: "x", value: 1, unit: "u" }, { host: "h" }, 1);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.tags)).toBe(true);
  });

  it("rejects non-finite values", () => {
    expect(() => createRecord({ what: "x", value: Number.NaN, unit: "u" }, { host: "h" }, 1)).toThrow(
      FormatFailure,
    );
    expect(() =>
      createRecord({ what: "x", value: Number.POSITIVE_INFINITY, unit: "u" }, { host: "h" }, 1),
    ).toThrow("metric x has a non-finite value: Infinity");
  });
});

describe("serializeRecord / parseRecord", () => {
  it("writes the documented JSON line", () => {
    const record = createRecord({ what: "database-size", value: 1024, unit: "B" }, { host: "db1", database: "app" }, 1_700_000_000_000);
    expect(serializeRecord(record)).toBe(
      '{"key":"postgresql.database-size","value":1024,"timestamp":1700000000000,"tags":{"host":"db1","database":"app","unit":"B"}}',
    );
  });

  it("parses a serialized record back to an equal record", () => {
    const record = createRecord(
      { what: "locks_waiting", value: 3, unit: "lock", tags: { type: "locks", locktype: "relation" } },
      { host: "db1" },
      5000,
    );
    expect(parseRecord(serializeRecord(record))).toEqual(record);
  });

  it("rejects lines that are not JSON", () => {
    expect(() => parseRecord("not json")).toThrow("metric line is not valid JSON");
  });

  it("rejects lines with the wrong shape", () => {
    const line = JSON.stringify({ key: "postgresql.x", value: "1", timestamp: 1, tags: {} });
    expect(() => parseRecord(line)).toThrow(FormatFailure);
    expect(() => parseRecord(line)).toThrow(/\/value/);
  });
});
