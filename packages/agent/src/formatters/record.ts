/**
 * Canonical metric record: construction and the JSON line wire format.
 *
 *   {"key":"postgresql.database-size","value":1024,"timestamp":1700000000000,
 *    "tags":{"host":"db1","database":"app","unit":"B"}}
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { MetricRecord, MetricTags } from "@pg-metrics/shared";
import { FormatFailure } from "../errors.js";

export const METRIC_NAMESPACE = "postgresql";

/** A value a formatter wants to emit, before it is stamped with metadata */
export interface MetricPoint {
  /** Metric name below the namespace, e.g. "database-size" */
  what: string;
  value: number;
  unit: string;
  /** Extra tags, e.g. { table: "users" } */
  tags?: Record<string, string>;
}

/** Task metadata every record of a target carries */
export interface RecordMeta {
  host: string;
  /** Present for per-database targets */
  database?: string;
}

/**
 * Stamp a point with metadata and freeze it.
 * Throws FormatFailure for non-finite values.
 */
export function createRecord(
  point: MetricPoint,
  meta: RecordMeta,
  timestamp: number,
): MetricRecord {
  if (!Number.isFinite(point.value)) {
    throw new FormatFailure(`metric ${point.what} has a non-finite value: ${point.value}`);
  }
  const tags: Record<string, string> = { host: meta.host };
  if (meta.database !== undefined) tags.database = meta.database;
  tags.unit = point.unit;
  Object.assign(tags, point.tags);

  return Object.freeze({
    key: `${METRIC_NAMESPACE}.${point.what}`,
    value: point.value,
    timestamp: Math.trunc(timestamp),
    tags: Object.freeze(tags),
  });
}

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

const MetricRecordLine = Type.Object({
  key: Type.String({ minLength: 1 }),
  value: Type.Number(),
  timestamp: Type.Integer(),
  tags: Type.Record(Type.String(), Type.String()),
});

type MetricRecordLine = Static<typeof MetricRecordLine>;

/** Serialize a record to one JSON line (without the trailing newline) */
export function serializeRecord(record: MetricRecord): string {
  const line: MetricRecordLine = {
    key: record.key,
    value: record.value,
    timestamp: record.timestamp,
    tags: { ...record.tags },
  };
  return JSON.stringify(line);
}

/** Parse a JSON line back into a record. Throws FormatFailure on bad input. */
export function parseRecord(line: string): MetricRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new FormatFailure("metric line is not valid JSON", { cause: err });
  }
  if (!Value.Check(MetricRecordLine, parsed)) {
    const first = Value.Errors(MetricRecordLine, parsed).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "invalid shape";
    throw new FormatFailure(`metric line does not match record format (${where})`);
  }
  const tags: MetricTags = Object.freeze({ ...parsed.tags });
  return Object.freeze({
    key: parsed.key,
    value: parsed.value,
    timestamp: parsed.timestamp,
    tags,
  });
}
