import { createRecord, type MetricPoint } from "./record.js";
import type { Formatter } from "./types.js";

/**
 * Gauge formatter: every point the mapper returns becomes a record as-is.
 * A mapper returning no points ("no data") yields no records.
 */
export function gauge<R>(toPoints: (raw: R) => MetricPoint[]): Formatter<R> {
  return ({ current, meta }) =>
    toPoints(current.raw).map((point) => createRecord(point, meta, current.takenAt));
}
