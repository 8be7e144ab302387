/**
 * Rate formatter: turns counters into per-second rates by diffing the
 * current sample against the previous one.
 *
 *  - no previous sample (first run): no records
 *  - zero elapsed time: rate 0
 *  - a counter that went backwards (statistics reset) gives a negative rate
 */

import { createRecord, type MetricPoint } from "./record.js";
import type { Formatter } from "./types.js";

export interface RateOptions<R> {
  /** Counter totals in the raw result; `value` is the running total */
  counters: (raw: R) => MetricPoint[];
  /**
   * Extra points computed from this cycle's rates, keyed by counter id
   * (the `what` of the counter, plus its tags when it has any).
   */
  derive?: (rates: ReadonlyMap<string, number>) => MetricPoint[];
}

/** Identity of a counter across samples */
export function counterId(point: MetricPoint): string {
  const tags = Object.entries(point.tags ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`);
  return tags.length > 0 ? `${point.what}{${tags.join(",")}}` : point.what;
}

export function rate<R>(options: RateOptions<R>): Formatter<R> {
  return ({ current, previous, meta }) => {
    if (!previous) return [];

    const elapsedSeconds = (current.takenAt - previous.takenAt) / 1000;
    const before = new Map<string, number>();
    for (const point of options.counters(previous.raw)) {
      before.set(counterId(point), point.value);
    }

    const rates = new Map<string, number>();
    const points: MetricPoint[] = [];
    for (const point of options.counters(current.raw)) {
      const id = counterId(point);
      const prev = before.get(id);
      if (prev === undefined) continue;
      const value = elapsedSeconds > 0 ? (point.value - prev) / elapsedSeconds : 0;
      rates.set(id, value);
      points.push({ ...point, value });
    }

    if (options.derive && rates.size > 0) {
      points.push(...options.derive(rates));
    }

    return points.map((point) => createRecord(point, meta, current.takenAt));
  };
}
