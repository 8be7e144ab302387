import type { MetricRecord } from "@pg-metrics/shared";
import type { RecordMeta } from "./record.js";

/** A raw stat-source result stamped with the time it was taken */
export interface Sample<R> {
  raw: R;
  /** Epoch milliseconds */
  takenAt: number;
}

export interface FormatInput<R> {
  current: Sample<R>;
  /** Last successfully formatted sample of the same target, if any */
  previous: Sample<R> | undefined;
  meta: RecordMeta;
}

/**
 * Pure transformation from samples to records. May throw FormatFailure
 * when the raw result does not have the expected shape.
 */
export type Formatter<R> = (input: FormatInput<R>) => MetricRecord[];
