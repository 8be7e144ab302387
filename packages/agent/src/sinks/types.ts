import type { MetricRecord } from "@pg-metrics/shared";

/**
 * A destination for metric records.
 *
 * `deliver` only rejects when the failure is fatal for the whole agent
 * (e.g. stdout is gone); best-effort sinks log and drop instead.
 */
export interface MetricSink {
  readonly name: string;
  deliver(records: readonly MetricRecord[]): Promise<void>;
  close(): Promise<void>;
}
