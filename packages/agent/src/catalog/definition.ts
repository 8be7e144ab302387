/**
 * Metric definitions: a stat source paired with the formatter for its
 * raw result, registered under the name configuration refers to.
 */

import type { Formatter } from "../formatters/types.js";
import { MetricTarget, type TaskTarget, type TaskTargetOptions } from "../scheduler/target.js";
import type { StatSource } from "../sources/types.js";

export interface MetricDefinition {
  readonly name: string;
  readonly description: string;
  createTarget(options: TaskTargetOptions): TaskTarget;
}

export interface MetricBinding<R> {
  name: string;
  description: string;
  source: StatSource<R>;
  format: Formatter<R>;
}

/** Bind a source to its formatter; the raw result type stays internal */
export function defineMetric<R>(binding: MetricBinding<R>): MetricDefinition {
  return {
    name: binding.name,
    description: binding.description,
    createTarget: (options) => new MetricTarget<R>(options, binding.source, binding.format),
  };
}
