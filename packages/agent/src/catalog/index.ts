export { defineMetric } from "./definition.js";
export type { MetricDefinition, MetricBinding } from "./definition.js";
export { MetricRegistry, buildTasks, createTargets } from "./registry.js";
export type { FunctionEntry, TaskConfig } from "./registry.js";
export { postgresMetrics, createDefaultRegistry } from "./postgres-metrics.js";
