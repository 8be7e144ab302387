export type { MetricRecord, MetricScope, MetricTags, MetricTask } from "./types/metrics.js";
export type {
  HealthResponse,
  HealthStatus,
  TaskStatus,
  TaskStatusResponse,
} from "./types/status.js";
