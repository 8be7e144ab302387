/**
 * Types for the agent's status endpoint.
 */

import type { MetricScope } from "./metrics.js";

/** Run state of one task target (a task, or a task × database pair) */
export interface TaskStatus {
  task: string;
  /** null for cluster-wide tasks */
  database: string | null;
  scope: MetricScope;
  intervalSeconds: number;
  runs: number;
  consecutiveFailures: number;
  /** ISO 8601 timestamps, null until the first run */
  lastRunAt: string | null;
  lastSuccessAt: string | null;
  nextDueAt: string | null;
  lastError: string | null;
}

export type HealthStatus = "ok" | "degraded";

export interface HealthResponse {
  status: HealthStatus;
  tasks: number;
  /** Targets at or above the failure threshold */
  failing: number;
  timestamp: string;
}

export interface TaskStatusResponse {
  tasks: TaskStatus[];
}
