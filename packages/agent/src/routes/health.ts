import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse, TaskStatus } from "@pg-metrics/shared";

/** Consecutive failures after which a target marks the agent degraded */
export const FAILURE_THRESHOLD = 3;

/** Anything that can report per-target run state (the scheduler) */
export interface TaskStatusProvider {
  snapshot(): TaskStatus[];
}

export interface StatusRouteOptions {
  tasks: TaskStatusProvider;
}

export const healthRoutes: FastifyPluginAsync<StatusRouteOptions> = async (app, opts) => {
  app.get("/", async (_request, reply) => {
    const tasks = opts.tasks.snapshot();
    const failing = tasks.filter((t) => t.consecutiveFailures >= FAILURE_THRESHOLD).length;

    const payload: HealthResponse = {
      status: failing === 0 ? "ok" : "degraded",
      tasks: tasks.length,
      failing,
      timestamp: new Date().toISOString(),
    };

    return reply.status(failing === 0 ? 200 : 503).send(payload);
  });
};
