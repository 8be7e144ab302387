/**
 * Task status routes: per-target run state from the scheduler.
 */

import type { FastifyPluginAsync } from "fastify";
import type { TaskStatusResponse } from "@pg-metrics/shared";
import type { StatusRouteOptions } from "./health.js";
import { TasksQuery } from "./status.schemas.js";

export const taskRoutes: FastifyPluginAsync<StatusRouteOptions> = async (app, opts) => {
  // -------------------------------------------------------------------------
  // GET /api/tasks?failing=true&task=name
  // -------------------------------------------------------------------------
  app.get<{ Querystring: TasksQuery }>(
    "/",
    { schema: { querystring: TasksQuery } },
    async (request, reply) => {
      const { failing, task } = request.query;
      let tasks = opts.tasks.snapshot();
      if (failing) tasks = tasks.filter((t) => t.consecutiveFailures > 0);
      if (task) tasks = tasks.filter((t) => t.task === task);

      const payload: TaskStatusResponse = { tasks };
      return reply.send(payload);
    },
  );
};
