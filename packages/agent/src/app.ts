import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";

import { healthRoutes, type TaskStatusProvider } from "./routes/health.js";
import { taskRoutes } from "./routes/tasks.js";

export interface BuildAppOptions {
  /** Source of per-target run state (the scheduler) */
  tasks: TaskStatusProvider;
  /** Agent logger; requests are logged through it */
  logger: FastifyBaseLogger;
}

/**
 * Build the status server.
 * Exported separately from listening so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    loggerInstance: opts.logger,
    disableRequestLogging: true,
  });

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "query",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "status request failed");
    reply.status(500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/api/health", tasks: opts.tasks });
  await app.register(taskRoutes, { prefix: "/api/tasks", tasks: opts.tasks });

  return app;
}
