/**
 * Command line front end.
 *
 *   pg-metrics all            one-shot: collect every metric once, print to stdout
 *   pg-metrics long-running   poll on each metric's interval, push over UDP
 *   pg-metrics prepare-db     create the metrics role, views and functions
 *   pg-metrics help
 */

import { hostname } from "node:os";
import type { Writable } from "node:stream";
import { parseArgs } from "node:util";
import type { Logger } from "pino";

import { buildApp } from "./app.js";
import { buildTasks, createDefaultRegistry, createTargets } from "./catalog/index.js";
import { DEFAULT_CONFIG_PATH, loadConfig, type AgentConfig } from "./config/index.js";
import { systemClock, type AgentContext } from "./context.js";
import { AgentError, SetupFailure, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { connectAsSuperuser, prepareDatabases } from "./prepare/prepare-db.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { ConsoleSink, PushSink } from "./sinks/index.js";
import { PgConnections, resolveDataDir, type StatResources } from "./sources/index.js";

export const USAGE = `Usage: pg-metrics <command> [options]

Commands:
  all                 Collect every configured metric once and print it to stdout
  long-running        Collect metrics on their intervals and push them to ffwd
  long-running-ffwd   Alias of long-running
  prepare-db          Prepare the monitored databases for the metrics user
  help                Show this message

Options:
  -c, --config <path>    Configuration file (default: ${DEFAULT_CONFIG_PATH})
      --warmup <sec>     Seconds between warm-up and reported pass in "all" (default: 5)
      --superuser <name> Superuser for prepare-db when local login is not possible;
                         password from PGMETRICS_SUPERUSER_PASSWORD
  -h, --help             Show this message
`;

const DEFAULT_WARMUP_SECONDS = 5;

export interface CliIo {
  stdout: Writable;
  env: NodeJS.ProcessEnv;
  /** Replaces the logger built from configuration */
  logger?: Logger;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: "string", short: "c", default: DEFAULT_CONFIG_PATH },
      warmup: { type: "string", default: String(DEFAULT_WARMUP_SECONDS) },
      superuser: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/** Parse argv, run the command and resolve to the process exit code */
export async function runCli(
  argv: string[],
  io: CliIo = { stdout: process.stdout, env: process.env },
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.stdout.write(`${errorMessage(err)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  const command = positionals[0] ?? "help";
  if (values.help || command === "help") {
    io.stdout.write(USAGE);
    return 0;
  }

  let logger = io.logger ?? createLogger({ level: io.env.PGMETRICS_LOG_LEVEL });
  try {
    switch (command) {
      case "all": {
        const warmup = Number(values.warmup);
        if (!Number.isFinite(warmup) || warmup < 0) {
          throw new SetupFailure(`invalid --warmup value: ${values.warmup}`);
        }
        const config = await loadConfig(values.config);
        logger = io.logger ?? loggerFor(config, true);
        return await runOneShot(config, logger, io.stdout, warmup);
      }
      case "long-running":
      case "long-running-ffwd": {
        const config = await loadConfig(values.config);
        logger = io.logger ?? loggerFor(config, false);
        await runLongRunning(config, logger);
        return 0;
      }
      case "prepare-db": {
        const config = await loadConfig(values.config);
        logger = io.logger ?? loggerFor(config, true);
        const credentials = values.superuser
          ? {
              host: config.postgres.host,
              port: config.postgres.port,
              user: values.superuser,
              password: io.env.PGMETRICS_SUPERUSER_PASSWORD ?? "",
            }
          : undefined;
        await prepareDatabases(
          {
            databases: config.postgres.databases,
            metricsUser: config.postgres.user,
            metricsPassword: config.postgres.password,
          },
          (database) => connectAsSuperuser(database, logger, credentials),
          logger,
        );
        return 0;
      }
      default:
        io.stdout.write(`Unknown command: ${command}\n\n${USAGE}`);
        return 1;
    }
  } catch (err) {
    if (err instanceof AgentError) {
      logger.fatal({ err, code: err.code }, err.message);
      return 1;
    }
    throw err;
  } finally {
    logger.flush();
  }
}

/** One-shot runs keep stdout for records, so logs always go to stderr */
function loggerFor(config: AgentConfig, oneShot: boolean): Logger {
  const { log } = config;
  return createLogger({
    level: log.level,
    pretty: log.pretty,
    stderr: oneShot || log.toStderr,
    file: log.toFile ? log.filename ?? undefined : undefined,
    rotateMaxBytes: log.rotate ? log.rotateMaxBytes : null,
  });
}

// ---------------------------------------------------------------------------
// Agent wiring
// ---------------------------------------------------------------------------

interface Agent {
  scheduler: Scheduler;
  close(): Promise<void>;
}

async function openAgent(config: AgentConfig, logger: Logger): Promise<Agent> {
  const { databases } = config.postgres;
  if (config.usedDeprecatedDataDirFunctions) {
    logger.warn("data_dir_functions is deprecated, list those functions under global_db_functions");
  }

  const registry = createDefaultRegistry();
  const tasks = buildTasks(
    {
      dbFunctions: config.dbFunctions,
      globalDbFunctions: config.globalDbFunctions,
      databases,
    },
    registry,
  );
  const targets = createTargets(tasks, registry, databases[0] ?? "");

  const connections = new PgConnections(
    {
      host: config.postgres.host,
      port: config.postgres.port,
      user: config.postgres.user,
      password: config.postgres.password,
      connectTimeoutSeconds: config.postgres.connectTimeoutSeconds,
    },
    logger,
  );

  try {
    await connections.verify(databases);
    const serverVersion = await connections.serverVersion(databases[0] ?? "");
    const dataDir = await resolveDataDir(config.postgres.dataDir, serverVersion, logger);
    const resources: StatResources = {
      sql: (database) => connections.sql(database),
      dataDir,
      serverVersion,
      logger,
    };

    const ctx: AgentContext = { logger, host: hostname(), clock: systemClock };
    logger.info(
      { tasks: tasks.length, targets: targets.length, serverVersion, dataDir },
      "metric tasks configured",
    );
    const scheduler = new Scheduler(ctx, targets, {
      resources,
      fetchTimeoutMs: config.fetchTimeoutSeconds * 1000,
    });
    return { scheduler, close: () => connections.close() };
  } catch (err) {
    await connections.close();
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function runOneShot(
  config: AgentConfig,
  logger: Logger,
  stdout: Writable,
  warmupSeconds: number,
): Promise<number> {
  const agent = await openAgent(config, logger);
  const sink = new ConsoleSink(stdout);
  try {
    // rate metrics need a previous sample
    if (warmupSeconds > 0) {
      await agent.scheduler.runOnce();
      logger.debug({ seconds: warmupSeconds }, "warm-up pass done, waiting");
      await systemClock.sleep(warmupSeconds * 1000);
    }

    const { records, failures } = await agent.scheduler.runOnce();
    await sink.deliver(records);

    if (failures.length > 0) {
      logger.warn(
        {
          failed: failures.map((f) => (f.database ? `${f.task}@${f.database}` : f.task)),
          records: records.length,
        },
        "some metric tasks failed, output is incomplete",
      );
      return 2;
    }
    return 0;
  } finally {
    await sink.close();
    await agent.close();
  }
}

async function runLongRunning(config: AgentConfig, logger: Logger): Promise<void> {
  const agent = await openAgent(config, logger);
  const sink = new PushSink(logger, { host: config.ffwd.host, port: config.ffwd.port });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const server = config.http.enabled
    ? await buildApp({ tasks: agent.scheduler, logger })
    : null;

  try {
    if (server) {
      await server.listen({ host: config.http.host, port: config.http.port });
      logger.info({ host: config.http.host, port: config.http.port }, "status server listening");
    }
    await agent.scheduler.runForever([sink], controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await server?.close();
    await sink.close();
    await agent.close();
  }
}
