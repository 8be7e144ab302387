/**
 * One-time preparation of the monitored databases (the `prepare-db`
 * command). Must run with superuser rights; every step checks first and
 * only creates or grants what is missing, so it is safe to re-run.
 *
 * For the metrics role it sets up:
 *  - the role itself (LOGIN) and CONNECT on each database
 *  - public.pg_stat_repl, a SECURITY DEFINER view over pg_stat_replication
 *  - pgstattuple plus the pgstattuple_for_table_oid(BIGINT) wrapper
 *  - public.stat_incoming_replication over pg_stat_wal_receiver (9.6+)
 */

import postgres from "postgres";
import type { Logger } from "pino";
import { SetupFailure, errorMessage } from "../errors.js";

export const REPLICATION_STATS_VIEW = "public.pg_stat_repl";
export const PGSTATTUPLE_FUNC = "pgstattuple_for_table_oid(BIGINT)";
export const INCOMING_REPLICATION_VIEW = "public.stat_incoming_replication";

/** pg_stat_wal_receiver appeared in 9.6 */
const WAL_RECEIVER_MIN_VERSION = 90_600;

const LOCAL_SOCKET_DIR = "/var/run/postgresql";

/** Minimal query interface; lets tests script the server's answers */
export interface AdminSession {
  query(text: string, params?: (string | number)[]): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export interface PrepareOptions {
  databases: readonly string[];
  /** Role the agent collects metrics as */
  metricsUser: string;
  metricsPassword: string;
}

export interface SuperuserCredentials {
  host: string;
  port: number;
  user: string;
  password: string;
}

// ---------------------------------------------------------------------------
// Connections
// ---------------------------------------------------------------------------

function postgresSession(options: postgres.Options<{}>): AdminSession {
  const sql = postgres({ ...options, max: 1, onnotice: () => {} });
  return {
    async query(text, params = []) {
      return await sql.unsafe(text, params);
    },
    close: () => sql.end({ timeout: 5 }),
  };
}

/**
 * Connect as a superuser: first through the local socket as the current OS
 * user (works when that user is a Postgres superuser), then with explicit
 * credentials if given.
 */
export async function connectAsSuperuser(
  database: string,
  logger: Logger,
  credentials?: SuperuserCredentials,
): Promise<AdminSession> {
  const local = postgresSession({ host: LOCAL_SOCKET_DIR, database, connect_timeout: 5 });
  try {
    await local.query("SELECT 1");
    return local;
  } catch (err) {
    await local.close();
    logger.info({ database, err: errorMessage(err) }, "could not connect as local superuser");
  }

  if (!credentials) {
    throw new SetupFailure(
      `cannot connect to "${database}" as superuser; pass --superuser and set PGMETRICS_SUPERUSER_PASSWORD`,
    );
  }

  const session = postgresSession({ ...credentials, database, connect_timeout: 10 });
  try {
    await session.query("SELECT 1");
    return session;
  } catch (err) {
    await session.close();
    throw new SetupFailure(`failed connecting the database "${database}": ${errorMessage(err)}`, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// SQL helpers
// ---------------------------------------------------------------------------

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

async function exists(session: AdminSession, text: string, params: (string | number)[]): Promise<boolean> {
  const [row] = await session.query(text, params);
  return row?.ok === true;
}

// ---------------------------------------------------------------------------
// Preparation
// ---------------------------------------------------------------------------

/** Prepare one database; returns false when it is a replica (nothing done) */
export async function prepareDatabase(
  session: AdminSession,
  database: string,
  options: PrepareOptions,
  logger: Logger,
): Promise<boolean> {
  const user = options.metricsUser;
  const log = logger.child({ database });

  if (await exists(session, "SELECT pg_is_in_recovery() AS ok", [])) {
    log.info("database is a replica, run prepare-db on the primary");
    return false;
  }

  if (!(await exists(session, "SELECT true AS ok FROM pg_roles WHERE rolname = $1", [user]))) {
    log.info({ role: user }, "creating role with login privilege");
    await session.query(
      `CREATE ROLE ${quoteIdent(user)} WITH PASSWORD ${quoteLiteral(options.metricsPassword)} LOGIN`,
    );
  } else {
    log.info({ role: user }, "role already exists");
  }

  if (!(await exists(session, "SELECT has_database_privilege($1, $2, 'connect') AS ok", [user, database]))) {
    log.info({ role: user }, "granting connect privilege");
    await session.query(`GRANT CONNECT ON DATABASE ${quoteIdent(database)} TO ${quoteIdent(user)}`);
  } else {
    log.info({ role: user }, "role already has connect privilege");
  }

  if (!(await relationExists(session, "pg_stat_repl"))) {
    log.info({ view: REPLICATION_STATS_VIEW }, "creating replication stats view");
    await session.query(`CREATE OR REPLACE FUNCTION public.pg_stat_repl()
RETURNS SETOF pg_catalog.pg_stat_replication AS $$
BEGIN
  RETURN QUERY(SELECT * FROM pg_catalog.pg_stat_replication);
END$$ LANGUAGE plpgsql SECURITY DEFINER`);
    await session.query(`CREATE VIEW ${REPLICATION_STATS_VIEW} AS SELECT * FROM public.pg_stat_repl()`);
  } else {
    log.info({ view: REPLICATION_STATS_VIEW }, "replication stats view already exists");
  }
  await grantOnce(session, log, user, "table", REPLICATION_STATS_VIEW, "select");

  if (!(await exists(session, "SELECT true AS ok FROM pg_proc WHERE proname = $1", ["pgstattuple_for_table_oid"]))) {
    log.info({ func: PGSTATTUPLE_FUNC }, "creating pgstattuple extension and access function");
    await session.query("CREATE EXTENSION IF NOT EXISTS pgstattuple");
    await session.query(`CREATE OR REPLACE FUNCTION ${PGSTATTUPLE_FUNC}
RETURNS TABLE (current_database NAME, table_len BIGINT, tuple_count BIGINT,
               tuple_len BIGINT, tuple_percent FLOAT, dead_tuple_count BIGINT,
               dead_tuple_len BIGINT, dead_tuple_percent FLOAT, free_space BIGINT,
               free_percent FLOAT) AS $$
BEGIN
  RETURN QUERY(SELECT current_database(), * FROM pgstattuple($1));
END$$ LANGUAGE plpgsql SECURITY DEFINER`);
  } else {
    log.info({ func: PGSTATTUPLE_FUNC }, "pgstattuple access function already exists");
  }
  await grantOnce(session, log, user, "function", PGSTATTUPLE_FUNC, "execute");

  const [row] = await session.query("SELECT current_setting('server_version_num')::int AS version");
  const version = typeof row?.version === "number" ? row.version : 0;
  if (version >= WAL_RECEIVER_MIN_VERSION) {
    if (!(await relationExists(session, "stat_incoming_replication"))) {
      log.info({ view: INCOMING_REPLICATION_VIEW }, "creating incoming replication view");
      await session.query(`CREATE OR REPLACE FUNCTION public.stat_incoming_replication()
RETURNS SETOF pg_catalog.pg_stat_wal_receiver AS $$
BEGIN
  RETURN QUERY(SELECT * FROM pg_catalog.pg_stat_wal_receiver);
END$$ LANGUAGE plpgsql SECURITY DEFINER`);
      await session.query(
        `CREATE OR REPLACE VIEW ${INCOMING_REPLICATION_VIEW} AS SELECT * FROM public.stat_incoming_replication()`,
      );
    } else {
      log.info({ view: INCOMING_REPLICATION_VIEW }, "incoming replication view already exists");
    }
    await grantOnce(session, log, user, "table", INCOMING_REPLICATION_VIEW, "select");
  } else {
    log.info("skipping incoming replication view, requires Postgres 9.6 or newer");
  }

  log.info({ role: user }, "database prepared for metrics user");
  return true;
}

function relationExists(session: AdminSession, name: string): Promise<boolean> {
  return exists(
    session,
    "SELECT true AS ok FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1",
    [name],
  );
}

async function grantOnce(
  session: AdminSession,
  log: Logger,
  user: string,
  kind: "table" | "function",
  object: string,
  privilege: "select" | "execute",
): Promise<void> {
  const check =
    kind === "table"
      ? "SELECT has_table_privilege($1, $2, $3) AS ok"
      : "SELECT has_function_privilege($1, $2, $3) AS ok";
  if (await exists(session, check, [user, object, privilege])) {
    log.info({ role: user, object, privilege }, "privilege already granted");
    return;
  }
  log.info({ role: user, object, privilege }, "granting privilege");
  const target = kind === "function" ? `FUNCTION ${object}` : object;
  await session.query(`GRANT ${privilege.toUpperCase()} ON ${target} TO ${quoteIdent(user)}`);
}

/**
 * Prepare every configured database in order. Stops at the first replica,
 * since everything created on the primary replicates to it.
 */
export async function prepareDatabases(
  options: PrepareOptions,
  connect: (database: string) => Promise<AdminSession>,
  logger: Logger,
): Promise<void> {
  logger.info({ role: options.metricsUser }, "preparing databases for metrics user");
  for (const database of options.databases) {
    logger.info({ database }, "connecting to database as superuser");
    const session = await connect(database);
    try {
      const prepared = await prepareDatabase(session, database, options, logger);
      if (!prepared) break;
    } finally {
      await session.close();
    }
  }
}
