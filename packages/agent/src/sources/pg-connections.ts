/**
 * Database connections for stat sources.
 *
 * One single-connection postgres.js client per monitored database, created
 * on first use. postgres.js reconnects a dropped connection on the next
 * query, so callers never see a closed client.
 */

import postgres from "postgres";
import type { Logger } from "pino";
import { SetupFailure, errorMessage } from "../errors.js";

export interface PgConnectionOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  connectTimeoutSeconds: number;
}

export class PgConnections {
  private clients = new Map<string, postgres.Sql>();

  constructor(
    private options: PgConnectionOptions,
    private logger: Logger,
  ) {}

  /** Get (or open) the client for a database */
  sql(database: string): postgres.Sql {
    const existing = this.clients.get(database);
    if (existing) return existing;

    const { host, port, user, password, connectTimeoutSeconds } = this.options;
    this.logger.info({ host, port, user, database }, "opening database connection");
    const client = postgres({
      host,
      port,
      user,
      password,
      database,
      max: 1,
      connect_timeout: connectTimeoutSeconds,
      onnotice: () => {},
    });
    this.clients.set(database, client);
    return client;
  }

  /**
   * Confirm every database answers a trivial query.
   * Throws SetupFailure for the first one that does not.
   */
  async verify(databases: readonly string[]): Promise<void> {
    if (databases.length === 0) {
      throw new SetupFailure("no target databases defined in configuration");
    }
    for (const database of databases) {
      try {
        await this.sql(database)`SELECT 1`;
      } catch (err) {
        throw new SetupFailure(
          `could not connect to database "${database}" at ${this.options.host}:${this.options.port}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }
  }

  /** `server_version_num` of the cluster, e.g. 160002 */
  async serverVersion(database: string): Promise<number> {
    const sql = this.sql(database);
    let rows: { version: number }[];
    try {
      rows = await sql<{ version: number }[]>`
        SELECT current_setting('server_version_num')::int AS version
      `;
    } catch (err) {
      throw new SetupFailure(`could not read server version from database "${database}": ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const [row] = rows;
    if (!row) throw new SetupFailure("could not read server_version_num");
    return row.version;
  }

  /** Close all clients, waiting up to five seconds for in-flight queries */
  async close(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.end({ timeout: 5 })));
  }
}
