import type postgres from "postgres";
import type { Logger } from "pino";

/** Shared resources stat sources read from */
export interface StatResources {
  /** Connection to the given database (created on first use) */
  sql(database: string): postgres.Sql;
  /** Postgres data directory on this host, if readable */
  readonly dataDir: string | null;
  /** `server_version_num`, e.g. 160002 */
  readonly serverVersion: number;
  /** For problems a source works around instead of failing */
  readonly logger: Logger;
}

export interface FetchContext {
  /** Database the source runs against (first database for cluster tasks) */
  database: string;
  /** Aborted when the fetch deadline passes or the agent shuts down */
  signal: AbortSignal;
  resources: StatResources;
}

/** Produces one raw result per call; throws on failure */
export interface StatSource<R> {
  fetch(context: FetchContext): Promise<R>;
}
