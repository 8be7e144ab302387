/**
 * Locate the Postgres data directory on this host.
 *
 * Order: configured path, then $PGDATA, then the Debian layout
 * /var/lib/postgresql/<major>/main. A path that is not a directory
 * resolves to null.
 */

import { stat } from "node:fs/promises";
import type { Logger } from "pino";

/** "16" for 160002, "9.6" for 90605 */
export function majorVersion(serverVersion: number): string {
  if (serverVersion >= 100_000) return String(Math.floor(serverVersion / 10_000));
  const major = Math.floor(serverVersion / 10_000);
  const minor = Math.floor((serverVersion % 10_000) / 100);
  return `${major}.${minor}`;
}

export async function resolveDataDir(
  configured: string | null,
  serverVersion: number,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  const candidate =
    configured || env.PGDATA || `/var/lib/postgresql/${majorVersion(serverVersion)}/main`;

  try {
    if ((await stat(candidate)).isDirectory()) {
      logger.debug({ dataDir: candidate }, "using postgres data directory");
      return candidate;
    }
    logger.warn({ dataDir: candidate }, "postgres data directory is not a directory");
  } catch (err) {
    logger.warn({ dataDir: candidate, err }, "postgres data directory is not accessible");
  }
  return null;
}
