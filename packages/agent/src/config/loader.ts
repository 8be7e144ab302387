/**
 * Configuration loading.
 *
 * Reads `<dir>/default/<file>` (if present) and then `<dir>/<file>`,
 * merges the latter over the former, validates the result against the
 * typebox schema and normalises it. Every problem is a SetupFailure.
 */

import { readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import * as yaml from "js-yaml";
import { Value } from "@sinclair/typebox/value";
import { SetupFailure, errorMessage } from "../errors.js";
import { mergeConfigs } from "./merge.js";
import { ConfigFile, type AgentConfig } from "./schema.js";

export const DEFAULT_CONFIG_PATH = "/etc/pg-metrics/pg-metrics.yml";

const DEFAULT_FETCH_TIMEOUT_SECONDS = 30;
const DEFAULT_FFWD_HOST = "127.0.0.1";
const DEFAULT_FFWD_PORT = 19000;
const DEFAULT_ROTATE_MAX_BYTES = 10 * 1024 * 1024;

/** Candidate files, lowest precedence first */
export function configCandidates(configPath: string): string[] {
  const dir = dirname(configPath);
  const file = basename(configPath);
  return [join(dir, "default", file), configPath];
}

async function readYaml(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw new SetupFailure(`cannot read configuration ${path}: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return yaml.load(text, { filename: path }) ?? {};
  } catch (err) {
    throw new SetupFailure(`cannot parse configuration ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<AgentConfig> {
  let merged: unknown = undefined;
  for (const path of configCandidates(configPath)) {
    const doc = await readYaml(path);
    if (doc === undefined) continue;
    merged = merged === undefined ? doc : mergeConfigs(doc, merged);
  }
  if (merged === undefined) {
    throw new SetupFailure(`configuration not found: ${configPath}`);
  }
  return parseConfig(merged);
}

/** Validate a merged configuration document and normalise it */
export function parseConfig(document: unknown): AgentConfig {
  const converted = Value.Convert(ConfigFile, document);
  if (!Value.Check(ConfigFile, converted)) {
    const problems = [...Value.Errors(ConfigFile, converted)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new SetupFailure(`invalid configuration: ${problems.join("; ")}`);
  }
  return normalizeConfig(converted);
}

export function normalizeConfig(file: ConfigFile): AgentConfig {
  const pg = file.postgres;
  const databases = pg.databases ?? (pg.database ? [pg.database] : []);
  if (databases.length === 0) {
    throw new SetupFailure("no target databases defined in configuration");
  }

  const dataDirFunctions = file.data_dir_functions ?? [];

  return {
    postgres: {
      host: pg.host ?? "127.0.0.1",
      port: pg.port ?? 5432,
      user: pg.user,
      password: pg.password ?? "",
      databases,
      dataDir: pg.data_dir || null,
      connectTimeoutSeconds: pg.connect_timeout ?? 10,
    },
    log: {
      level: file.log?.log_level ?? "info",
      toStderr: file.log?.log_to_stderr ?? true,
      toFile: file.log?.log_to_file ?? false,
      filename: file.log?.filename || null,
      rotate: file.log?.rotate_file_log ?? true,
      rotateMaxBytes: file.log?.file_rotate_max_size ?? DEFAULT_ROTATE_MAX_BYTES,
      pretty: file.log?.pretty ?? false,
    },
    ffwd: {
      host: file.ffwd?.host ?? DEFAULT_FFWD_HOST,
      port: file.ffwd?.port ?? DEFAULT_FFWD_PORT,
    },
    fetchTimeoutSeconds: file.fetch_timeout_seconds ?? DEFAULT_FETCH_TIMEOUT_SECONDS,
    http: {
      enabled: file.http?.enabled ?? false,
      host: file.http?.host ?? "127.0.0.1",
      port: file.http?.port ?? 9187,
    },
    dbFunctions: file.db_functions ?? [],
    globalDbFunctions: [...dataDirFunctions, ...(file.global_db_functions ?? [])],
    usedDeprecatedDataDirFunctions: dataDirFunctions.length > 0,
  };
}
