/**
 * Typebox schema for the YAML configuration file.
 *
 * Keys keep the snake_case spelling operators write; `normalizeConfig`
 * turns a validated document into the camelCase AgentConfig the rest of
 * the agent uses.
 */

import { Type, type Static } from "@sinclair/typebox";

const FunctionEntry = Type.Tuple([Type.String({ minLength: 1 }), Type.Integer({ minimum: 1 })]);

const FunctionList = Type.Union([Type.Array(FunctionEntry), Type.Null()]);

const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const ConfigFile = Type.Object({
  postgres: Type.Object({
    host: Type.Optional(Type.String()),
    port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    user: Type.String({ minLength: 1 }),
    password: OptionalString,
    databases: Type.Optional(Type.Union([Type.Array(Type.String({ minLength: 1 })), Type.Null()])),
    /** Single database, accepted for older configuration files */
    database: Type.Optional(Type.String({ minLength: 1 })),
    data_dir: OptionalString,
    connect_timeout: Type.Optional(Type.Integer({ minimum: 1 })),
  }),
  log: Type.Optional(
    Type.Object({
      log_level: Type.Optional(Type.String()),
      log_to_stderr: Type.Optional(Type.Boolean()),
      log_to_file: Type.Optional(Type.Boolean()),
      filename: OptionalString,
      rotate_file_log: Type.Optional(Type.Boolean()),
      file_rotate_max_size: Type.Optional(Type.Integer({ minimum: 1024 })),
      pretty: Type.Optional(Type.Boolean()),
    }),
  ),
  ffwd: Type.Optional(
    Type.Object({
      host: Type.Optional(Type.String()),
      port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    }),
  ),
  fetch_timeout_seconds: Type.Optional(Type.Integer({ minimum: 1 })),
  http: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      host: Type.Optional(Type.String()),
      port: Type.Optional(Type.Integer({ minimum: 0, maximum: 65535 })),
    }),
  ),
  db_functions: Type.Optional(FunctionList),
  global_db_functions: Type.Optional(FunctionList),
  /** Deprecated alias of global_db_functions */
  data_dir_functions: Type.Optional(FunctionList),
});

export type ConfigFile = Static<typeof ConfigFile>;

/** `[metric name, interval in seconds]` */
type FunctionEntry = Static<typeof FunctionEntry>;

export interface AgentConfig {
  postgres: {
    host: string;
    port: number;
    user: string;
    password: string;
    databases: string[];
    dataDir: string | null;
    connectTimeoutSeconds: number;
  };
  log: {
    level: string;
    toStderr: boolean;
    toFile: boolean;
    filename: string | null;
    rotate: boolean;
    /** Size in bytes at which the log file is rotated */
    rotateMaxBytes: number;
    pretty: boolean;
  };
  ffwd: {
    host: string;
    port: number;
  };
  fetchTimeoutSeconds: number;
  http: {
    enabled: boolean;
    host: string;
    port: number;
  };
  dbFunctions: FunctionEntry[];
  globalDbFunctions: FunctionEntry[];
  /** Whether the deprecated data_dir_functions key was used */
  usedDeprecatedDataDirFunctions: boolean;
}
