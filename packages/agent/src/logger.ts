/**
 * pino logger setup.
 *
 * Structured JSON to stderr by default (stdout is reserved for records in
 * one-shot mode), pretty-printed through pino-pretty when asked, and
 * optionally mirrored to a file, rotated by pino-roll.
 */

import pino, { type Logger, type LevelWithSilent } from "pino";

export interface LoggerOptions {
  /** pino level, or one of the legacy names (critical, warning, notice) */
  level?: string;
  /** Human-readable output via pino-pretty */
  pretty?: boolean;
  /** Write to stderr (default true) */
  stderr?: boolean;
  /** Also append JSON lines to this file */
  file?: string | null;
  /** Rotate `file` at this size in bytes; null appends without limit */
  rotateMaxBytes?: number | null;
}

/** Rotated files kept beside the active one */
export const ROTATED_FILES_KEPT = 5;

/** pino-roll transport target for a size-rotated log file */
export function rotatingFileTarget(file: string, maxBytes: number, level: LevelWithSilent): pino.TransportTargetOptions {
  return {
    target: "pino-roll",
    level,
    options: {
      file,
      size: `${Math.max(1, Math.ceil(maxBytes / 1024))}k`,
      mkdir: true,
      limit: { count: ROTATED_FILES_KEPT },
    },
  };
}

const LEVEL_ALIASES: Record<string, LevelWithSilent> = {
  critical: "fatal",
  warning: "warn",
  notice: "info",
  notset: "trace",
};

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/** Map a configured level name onto a pino level (default "info") */
export function resolveLevel(level: string | undefined): LevelWithSilent {
  const normalized = (level ?? "info").trim().toLowerCase();
  const alias = LEVEL_ALIASES[normalized];
  if (alias) return alias;
  return LEVELS.find((l) => l === normalized) ?? "info";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options.level);
  const base = { name: "pg-metrics" };

  if (options.pretty && !options.file) {
    return pino({
      level,
      base,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }

  if (level === "silent") {
    return pino({ level, base });
  }

  if (options.file && options.rotateMaxBytes) {
    const targets: pino.TransportTargetOptions[] = [];
    if (options.stderr !== false) {
      targets.push({ target: "pino/file", level, options: { destination: 2 } });
    }
    targets.push(rotatingFileTarget(options.file, options.rotateMaxBytes, level));
    return pino({ level, base }, pino.transport({ targets }));
  }

  const streams: pino.StreamEntry[] = [];
  if (options.stderr !== false) {
    streams.push({ level, stream: pino.destination(2) });
  }
  if (options.file) {
    streams.push({
      level,
      stream: pino.destination({ dest: options.file, mkdir: true, sync: false }),
    });
  }
  if (streams.length === 0) {
    return pino({ level: "silent", base });
  }

  return pino({ level, base }, pino.multistream(streams));
}
