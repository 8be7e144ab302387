/**
 * Task target: one MetricTask bound to one database (or to the cluster),
 * with the run state the scheduler keeps for it between cycles.
 */

import type { MetricRecord, MetricTask, TaskStatus } from "@pg-metrics/shared";
import type { Clock } from "../context.js";
import { FormatFailure, TaskFetchFailure, type TaskFailure } from "../errors.js";
import type { Formatter, Sample } from "../formatters/types.js";
import { withDeadline } from "../sources/deadline.js";
import type { StatResources, StatSource } from "../sources/types.js";

export type ExecutionResult =
  | { ok: true; records: MetricRecord[] }
  | { ok: false; error: TaskFailure };

export interface TaskRunState<R> {
  runs: number;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastError: TaskFailure | null;
  consecutiveFailures: number;
  /** Replaced only after a successful fetch + format */
  previousSample: Sample<R> | undefined;
  /** Timestamp of the last emitted records; keeps timestamps non-decreasing */
  lastTimestamp: number;
  nextDueAt: number | null;
}

/** What a target needs from the scheduler to run one cycle */
export interface ExecuteEnvironment {
  clock: Clock;
  host: string;
  resources: StatResources;
  fetchTimeoutMs: number;
  /** Shutdown signal */
  signal?: AbortSignal;
}

export interface TaskTargetOptions {
  task: MetricTask;
  /** Value of the `database` tag; null for cluster-wide targets */
  database: string | null;
  /** Database the source connects to */
  connectDatabase: string;
}

/** Scheduler-facing view of a target, independent of its raw result type */
export interface TaskTarget {
  readonly task: MetricTask;
  readonly database: string | null;
  readonly nextDueAt: number | null;
  readonly lastRunAt: number | null;
  readonly consecutiveFailures: number;
  execute(env: ExecuteEnvironment): Promise<ExecutionResult>;
  /** nextDue = lastRunAt + interval; "now" if the target never ran */
  scheduleNext(now: number): void;
  status(): TaskStatus;
}

export class MetricTarget<R> implements TaskTarget {
  readonly task: MetricTask;
  readonly database: string | null;
  private connectDatabase: string;
  private state: TaskRunState<R> = {
    runs: 0,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    consecutiveFailures: 0,
    previousSample: undefined,
    lastTimestamp: 0,
    nextDueAt: null,
  };

  constructor(
    options: TaskTargetOptions,
    private source: StatSource<R>,
    private formatter: Formatter<R>,
  ) {
    this.task = options.task;
    this.database = options.database;
    this.connectDatabase = options.connectDatabase;
  }

  get nextDueAt(): number | null {
    return this.state.nextDueAt;
  }

  get lastRunAt(): number | null {
    return this.state.lastRunAt;
  }

  get consecutiveFailures(): number {
    return this.state.consecutiveFailures;
  }

  /** Run one fetch + format cycle. Never throws. */
  async execute(env: ExecuteEnvironment): Promise<ExecutionResult> {
    const state = this.state;
    state.runs++;
    state.lastRunAt = env.clock.now();

    let raw: R;
    try {
      raw = await withDeadline(
        (signal) =>
          this.source.fetch({ database: this.connectDatabase, signal, resources: env.resources }),
        env.fetchTimeoutMs,
        env.signal,
      );
    } catch (err) {
      const error =
        err instanceof TaskFetchFailure || err instanceof FormatFailure
          ? err
          : new TaskFetchFailure(String(err), { cause: err });
      // shutdown is not a task failure; run state stays as it was
      if (env.signal?.aborted) return { ok: false, error };
      return this.fail(error);
    }

    const current: Sample<R> = {
      raw,
      takenAt: Math.max(env.clock.now(), state.lastTimestamp),
    };
    let records: MetricRecord[];
    try {
      records = this.formatter({
        current,
        previous: state.previousSample,
        meta: this.database === null ? { host: env.host } : { host: env.host, database: this.database },
      });
    } catch (err) {
      return this.fail(
        err instanceof FormatFailure
          ? err
          : new FormatFailure(err instanceof Error ? err.message : String(err), { cause: err }),
      );
    }

    state.previousSample = current;
    state.lastTimestamp = current.takenAt;
    state.lastSuccessAt = current.takenAt;
    state.lastError = null;
    state.consecutiveFailures = 0;
    return { ok: true, records };
  }

  scheduleNext(now: number): void {
    const { lastRunAt } = this.state;
    this.state.nextDueAt = lastRunAt === null ? now : lastRunAt + this.task.intervalSeconds * 1000;
  }

  status(): TaskStatus {
    const { runs, lastRunAt, lastSuccessAt, nextDueAt, lastError, consecutiveFailures } = this.state;
    return {
      task: this.task.name,
      database: this.database,
      scope: this.task.scope,
      intervalSeconds: this.task.intervalSeconds,
      runs,
      consecutiveFailures,
      lastRunAt: toIso(lastRunAt),
      lastSuccessAt: toIso(lastSuccessAt),
      nextDueAt: toIso(nextDueAt),
      lastError: lastError?.message ?? null,
    };
  }

  private fail(error: TaskFailure): ExecutionResult {
    this.state.consecutiveFailures++;
    this.state.lastError = error;
    return { ok: false, error };
  }
}

function toIso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}
