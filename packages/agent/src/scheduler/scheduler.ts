/**
 * Scheduler: drives every task target on its own interval (long-running
 * mode) or exactly once (one-shot mode) and routes the records to sinks.
 *
 * Targets run one at a time, so run state needs no locking. A target that
 * fails is logged and skipped; only a fatal sink error or the shutdown
 * signal ends the loop.
 */

import type { MetricRecord, TaskStatus } from "@pg-metrics/shared";
import type { AgentContext } from "../context.js";
import type { TaskFailure } from "../errors.js";
import type { MetricSink } from "../sinks/types.js";
import type { StatResources } from "../sources/types.js";
import type { ExecutionResult, TaskTarget } from "./target.js";

const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface SchedulerOptions {
  resources: StatResources;
  /** Deadline for a single fetch (default: 30s) */
  fetchTimeoutMs?: number;
}

export interface TargetFailure {
  task: string;
  database: string | null;
  error: TaskFailure;
}

export interface RunOnceResult {
  /** Configuration order, then formatter order */
  records: MetricRecord[];
  failures: TargetFailure[];
}

export class Scheduler {
  private ctx: AgentContext;
  private targets: readonly TaskTarget[];
  private resources: StatResources;
  private fetchTimeoutMs: number;

  constructor(ctx: AgentContext, targets: readonly TaskTarget[], options: SchedulerOptions) {
    this.ctx = ctx;
    this.targets = targets;
    this.resources = options.resources;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  /** Run every target exactly once, in configuration order */
  async runOnce(signal?: AbortSignal): Promise<RunOnceResult> {
    const records: MetricRecord[] = [];
    const failures: TargetFailure[] = [];

    for (const target of this.targets) {
      if (signal?.aborted) break;
      const result = await this.execute(target, signal);
      if (result.ok) {
        records.push(...result.records);
      } else {
        failures.push({ task: target.task.name, database: target.database, error: result.error });
      }
    }

    return { records, failures };
  }

  /**
   * Run targets on their intervals until `signal` aborts. Each tick runs
   * every due target, delivers the batch to all sinks, then sleeps until
   * the nearest next-due time.
   *
   * Rejects only when a sink reports a fatal DeliveryFailure.
   */
  async runForever(sinks: readonly MetricSink[], signal: AbortSignal): Promise<void> {
    const { clock, logger } = this.ctx;

    if (this.targets.length === 0) {
      logger.warn("no metric tasks configured, waiting for shutdown");
      await waitForAbort(signal);
      return;
    }

    const start = clock.now();
    for (const target of this.targets) target.scheduleNext(start);

    logger.info(
      { targets: this.targets.length, sinks: sinks.map((s) => s.name) },
      "starting metrics polling loop",
    );

    while (!signal.aborted) {
      const now = clock.now();
      const batch: MetricRecord[] = [];

      for (const target of this.targets) {
        if (signal.aborted) break;
        if ((target.nextDueAt ?? now) > now) continue;
        const result = await this.execute(target, signal);
        target.scheduleNext(now);
        if (result.ok) batch.push(...result.records);
      }

      if (batch.length > 0) {
        await deliverAll(sinks, batch);
      }
      if (signal.aborted) break;

      const nextDue = Math.min(...this.targets.map((t) => t.nextDueAt ?? now));
      await clock.sleep(Math.max(0, nextDue - clock.now()), signal);
    }

    logger.info("metrics polling loop stopped");
  }

  /** Run one target and log the outcome. Never throws. */
  async execute(target: TaskTarget, signal?: AbortSignal): Promise<ExecutionResult> {
    const { logger, clock, host } = this.ctx;
    const result = await target.execute({
      clock,
      host,
      resources: this.resources,
      fetchTimeoutMs: this.fetchTimeoutMs,
      signal,
    });

    const fields = { task: target.task.name, database: target.database ?? undefined };
    if (result.ok) {
      logger.debug({ ...fields, records: result.records.length }, "metric task completed");
    } else if (signal?.aborted) {
      logger.debug(fields, "metric task abandoned on shutdown");
    } else {
      logger.warn(
        { ...fields, consecutiveFailures: target.consecutiveFailures, err: result.error },
        "metric task failed",
      );
    }
    return result;
  }

  /** Run state of every target, in configuration order */
  snapshot(): TaskStatus[] {
    return this.targets.map((t) => t.status());
  }
}

/** Hand the same batch to every sink; a fatal sink error propagates */
export async function deliverAll(
  sinks: readonly MetricSink[],
  records: readonly MetricRecord[],
): Promise<void> {
  for (const sink of sinks) {
    await sink.deliver(records);
  }
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}
