/**
 * Explicit runtime context handed to the scheduler, task targets and sinks.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";

/** Time source used for scheduling and record timestamps */
export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  /** Resolve after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Longest delay a Node timer accepts; longer ones fire after 1 ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    let remaining = ms;
    while (remaining > 0) {
      if (signal?.aborted) return;
      const step = Math.min(remaining, MAX_TIMER_MS);
      try {
        await delay(step, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
      remaining -= step;
    }
  },
};

export interface AgentContext {
  logger: Logger;
  /** Value of the `host` tag on every record */
  host: string;
  clock: Clock;
}
