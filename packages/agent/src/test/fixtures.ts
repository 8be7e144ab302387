/**
 * Shared test fixtures: a manual clock, a silent logger and stat resources
 * that refuse database access.
 */

import pino from "pino";
import type { Clock, AgentContext } from "../context.js";
import type { StatResources } from "../sources/types.js";

export interface ManualClock extends Clock {
  /** Current time, settable from the test */
  time: number;
  sleeps: number[];
}

/**
 * Clock whose `sleep` advances time instantly. `onSleep` runs after each
 * advance, e.g. to abort the loop once a point in time is reached.
 */
export function manualClock(start = 0, onSleep?: (now: number) => void): ManualClock {
  const clock: ManualClock = {
    time: start,
    sleeps: [],
    now: () => clock.time,
    async sleep(ms) {
      clock.sleeps.push(ms);
      clock.time += ms;
      onSleep?.(clock.time);
    },
  };
  return clock;
}

export const silentLogger = pino({ level: "silent" });

export function testContext(clock: Clock = manualClock()): AgentContext {
  return { logger: silentLogger, host: "test-host", clock };
}

export function offlineResources(overrides?: Partial<StatResources>): StatResources {
  return {
    sql: () => {
      throw new Error("no database in tests");
    },
    dataDir: null,
    serverVersion: 160_000,
    logger: silentLogger,
    ...overrides,
  };
}
