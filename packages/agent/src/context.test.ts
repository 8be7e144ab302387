import { describe, it, expect, vi, beforeEach } from "vitest";
import { MAX_TIMER_MS, systemClock } from "./context.js";

const delay = vi.hoisted(() =>
  vi.fn(async (_ms: number, _value?: unknown, _options?: { signal?: AbortSignal }): Promise<void> => undefined),
);

vi.mock("node:timers/promises", () => ({ setTimeout: delay }));

const THIRTY_DAYS_MS = 30 * 24 * 3600 * 1000;

describe("systemClock.sleep", () => {
  beforeEach(() => {
    delay.mockClear();
  });

  it("waits in one timer when the delay fits", async () => {
    await systemClock.sleep(60_000);

    expect(delay.mock.calls.map((call) => call[0])).toEqual([60_000]);
  });

  it("splits delays longer than a timer can hold", async () => {
    await systemClock.sleep(THIRTY_DAYS_MS);

    expect(delay.mock.calls.map((call) => call[0])).toEqual([
      MAX_TIMER_MS,
      THIRTY_DAYS_MS - MAX_TIMER_MS,
    ]);
  });

  it("stops between chunks once aborted", async () => {
    const controller = new AbortController();
    delay.mockImplementationOnce(async () => {
      controller.abort();
      return undefined;
    });

    await systemClock.sleep(THIRTY_DAYS_MS, controller.signal);

    expect(delay).toHaveBeenCalledOnce();
  });

  it("does not wait at all when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await systemClock.sleep(1000, controller.signal);

    expect(delay).not.toHaveBeenCalled();
  });

  it("returns quietly when the timer is aborted", async () => {
    const controller = new AbortController();
    delay.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error("The operation was aborted");
    });

    await expect(systemClock.sleep(1000, controller.signal)).resolves.toBeUndefined();
  });
});
