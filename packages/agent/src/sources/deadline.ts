/**
 * Per-fetch deadline. The fetch gets its own abort signal, which fires when
 * the deadline passes or the parent (shutdown) signal aborts; the returned
 * promise settles at that moment even if the fetch ignores its signal.
 */

import { AgentError, TaskFetchFailure } from "../errors.js";

export function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const fail = (failure: TaskFetchFailure) => {
      cleanup();
      controller.abort(failure);
      reject(failure);
    };
    const onParentAbort = () => fail(new TaskFetchFailure("fetch abandoned on shutdown"));
    const timer = setTimeout(
      () => fail(new TaskFetchFailure(`fetch timed out after ${timeoutMs} ms`)),
      timeoutMs,
    );
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener("abort", onParentAbort, { once: true });

    void Promise.resolve()
      .then(() => run(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (err: unknown) => {
          cleanup();
          reject(
            err instanceof AgentError
              ? err
              : new TaskFetchFailure(err instanceof Error ? err.message : String(err), { cause: err }),
          );
        },
      );
  });
}

/** Cancel a pending postgres.js query when the signal aborts */
export function cancelOnAbort<Q extends { cancel(): unknown }>(query: Q, signal: AbortSignal): Q {
  if (signal.aborted) {
    query.cancel();
  } else {
    signal.addEventListener("abort", () => query.cancel(), { once: true });
  }
  return query;
}
