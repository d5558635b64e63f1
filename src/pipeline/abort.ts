/**
 * Per-call abort scopes.
 *
 * Each provider call gets its own controller that aborts when the run's
 * signal aborts or when the call's timeout elapses, whichever is first.
 */

export interface CallScope {
  readonly signal: AbortSignal;
  /** True once the timeout (not the run signal) aborted the call */
  timedOut(): boolean;
  /** Clear the timer and detach from the run signal */
  dispose(): void;
}

export function createCallScope(timeoutMs: number, parent?: AbortSignal): CallScope {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The call
 * behind `promise` is left to observe the same signal.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error("aborted"));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
