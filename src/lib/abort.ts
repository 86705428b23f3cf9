/** Abort reason used when a combined signal fires because its deadline passed. */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Combine an optional caller signal with a timeout. The returned signal aborts
 * with the caller's reason, or with a DeadlineExceededError when the timeout
 * fires first. Call `cleanup` once the guarded operation settles.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();

  const abortCombined = (reason: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const timeout = setTimeout(() => abortCombined(new DeadlineExceededError(timeoutMs)), timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => abortCombined(callerSignal?.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

/** Reject when the signal aborts even if the underlying call ignores it. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
