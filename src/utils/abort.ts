/**
 * Waits `ms` milliseconds. Resolves `true` when the full interval elapsed and
 * `false` as soon as `signal` aborts; the timer never outlives the call.
 */
export const delay = (ms: number, signal?: AbortSignal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      resolve(false);
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RequestSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/** Combines a request timeout with the caller's cancellation signal. */
export const createRequestSignal = (timeoutMs: number, parent?: AbortSignal): RequestSignal => {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
};
