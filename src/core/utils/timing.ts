/**
 * Wait for `ms` milliseconds. Rejects with the signal's reason as soon as the
 * signal aborts, clearing the pending timer.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential backoff capped at `maxDelay`; `attempt` starts at 1.
 */
export function backoffDelay(
  attempt: number,
  initialDelay: number,
  backoffMultiplier: number,
  maxDelay: number
): number {
  return Math.min(initialDelay * backoffMultiplier ** (attempt - 1), maxDelay);
}
