/**
 * Time source used by backoff sleeps, key expiry and webhook tolerance checks
 */
export interface Clock {
  /**
   * Current time in milliseconds since the epoch
   */
  now(): number;

  /**
   * Resolves after `ms` milliseconds, or early once `signal` aborts
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by `Date.now` and `setTimeout`
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export const systemClock: Clock = new SystemClock();
