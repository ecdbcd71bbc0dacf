import { performance } from 'node:perf_hooks';

/**
 * Time source for pipelines. `now()` is monotonic and only meaningful relative to other
 * readings from the same clock; `wallNow()` is used for artifact names and catalog rows.
 */
export interface Clock {
  now(): number;
  wallNow(): Date;
  /** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now() {
    return performance.now();
  },
  wallNow() {
    return new Date();
  },
  sleep(ms, signal) {
    return new Promise<void>(resolve => {
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
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
};
