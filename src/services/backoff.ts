// src/services/backoff.ts
export type RetryOptions = {
  tries?: number;
  /** first delay; doubles each retry. 0 retries immediately */
  baseDelayMs?: number;
  onRetry?: (err: unknown, attempt: number) => void;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Runs `fn` until it resolves or `tries` attempts have failed, then rethrows
 * the last error. Every failure is treated as transient.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const tries = opts.tries ?? 3;
  const base = opts.baseDelayMs ?? 1000;
  let lastErr: unknown = new Error("withRetry called with tries < 1");

  for (let a = 0; a < tries; a++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (a === tries - 1) break;
      opts.onRetry?.(e, a + 1);
      if (base > 0) {
        // jittered backoff: base, 2*base, 4*base (+ jitter)
        await sleep(base * Math.pow(2, a) + Math.floor(Math.random() * 300));
      }
    }
  }
  throw lastErr;
}
