/**
 * Retry loop driven by an external decision function
 */

export type RetryVerdict =
  | { retry: true; delayMs: number }
  | { retry: false; error: unknown };

export interface RetryConfig {
  /** Decide, for the failed attempt, whether to wait and try again */
  decide: (error: unknown, attempt: number) => RetryVerdict;
  /** Callback for retry attempts */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Injectable wait, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds or `decide` gives up. `fn` receives the 1-based
 * attempt number; the same work is repeated on every attempt.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, config: RetryConfig): Promise<T> {
  const wait = config.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const verdict = config.decide(error, attempt);

      if (!verdict.retry) {
        throw verdict.error;
      }

      config.onRetry?.(attempt, error, verdict.delayMs);
      await wait(verdict.delayMs);
    }
  }
}
