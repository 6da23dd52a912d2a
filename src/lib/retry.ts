export interface RetryPolicy {
  /** Total attempts, including the first call */
  maxAttempts: number;
  /** Fixed wait between attempts */
  delayMs: number;
}

export interface RetryContext {
  attempt: number; // 1-based number of the attempt that just failed
  maxAttempts: number;
  error: unknown;
}

export interface RetryOptions {
  /** Called after every failed attempt, before waiting */
  onFailure?: (context: RetryContext) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 5_000,
};

/**
 * Runs `operation` until it resolves or `maxAttempts` calls have failed.
 * Rethrows the last error; no wait after the final attempt.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      options.onFailure?.({ attempt, maxAttempts, error: err });

      if (attempt < maxAttempts && policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }

  throw lastError;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
