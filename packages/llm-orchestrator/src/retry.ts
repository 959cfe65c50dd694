/**
 * Transport retry policy for inference calls.
 *
 * Attempts are counted in total, so `maxAttempts: 3` means one call plus at
 * most two retries. Delays grow as base * 2^(attempt-1), capped, plus jitter.
 * This is the only retry layer in the system; the orchestrator never retries.
 */

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the random delay added to each backoff */
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  jitterMs: 500,
};

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((r) => setTimeout(r, ms));

export function computeBackoff(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return exponential + random() * policy.jitterMs;
}

export interface RetryOptions {
  policy: RetryPolicy;
  shouldRetry: (err: unknown) => boolean;
  sleep?: SleepFn;
  random?: () => number;
  /** Called before each backoff wait */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it resolves, a non-retryable error is thrown, or the attempt
 * budget is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(opts.policy.maxAttempts));
  const wait = opts.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !opts.shouldRetry(err)) throw err;
      const delayMs = computeBackoff(attempt, opts.policy, opts.random);
      opts.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
