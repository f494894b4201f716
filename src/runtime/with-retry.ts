import { ResultAsync, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Sleep } from './sleep.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryOptions<E> {
  readonly policy: RetryPolicy;
  readonly sleep: Sleep;
  readonly isRetryable: (error: E) => boolean;
  readonly onRetry?: (info: { readonly attempt: number; readonly delayMs: number; readonly error: E }) => void;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Re-run `operation` while it fails with a retryable error, with bounded
 * exponential backoff. The last error is returned once attempts run out.
 */
export function withRetry<T, E>(operation: () => ResultAsync<T, E>, options: RetryOptions<E>): ResultAsync<T, E> {
  const attempts = Math.max(1, options.policy.attempts);

  const run = async (): Promise<Result<T, E>> => {
    let attempt = 1;
    for (;;) {
      const result = await operation();
      if (result.isOk()) return result;
      if (attempt >= attempts || !options.isRetryable(result.error)) return err(result.error);

      const delayMs = backoffDelayMs(options.policy, attempt);
      options.onRetry?.({ attempt, delayMs, error: result.error });
      await options.sleep(delayMs);
      attempt += 1;
    }
  };

  return new ResultAsync(run());
}
