import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import { backoffDelayMs, withRetry } from '../../../src/runtime/with-retry.js';
import { TimeoutError, withTimeout } from '../../../src/runtime/with-timeout.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

type Failure = { readonly retryable: boolean; readonly n: number };

function flaky(failures: readonly Failure[]): { op: () => ResultAsync<string, Failure>; calls: () => number } {
  let calls = 0;
  return {
    op: () => {
      const failure = failures[calls];
      calls += 1;
      return failure === undefined ? okAsync('done') : errAsync(failure);
    },
    calls: () => calls,
  };
}

const policy = { attempts: 4, baseDelayMs: 100, maxDelayMs: 250 };

describe('backoffDelayMs', () => {
  it('doubles from the base and caps at the maximum', () => {
    expect([1, 2, 3, 4].map((a) => backoffDelayMs(policy, a))).toEqual([100, 200, 250, 250]);
  });

  it('never exceeds the maximum', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 60 }), fc.integer({ min: 1, max: 10_000 }), (attempt, max) => {
        const delay = backoffDelayMs({ attempts: 100, baseDelayMs: 1, maxDelayMs: max }, attempt);
        return delay >= 1 && delay <= Math.max(1, max);
      })
    );
  });
});

describe('withRetry', () => {
  it('retries retryable failures with backoff', async () => {
    const slept: number[] = [];
    const retries: number[] = [];
    const { op, calls } = flaky([
      { retryable: true, n: 1 },
      { retryable: true, n: 2 },
    ]);

    const value = expectOk(
      await withRetry(op, {
        policy,
        sleep: async (ms) => {
          slept.push(ms);
        },
        isRetryable: (e) => e.retryable,
        onRetry: ({ attempt }) => retries.push(attempt),
      }),
      'retry'
    );

    expect(value).toBe('done');
    expect(calls()).toBe(3);
    expect(slept).toEqual([100, 200]);
    expect(retries).toEqual([1, 2]);
  });

  it('stops at the first non-retryable failure', async () => {
    const { op, calls } = flaky([{ retryable: false, n: 1 }]);
    const error = expectErr(
      await withRetry(op, { policy, sleep: async () => undefined, isRetryable: (e) => e.retryable }),
      'retry'
    );
    expect(error.n).toBe(1);
    expect(calls()).toBe(1);
  });

  it('returns the last failure once attempts run out', async () => {
    const failures = [1, 2, 3, 4, 5].map((n) => ({ retryable: true, n }));
    const { op, calls } = flaky(failures);
    const error = expectErr(
      await withRetry(op, { policy, sleep: async () => undefined, isRetryable: (e) => e.retryable }),
      'retry'
    );
    expect(error.n).toBe(4);
    expect(calls()).toBe(4);
  });

  it('always makes at least one attempt', async () => {
    const { op, calls } = flaky([{ retryable: true, n: 1 }]);
    await withRetry(op, {
      policy: { attempts: 0, baseDelayMs: 1, maxDelayMs: 1 },
      sleep: async () => undefined,
      isRetryable: () => true,
    });
    expect(calls()).toBe(1);
  });
});

describe('withTimeout', () => {
  it('passes through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'fast')).resolves.toBe(7);
  });

  it('rejects with a TimeoutError once the bound passes', async () => {
    const never = new Promise<number>(() => undefined);
    const failure = await withTimeout(never, 10, 'listing').catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(TimeoutError);
    expect(failure instanceof Error ? failure.message : null).toBe('listing timed out after 10ms');
  });
});
