import { describe, expect, test, vi } from 'vitest';

import { RetryPolicy } from './retry-policy';

describe('RetryPolicy', () => {
  describe('constructor', () => {
    test('rejects invalid settings', () => {
      expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
      expect(() => new RetryPolicy({ multiplier: 0.5 })).toThrow(RangeError);
      expect(() => new RetryPolicy({ jitter: -1 })).toThrow(RangeError);
    });
  });

  describe('delayFor', () => {
    test('grows exponentially up to the cap', () => {
      const policy = new RetryPolicy({
        baseDelayMs: 100,
        maxDelayMs: 1000,
        multiplier: 2,
        jitter: 0.5,
        random: () => 0,
      });

      expect([0, 1, 2, 3, 4].map((n) => policy.delayFor(n))).toEqual([
        100, 200, 400, 800, 1000,
      ]);
    });

    test('adds jitter proportional to the delay', () => {
      const policy = new RetryPolicy({
        baseDelayMs: 100,
        jitter: 0.5,
        random: () => 0.5,
      });

      expect(policy.delayFor(1)).toBe(250);
    });

    test('applies the scale factor', () => {
      const policy = new RetryPolicy({
        baseDelayMs: 100,
        jitter: 0,
      });

      expect(policy.delayFor(0, 4)).toBe(400);
    });
  });

  describe('execute', () => {
    test('returns the first successful result', async () => {
      const policy = new RetryPolicy({ baseDelayMs: 0 });
      const fn = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(new Error('reset'))
        .mockResolvedValueOnce('ok');

      await expect(policy.execute(fn)).resolves.toBe('ok');
      expect(fn).toHaveBeenNthCalledWith(1, 1);
      expect(fn).toHaveBeenNthCalledWith(2, 2);
    });

    test('rethrows the last error after maxAttempts', async () => {
      const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 });
      let calls = 0;

      await expect(
        policy.execute(async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        }),
      ).rejects.toThrow('failure 3');
      expect(calls).toBe(3);
    });

    test('stops at errors that are not retryable', async () => {
      const policy = new RetryPolicy({ baseDelayMs: 0 });
      const fn = vi.fn(async () => {
        throw new Error('bad request');
      });

      await expect(
        policy.execute(fn, { shouldRetry: () => false }),
      ).rejects.toThrow('bad request');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    test('reports non-decreasing delays across mixed error kinds', async () => {
      vi.useFakeTimers();
      const policy = new RetryPolicy({
        maxAttempts: 5,
        baseDelayMs: 100,
        maxDelayMs: 2000,
        jitter: 0,
      });
      const slow = new Error('overloaded');
      const errors = [slow, new Error('reset'), new Error('reset'), slow];
      const delays: number[] = [];

      const promise = policy.execute(
        async (attempt) => {
          const error = errors[attempt - 1];
          if (error) throw error;
          return attempt;
        },
        {
          delayScale: (error) => (error === slow ? 4 : 1),
          onRetry: ({ delayMs }) => delays.push(delayMs),
        },
      );
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe(5);
      expect(delays).toEqual([400, 400, 400, 2000]);
    });

    test('aborting interrupts the backoff sleep', async () => {
      const policy = new RetryPolicy({ baseDelayMs: 60_000, jitter: 0 });
      const controller = new AbortController();

      const promise = policy.execute(
        async () => {
          throw new Error('reset');
        },
        {
          signal: controller.signal,
          onRetry: () => controller.abort(),
        },
      );

      await expect(promise).rejects.toThrow();
    });
  });
});
