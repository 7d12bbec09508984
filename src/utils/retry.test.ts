import { describe, expect, it, vi } from 'vitest';
import { AbortedError } from './errors.js';
import { RateLimiter } from './rate-limiter.js';
import { withRetry } from './retry.js';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const sleepFn = vi.fn(async () => {});
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`boom ${attempt}`);
      return 'ok';
    });

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 100, factor: 2, sleepFn })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls).toEqual([[100], [200]]);
  });

  it('caps the delay at maxDelayMs', async () => {
    const sleepFn = vi.fn(async () => {});
    const fn = vi.fn(async () => {
      throw new Error('down');
    });

    await expect(
      withRetry(fn, { maxAttempts: 4, initialDelayMs: 100, maxDelayMs: 150, factor: 2, sleepFn })
    ).rejects.toThrow('down');
    expect(sleepFn.mock.calls).toEqual([[100], [150], [150]]);
  });

  it('stops when shouldRetry says no', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(
      withRetry(fn, { maxAttempts: 5, shouldRetry: () => false, sleepFn: async () => {} })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws AbortedError once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(fn, { signal: controller.signal, operation: 'fetch' })).rejects.toThrow(AbortedError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('RateLimiter', () => {
  it('waits out the remainder of the interval', async () => {
    let clock = 1_000;
    const sleepFn = vi.fn(async (ms: number) => {
      clock += ms;
    });
    const limiter = new RateLimiter(500, { sleepFn, now: () => clock });

    await limiter.waitForSlot();
    clock += 200;
    await limiter.waitForSlot();
    clock += 600;
    await limiter.waitForSlot();

    expect(sleepFn.mock.calls).toEqual([[300]]);
  });
});
