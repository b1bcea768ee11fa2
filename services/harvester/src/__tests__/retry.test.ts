import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../lib/retry.js';

describe('RetryPolicy', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ sleep });
    expect(await policy.run(async () => 'ok')).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits the fixed backoff between attempts', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep });
    let calls = 0;
    const result = await policy.run(async (attempt) => {
      calls++;
      if (attempt < 3) throw new Error(`attempt ${attempt}`);
      return attempt;
    });
    expect(result).toBe(3);
    expect(calls).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 5000]);
  });

  it('rethrows the last failure once attempts are spent', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ maxAttempts: 2, backoffMs: 10, sleep });
    await expect(
      policy.run(async (attempt) => {
        throw new Error(`attempt ${attempt}`);
      }),
    ).rejects.toThrow('attempt 2');
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('stops at a failure that is not retryable', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ sleep, isRetryable: () => false });
    let calls = 0;
    await expect(
      policy.run(async () => {
        calls++;
        throw new Error('fatal');
      }),
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats maxAttempts below one as a single attempt', () => {
    expect(new RetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
  });
});
