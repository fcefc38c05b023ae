import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, RetryableError, sleep } from '../../src/utils/retry.js';

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 250, factor: 2, jitterMs: 120, random: () => 0.5 });

  it('backs off exponentially with jitter', () => {
    expect(policy.delayFor(1)).toBe(310);
    expect(policy.delayFor(2)).toBe(560);
  });

  it('retries only retryable errors', async () => {
    const quick = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, factor: 2, jitterMs: 0 });
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RetryableError('busy', 503))
      .mockResolvedValueOnce('ok');

    await expect(quick.execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('rethrows other errors immediately', async () => {
    const quick = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, factor: 2, jitterMs: 0 });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(quick.execute(fn)).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops after the last attempt', async () => {
    const quick = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0, factor: 2, jitterMs: 0 });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new RetryableError('busy', 503));

    await expect(quick.execute(fn)).rejects.toBeInstanceOf(RetryableError);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('never goes below one attempt', () => {
    expect(new RetryPolicy({ maxAttempts: 0, baseDelayMs: 0, factor: 2, jitterMs: 0 }).maxAttempts).toBe(1);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
  });
});
