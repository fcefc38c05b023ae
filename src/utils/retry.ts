/**
 * Retry/backoff policy for upstream HTTP calls.
 *
 * delay(attempt) = baseDelayMs * factor^(attempt - 1) + uniform jitter in [0, jitterMs)
 */

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  jitterMs: number;
  random?: () => number;
}

export class RetryableError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : abortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : abortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly jitterMs: number;
  private random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.factor = options.factor;
    this.jitterMs = options.jitterMs;
    this.random = options.random ?? Math.random;
  }

  /** Delay before the retry that follows `attempt` (1-based). */
  delayFor(attempt: number): number {
    const backoff = this.baseDelayMs * Math.pow(this.factor, attempt - 1);
    return backoff + Math.floor(this.random() * this.jitterMs);
  }

  /**
   * Run `fn` until it succeeds, throws something other than RetryableError,
   * or attempts run out. Abort during a backoff wait rejects immediately.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!(error instanceof RetryableError) || attempt >= this.maxAttempts) {
          throw error;
        }
        await sleep(this.delayFor(attempt), signal);
      }
    }
  }
}

/** Reranker defaults: 3 attempts, 250ms base, doubling, 0-120ms jitter. */
export const rerankerRetryPolicy = new RetryPolicy({
  maxAttempts: 3,
  baseDelayMs: 250,
  factor: 2,
  jitterMs: 120,
});
