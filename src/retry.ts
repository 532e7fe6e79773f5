import { log } from './log';

export interface RetryOptions {
  label: string;
  retries?: number;
  baseDelayMs?: number;
  /** Decides whether a failure is worth another attempt. */
  shouldRetry: (err: unknown) => boolean;
  /** Aborting stops further attempts and cuts the backoff sleep short. */
  signal?: AbortSignal;
}

/**
 * Retry an async operation with short exponential backoff.
 * Only retries failures the predicate classifies as transient.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxRetries = opts.retries ?? 1;
  const baseDelay = opts.baseDelayMs ?? 250;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      lastError = err;
      if (attempt >= maxRetries || !opts.shouldRetry(err) || opts.signal?.aborted) {
        throw err;
      }
      const delay = baseDelay * Math.pow(2, attempt);
      log.warn(
        { event: 'retry', label: opts.label, attempt: attempt + 1, maxRetries, delayMs: delay },
        `${opts.label} transient error, retrying`,
      );
      await sleep(delay, opts.signal);
    }
  }
  throw lastError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
