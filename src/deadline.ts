import { CancelledError } from './errors';
import { log } from './log';

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timeout after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export interface DeadlineOptions {
  label: string;
  timeoutMs: number;
  /** Caller-side cancellation, e.g. the client hanging up. */
  signal?: AbortSignal;
}

/**
 * Run `fn` with a wall-clock deadline.
 *
 * `fn` receives a signal that aborts on timeout or caller cancellation. The
 * returned promise settles at the deadline even when `fn` ignores its
 * signal; a late result is dropped.
 */
export function withDeadline<T>(fn: (signal: AbortSignal) => Promise<T>, opts: DeadlineOptions): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onCallerAbort);
      settle();
    };

    const onCallerAbort = (): void => {
      const reason = new CancelledError();
      controller.abort(reason);
      finish(() => reject(reason));
    };

    const timer = setTimeout(() => {
      const reason = new DeadlineExceededError(opts.label, opts.timeoutMs);
      controller.abort(reason);
      finish(() => reject(reason));
    }, opts.timeoutMs);

    if (opts.signal?.aborted) {
      onCallerAbort();
      return;
    }
    opts.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let work: Promise<T>;
    try {
      work = fn(controller.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }

    work.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => {
        if (settled) {
          log.debug({ event: 'late_failure', label: opts.label, err }, 'operation failed after its deadline');
          return;
        }
        finish(() => reject(err));
      },
    );
  });
}
