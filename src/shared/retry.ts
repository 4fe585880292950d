import { logger } from './logger.js';
import { errorMessage } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before attempt n+1 is `retryIntervalMillis * n`. */
  retryIntervalMillis: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
  label: string;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an idempotent operation with a bounded number of attempts and linear backoff.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const retryable = opts.shouldRetry ? opts.shouldRetry(err) : true;
      if (!retryable || attempt === attempts || opts.signal?.aborted) {
        throw err;
      }
      logger.warn(`${opts.label} failed, retrying`, {
        attempt,
        attempts,
        error: errorMessage(err),
      });
      await sleep(opts.retryIntervalMillis * attempt, opts.signal);
    }
  }

  throw lastError;
}
