/**
 * Timeout and retry policy for provider calls.
 *
 * Every attempt runs under its own deadline. Failures the adapter marks as
 * transient (timeouts, 429, 5xx, dropped connections) are retried with
 * exponential backoff; anything else surfaces on the first failure.
 */

import { AppError, CancelledError, ProviderUnavailableError } from '../errors.js';
import type { RetryPolicy } from '../config.js';

/** Failure reported by an adapter, already classified. */
export class ProviderCallError extends Error {
  constructor(
    message: string,
    readonly transient: boolean,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderCallError';
  }
}

export interface RetryOptions extends RetryPolicy {
  /** Used in error messages, e.g. "groq generateMarkdownDocument". */
  label: string;
  /** Caller cancellation. Aborting stops retries with CancelledError. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: ProviderCallError, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError(`${options.label} was cancelled`);
    }

    let failure: ProviderCallError;
    try {
      return await runAttempt(fn, options.timeoutMs, options.signal);
    } catch (err) {
      if (options.signal?.aborted) {
        throw new CancelledError(`${options.label} was cancelled`);
      }
      if (err instanceof AppError) throw err;
      failure =
        err instanceof ProviderCallError
          ? err
          : new ProviderCallError(err instanceof Error ? err.message : String(err), false);
    }

    if (!failure.transient || attempt >= attempts) {
      throw new ProviderUnavailableError(
        `${options.label} failed after ${attempt} attempt(s): ${failure.message}`,
        {
          attempts: attempt,
          transient: failure.transient,
          ...(failure.status !== undefined && { status: failure.status }),
        }
      );
    }

    const delayMs = options.delayMs * 2 ** (attempt - 1);
    options.onRetry?.(attempt, failure, delayMs);
    await sleepUnlessAborted(sleep, delayMs, options.signal);
  }
}

/** Backoff that ends early when the caller aborts; the next loop turn reports the cancellation. */
function sleepUnlessAborted(
  sleep: (ms: number) => Promise<void>,
  ms: number,
  signal: AbortSignal | undefined
): Promise<void> {
  if (!signal) return sleep(ms);
  if (signal.aborted) return Promise.resolve();

  let onAbort = () => {};
  const aborted = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return Promise.race([sleep(ms), aborted]).finally(() => signal.removeEventListener('abort', onAbort));
}

async function runAttempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer: AbortSignal | undefined
): Promise<T> {
  const controller = new AbortController();
  const onOuterAbort = () => controller.abort();
  outer?.addEventListener('abort', onOuterAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the timeout wins over the abort listener.
      reject(new ProviderCallError(`timed out after ${timeoutMs}ms`, true));
      controller.abort();
    }, timeoutMs);
    controller.signal.addEventListener(
      'abort',
      () => reject(new ProviderCallError('request aborted', false)),
      { once: true }
    );
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onOuterAbort);
  }
}
