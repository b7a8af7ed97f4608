/**
 * Async utilities for retry, timeout, cancellation and sleep operations
 */

import type { Logger } from 'pino';
import { DEFAULT_RETRY } from '../config/defaults';
import {
  CancelledError,
  TimeoutError,
  TransientError,
  errorMessage,
  isApplicationError,
  isRetryableError,
} from '../errors/index';

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  /** Multiplier applied to the delay after each failed attempt */
  backoff: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  signal?: AbortSignal;
  operation?: string;
  logger?: Logger;
}

export interface RemoteCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

/**
 * Deadlines abort with their own TimeoutError or CancelledError; anything
 * else (a bare `abort()` from the caller) is reported as a cancellation.
 */
function abortReason(signal: AbortSignal, operation: string): Error {
  return isApplicationError(signal.reason)
    ? signal.reason
    : new CancelledError(`${operation} was cancelled`, operation);
}

function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw abortReason(signal, operation);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal, 'sleep'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal, 'sleep'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The underlying work is not interrupted; the caller is released.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal, operation = 'operation'): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal, operation));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Re-run `fn` while the policy says the last error is transient.
 * Cancellation is observed before every attempt and during back-off waits,
 * and is rethrown as-is instead of being reported as exhaustion.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY.maxAttempts,
    delayMs = DEFAULT_RETRY.delayMs,
    backoff = DEFAULT_RETRY.backoff,
    maxDelayMs = DEFAULT_RETRY.maxDelayMs,
    isRetryable = isRetryableError,
    signal,
    operation = 'operation',
    logger,
  } = options;

  let last: unknown;
  let attempts = 0;
  const attemptLimit = Math.max(1, maxAttempts);
  for (let attempt = 1; attempt <= attemptLimit; attempt++) {
    throwIfAborted(signal, operation);
    attempts = attempt;
    try {
      return await fn(attempt);
    } catch (err) {
      if (signal?.aborted) {
        throw abortReason(signal, operation);
      }
      if (!isRetryable(err)) {
        throw err;
      }
      last = err;
      if (attempt === attemptLimit) break;
      const wait = Math.min(delayMs * Math.pow(backoff, attempt - 1), maxDelayMs);
      logger?.debug(
        { operation, attempt, maxAttempts: attemptLimit, delay: wait, error: errorMessage(err) },
        `Retrying ${operation} (attempt ${attempt}/${attemptLimit})`,
      );
      await sleep(wait, signal);
    }
  }
  throw new TransientError(
    `${operation} failed after ${attempts} attempt(s): ${errorMessage(last)}`,
    operation,
    attempts,
    last instanceof Error ? last : undefined,
  );
}

/**
 * Run `fn` under a deadline. The signal handed to `fn` aborts with a
 * TimeoutError when the deadline passes and with a CancelledError when the
 * caller's own signal aborts.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  { signal, operation = 'operation' }: { signal?: AbortSignal; operation?: string } = {},
): Promise<T> {
  throwIfAborted(signal, operation);

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs, operation));
  }, timeoutMs);
  const onCallerAbort = (): void => {
    controller.abort(new CancelledError(`${operation} was cancelled`, operation));
  };
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    return await abortable(fn(controller.signal), controller.signal, operation);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Bounded deadline around a bounded retry loop; used by every remote call.
 */
export function runRemote<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: RemoteCallOptions,
): Promise<T> {
  return withTimeout(
    (deadline) =>
      retry(() => abortable(fn(deadline), deadline, operation), {
        ...options.retry,
        signal: deadline,
        operation,
        logger: options.logger,
      }),
    options.timeoutMs,
    { signal: options.signal, operation },
  );
}
