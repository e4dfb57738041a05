import { createLogger } from './logger.js';
import { TimeoutError, isAbortError } from './errors.js';

const logger = createLogger('retry');

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffFactor?: number;
  /** Every error except an abort is retried unless this says otherwise. */
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'maxRetries' | 'initialDelay' | 'maxDelay' | 'backoffFactor'>> = {
  maxRetries: 2,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
};

export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds or `maxRetries` retries have been spent.
 * The delay before retry n (1-based) is initialDelay * backoffFactor^(n-1),
 * capped at maxDelay. Aborts are never retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const shouldRetry = opts.retryIf ?? (() => true);
  const wait = opts.sleep || sleep;

  let lastError: unknown;
  let delay = opts.initialDelay;

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    if (opts.signal?.aborted) {
      throw abortReason(opts.signal);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt > opts.maxRetries || opts.signal?.aborted || isAbortError(error) || !shouldRetry(error)) {
        throw error;
      }

      logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, error);
      opts.onRetry?.(error, attempt, delay);

      await wait(delay, opts.signal);
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelay);
    }
  }

  throw lastError;
}

/**
 * Gives `fn` a signal that fires after `timeoutMs` (or when `parent` aborts)
 * and rejects with a TimeoutError on expiry even if `fn` ignores the signal.
 * A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
  message = 'Operation timed out'
): Promise<T> {
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      fn(controller.signal),
      new Promise<never>((_, reject) => {
        controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true });
        if (timeoutMs > 0) {
          timer = setTimeout(() => controller.abort(new TimeoutError(message)), timeoutMs);
        }
      }),
    ]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export type RateLimiter = <T>(fn: () => Promise<T>, signal?: AbortSignal) => Promise<T>;

/**
 * Spaces calls at least 60000 / requestsPerMinute ms apart. Each caller
 * reserves its start time before waiting, so concurrent callers queue up
 * instead of all firing after the same pause.
 */
export function createRateLimiter(requestsPerMinute: number, wait: SleepFn = sleep): RateLimiter {
  const minInterval = 60000 / requestsPerMinute;
  let nextSlot = 0;

  return async function rateLimited<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const now = Date.now();
    const startAt = Math.max(now, nextSlot);
    nextSlot = startAt + minInterval;

    if (startAt > now) {
      await wait(startAt - now, signal);
    }

    return fn();
  };
}
