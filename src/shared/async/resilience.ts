import { AppError, type ErrorCode } from '../errors/app-error';

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

export function abortReason(signal: AbortSignal, operation: string): AppError {
  if (signal.reason instanceof AppError) return signal.reason;
  return new AppError('TIMEOUT', `${operation} was aborted`, signal.reason);
}

/** Resolve after `ms`, or reject with a TIMEOUT AppError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal, operation = 'sleep'): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal, operation));
  return new Promise<void>((resolve, reject) => {
    let onAbort: (() => void) | undefined;
    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    if (signal) {
      const abortSignal = signal;
      onAbort = () => {
        clearTimeout(timeoutId);
        reject(abortReason(abortSignal, operation));
      };
      abortSignal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. The underlying work is not cancelled; its late outcome is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal, operation));
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: (error: AppError) => void,
): Promise<T> {
  assertPositiveInteger(timeoutMs, 'timeoutMs');

  let timeoutId: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          const error = new AppError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
          onTimeout?.(error);
          reject(error);
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  operationName: string;
  maxDelayMs?: number;
  /** Errors rejected by this predicate stop the retry loop immediately. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Epoch ms after which no further attempt is started. */
  deadlineAt?: number;
  signal?: AbortSignal;
  errorCode?: ErrorCode;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function retry<T>(operation: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  if (!Number.isInteger(opts.retries) || opts.retries < 0) {
    throw new RangeError('retries must be a non-negative integer');
  }
  assertPositiveInteger(opts.baseDelayMs, 'baseDelayMs');

  const errorCode = opts.errorCode ?? 'PROVIDER_ERROR';
  let lastError: unknown;
  let attemptsMade = 0;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    if (opts.signal?.aborted) throw abortReason(opts.signal, opts.operationName);
    attemptsMade = attempt + 1;
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (opts.signal?.aborted) throw abortReason(opts.signal, opts.operationName);
      if (opts.shouldRetry && !opts.shouldRetry(error, attempt)) break;
      if (attempt === opts.retries) break;

      const delayMs = Math.min(opts.maxDelayMs ?? Number.POSITIVE_INFINITY, opts.baseDelayMs * 2 ** attempt);
      if (opts.deadlineAt !== undefined && Date.now() + delayMs >= opts.deadlineAt) break;
      opts.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, opts.signal, opts.operationName);
    }
  }

  // Already classified (rate limit, timeout, invalid output): keep its code.
  if (lastError instanceof AppError) throw lastError;
  throw new AppError(
    errorCode,
    `${opts.operationName} failed after ${attemptsMade} attempt${attemptsMade === 1 ? '' : 's'}`,
    lastError,
    { attempts: attemptsMade },
  );
}
