/**
 * Timeout Guard
 * Prevent operations from hanging indefinitely.
 *
 * Wraps promises with timeout protection so slow external APIs
 * never block a search past its deadline.
 */

export class TimeoutError extends Error {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(public operation: string) {
    super(`${operation} was aborted`);
    this.name = 'AbortError';
  }
}

/**
 * Wrap a promise with a timeout
 *
 * If the promise doesn't resolve within timeoutMs,
 * calls onTimeout (e.g. () => controller.abort()) then rejects with TimeoutError.
 * The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

export type JoinResult<T> =
  | { settled: true; value: T }
  | { settled: false };

/**
 * Soft join: wait up to timeoutMs for a task that is already running.
 * Never rejects because of the deadline; the caller decides what to do
 * with a task that missed it.
 */
export async function joinWithin<T>(task: Promise<T>, timeoutMs: number): Promise<JoinResult<T>> {
  try {
    const value = await withTimeout(task, timeoutMs, 'join');
    return { settled: true, value };
  } catch (error) {
    if (isTimeoutError(error)) {
      return { settled: false };
    }
    throw error;
  }
}

/**
 * Settle as soon as either the promise settles or the signal aborts.
 * Abort rejects with AbortedError.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError(operation));

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Check if error is a timeout error
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Sleep utility for backoff/retry logic
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
