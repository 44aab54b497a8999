/**
 * @fileoverview Async Utilities
 *
 * Shared async helpers: bounded concurrency, retries and timeouts.
 *
 * @packageDocumentation
 */

/**
 * Limits how many tasks run at once. With `max = 1` it is a mutex.
 */
export class AsyncSemaphore {
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(private max: number) {
    if (!Number.isFinite(this.max) || this.max <= 0) {
      this.max = 1;
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      // The releasing task hands its slot over without decrementing `active`.
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.active += 1;
    }
    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.active -= 1;
      }
    }
  }
}

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - if <= 0 or undefined, the promise is returned as-is
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const value = await withTimeout(pending, 5000, { context: 'cell 3' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export interface RetryOptions {
  /** Delay before the second attempt; doubles after each failure */
  delayMs?: number;
  /** Return false to give up immediately on this error */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

/**
 * Run `task` up to `attempts` times, rethrowing the last error.
 */
export async function retry<T>(
  attempts: number,
  task: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const total = Math.max(1, Math.floor(attempts));
  let delayMs = options.delayMs ?? 0;
  let lastError: unknown;

  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === total || (options.shouldRetry && !options.shouldRetry(error, attempt))) {
        break;
      }
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        delayMs *= 2;
      }
    }
  }

  throw lastError;
}
