/**
 * Normalize timestamp to UTC Date object
 * Numbers above 1e12 are milliseconds, smaller ones seconds.
 */
export function normalizeTimestamp(input: string | number | Date): Date {
  if (input instanceof Date) {
    return input;
  }
  if (typeof input === 'number') {
    const ms = input > 1e12 ? input : input * 1000;
    return new Date(ms);
  }
  return new Date(input);
}

/**
 * Sleep for specified milliseconds.
 * Resolves early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * HTTP error with status code and optional Retry-After
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Check if an error is retriable
 * Retriable: 429, 408, 5xx, network errors, timeouts
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    const { statusCode } = error;
    return statusCode === 429 || statusCode === 408 || statusCode >= 500;
  }

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (
      msg.includes('network') ||
      msg.includes('fetch failed') ||
      msg.includes('econnreset') ||
      msg.includes('econnrefused') ||
      msg.includes('etimedout') ||
      msg.includes('socket hang up') ||
      msg.includes('timeout') ||
      msg.includes('abort')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Can be seconds (integer) or HTTP-date
 * Returns delay in milliseconds, or undefined if invalid
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isInteger(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!isNaN(date)) {
    const delayMs = date - now;
    return delayMs > 0 ? delayMs : undefined;
  }

  return undefined;
}

/**
 * Calculate delay with exponential backoff + jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  // base * 2^(attempt-1), capped, plus 0-25% jitter
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * random() * 0.25;
  return Math.floor(cappedDelay + jitter);
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown) => boolean;
  /** Stops retrying (rethrowing the last error) once aborted */
  signal?: AbortSignal;
}

/**
 * Retry a function with exponential backoff + jitter
 * Respects Retry-After if the error carries one
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 5,
    baseDelayMs = 1000,
    maxDelayMs = 60000,
    onRetry,
    shouldRetry = isRetriableError,
    signal,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || !shouldRetry(error) || signal?.aborted) {
        break;
      }

      const delayMs = error instanceof HttpError && error.retryAfterMs
        ? Math.min(error.retryAfterMs, maxDelayMs)
        : calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);

      if (onRetry) {
        onRetry(lastError, attempt, delayMs);
      }

      await sleep(delayMs, signal);
      if (signal?.aborted) {
        break;
      }
    }
  }

  throw lastError ?? new Error('withRetry: no attempts made');
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Error message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
