/**
 * Retry with exponential backoff and jitter.
 *
 * @module utils/retry
 */

import { logger } from './logger';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 200) */
  baseDelayMs?: number;
  /** Maximum delay cap in milliseconds (default: 5000) */
  maxDelayMs?: number;
  /** Predicate to decide if an error is retryable. Return true to retry. */
  retryOn?: (error: unknown) => boolean;
  /** Label included in retry log lines. */
  operation?: string;
}

/**
 * Default predicate: retry errors that declare themselves retryable.
 */
export const defaultRetryOn = (error: unknown): boolean =>
  error instanceof Error && 'retryable' in error && error.retryable === true;

/**
 * Delay for a given attempt: min(baseDelay * 2^attempt + jitter, maxDelay).
 */
export function computeDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying retryable failures up to `maxRetries` times.
 *
 * @throws The last error once retries are exhausted, or the first
 * non-retryable error.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 200;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const retryOn = options.retryOn ?? defaultRetryOn;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries || !retryOn(error)) {
        throw error;
      }

      const delay = computeDelay(attempt, baseDelayMs, maxDelayMs);

      logger.warn('Retrying after transient error', {
        operation: options.operation,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error)
      });

      await sleep(delay);
    }
  }

  throw lastError;
}
