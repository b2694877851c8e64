/**
 * Domain errors raised by the catalog and search stages.
 *
 * @module core/errors
 */

/**
 * A raw record lacks a mandatory field or it cannot be parsed. The record is
 * dropped; the run continues.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly sourceUrl?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type EncodingFailureReason = 'empty_text' | 'timeout' | 'provider_error' | 'invalid_vector';

/**
 * The embedding provider could not produce a vector. Timeouts and provider
 * failures are retryable; empty input is not.
 */
export class EncodingError extends Error {
  constructor(
    message: string,
    public readonly reason: EncodingFailureReason,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EncodingError';
  }
}

/**
 * A vector does not fit the index (wrong dimension or non-finite values).
 * Fatal for the single add or search that raised it.
 */
export class IndexCorruptionError extends Error {
  constructor(
    message: string,
    public readonly expectedDimensions: number,
    public readonly actualDimensions: number,
    public readonly productId?: string
  ) {
    super(message);
    this.name = 'IndexCorruptionError';
  }
}

export const isRetryableEncodingError = (error: unknown): boolean =>
  error instanceof EncodingError && error.retryable;
