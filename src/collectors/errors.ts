/**
 * Collector Errors
 *
 * Typed errors raised by collector transport and by the aggregator's
 * per-collector time bound.
 *
 * @module collectors/errors
 */

// ============================================================================
// HTTP Errors
// ============================================================================

/**
 * Error raised for a failed or timed-out HTTP request.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HttpError';
  }
}

/**
 * Type guard for HttpError.
 */
export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

/**
 * True for errors worth retrying: rate limits, server errors and timeouts.
 */
export function isRetryableError(error: unknown): boolean {
  return isHttpError(error) && error.isRetryable;
}

// ============================================================================
// Timeout Errors
// ============================================================================

/**
 * Error raised when a collector exceeds its wall-clock bound.
 */
export class CollectorTimeoutError extends Error {
  constructor(
    public readonly collectorId: string,
    public readonly timeoutMs: number
  ) {
    super(`Collector ${collectorId} timed out after ${timeoutMs}ms`);
    this.name = 'CollectorTimeoutError';
  }
}
