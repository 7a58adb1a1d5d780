import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  /** Creates a new TimeoutError for the given elapsed timeout */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes.
 */
export function isTimeoutError(error: unknown): boolean {
  return isErrorType(TimeoutError, error);
}
