import { isErrorType } from './isErrorType.js';

/**
 * Error raised for a request method name the client doesn't dispatch.
 */
export class UnsupportedMethodError extends Error {
  /** UnsupportedMethodError error-name */
  name = 'UnsupportedMethodError';
  /** Method name as the caller passed it */
  readonly method: string;

  /** Creates a new UnsupportedMethodError for the given method name */
  constructor(method: string, opts?: ErrorOptions) {
    super(`Unsupported method: ${method}`, opts);
    this.method = method;
  }
}

/**
 * Type guard for {@link UnsupportedMethodError}, following nested causes.
 */
export function isUnsupportedMethodError(error: unknown): boolean {
  return isErrorType(UnsupportedMethodError, error);
}
