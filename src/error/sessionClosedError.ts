import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request needs the session before `initialize` opened it, or after `close`.
 */
export class SessionClosedError extends Error {
  /** SessionClosedError error-name */
  name = 'SessionClosedError';
}

/**
 * Type guard for {@link SessionClosedError}, following nested causes.
 */
export function isSessionClosedError(error: unknown): boolean {
  return isErrorType(SessionClosedError, error);
}
