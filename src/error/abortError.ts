import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an in-flight request is aborted because its session was closed.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, following nested causes.
 */
export function isAbortError(error: unknown): boolean {
  return isErrorType(AbortError, error);
}

/**
 * Extract an {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): AbortError | null {
  return unwrapErrorType(AbortError, error);
}
