import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a transport-level failure to reach the appliance.
 */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  name = 'ConnectionError';
  /** URL the request was sent to */
  #url: string;

  /** Creates a new instance of a ConnectionError with the URL that couldn't be reached */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** URL the request was sent to */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link ConnectionError}, following nested causes.
 */
export function isConnectionError(error: unknown): boolean {
  return isErrorType(ConnectionError, error);
}

/**
 * Extract a {@link ConnectionError} from an unknown error value, following nested causes.
 */
export function getConnectionError(error: unknown): ConnectionError | null {
  return unwrapErrorType(ConnectionError, error);
}
