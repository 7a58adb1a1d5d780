import type { FetchResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a status the caller didn't expect.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** Response causing the HTTPError */
  #response: FetchResponse;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: FetchResponse, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Status code of the wrapped response */
  get status(): number {
    return this.#response.status;
  }

  /**
   * Response causing the HTTPError. Cloned when the body is still unread, so
   * callers can consume it more than once.
   */
  get response(): FetchResponse {
    return this.#response.bodyUsed ? this.#response : this.#response.clone();
  }
}

/**
 * Type guard for {@link HTTPError}, following nested causes.
 */
export function isHttpError(error: unknown): boolean {
  return isErrorType(HTTPError, error);
}

/**
 * Extracts an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
