import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the appliance rejects the configured credentials (HTTP 401 on login).
 */
export class AuthenticationFailedError extends Error {
  /** AuthenticationFailedError error-name */
  name = 'AuthenticationFailedError';
  /** Username that was rejected */
  readonly username: string;

  /** Creates a new AuthenticationFailedError for the rejected username */
  constructor(message: string, username: string, opts?: ErrorOptions) {
    super(message, opts);
    this.username = username;
  }
}

/**
 * Type guard for {@link AuthenticationFailedError}, following nested causes.
 */
export function isAuthenticationFailedError(error: unknown): boolean {
  return isErrorType(AuthenticationFailedError, error);
}
