/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when an in-flight request is aborted by closing the session. */
export { AbortError, getAbortError, isAbortError } from './abortError.js';
/** Error representing a login rejected with HTTP 401. */
export { AuthenticationFailedError, isAuthenticationFailedError } from './authenticationFailedError.js';
/** Error representing a transport failure to reach the appliance. */
export { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';
/** Error representing an unexpected HTTP status. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic cause-chain matcher. */
export { isErrorType } from './isErrorType.js';
/** Error raised when the session isn't open. */
export { isSessionClosedError, SessionClosedError } from './sessionClosedError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised for a method name the client doesn't dispatch. */
export { isUnsupportedMethodError, UnsupportedMethodError } from './unsupportedMethodError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads or configuration fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
/** Tagged vendor application error and the static code-to-kind table. */
export {
  getVendorError,
  isVendorErrorKind,
  VENDOR_ERROR_KINDS,
  VendorError,
  type VendorErrorKind,
  type VendorFailure,
  vendorErrorKind,
} from './vendorError.js';
