import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Kinds of application-level failure the appliance reports.
 *
 * - `entry-missing`: the referenced configuration entry doesn't exist.
 * - `duplicate-entry`: an entry with the same key already exists.
 * - `entry-not-found`: the endpoint answered 404 for the lookup.
 * - `generic`: any other negative code.
 */
export type VendorErrorKind = 'entry-missing' | 'duplicate-entry' | 'entry-not-found' | 'generic';

/** Vendor codes with a dedicated kind. Everything else is `generic`. */
export const VENDOR_ERROR_KINDS: Readonly<Record<string, VendorErrorKind>> = Object.freeze({
  '-1': 'entry-missing',
  '-13': 'entry-missing',
  '-15': 'duplicate-entry',
});

/**
 * Resolves the {@link VendorErrorKind} for a vendor code. Doesn't depend on the fetched catalog.
 */
export function vendorErrorKind(code: number): VendorErrorKind {
  return VENDOR_ERROR_KINDS[String(code)] ?? 'generic';
}

/** Tagged description of a vendor failure. */
export interface VendorFailure {
  kind: VendorErrorKind;
  /** Vendor code, or `null` when the failure wasn't reported through a code (e.g. a 404). */
  code: number | null;
  message: string;
}

/**
 * Error carrying a {@link VendorFailure}. One class for every kind; branch on `kind`.
 */
export class VendorError extends Error implements VendorFailure {
  /** VendorError error-name */
  name = 'VendorError';
  readonly kind: VendorErrorKind;
  readonly code: number | null;

  /** Creates a new VendorError from a failure description */
  constructor({ kind, code, message }: VendorFailure, opts?: ErrorOptions) {
    super(message, opts);
    this.kind = kind;
    this.code = code;
  }

  /** Builds a VendorError for a negative vendor code, resolving its kind from {@link VENDOR_ERROR_KINDS}. */
  static fromCode(code: number, message: string): VendorError {
    return new VendorError({ kind: vendorErrorKind(code), code, message });
  }
}

/**
 * Extracts a {@link VendorError} from an unknown error value, following nested causes.
 */
export function getVendorError(error: unknown): VendorError | null {
  return unwrapErrorType(VendorError, error);
}

/**
 * Checks whether an error, or anything in its cause chain, is a {@link VendorError} of the given kind.
 */
export function isVendorErrorKind(error: unknown, kind: VendorErrorKind): boolean {
  return getVendorError(error)?.kind === kind;
}
