/** Any error class, whatever its constructor arguments. */
// biome-ignore lint/suspicious/noExplicitAny: constructor parameters differ per error class
export type ErrorClass<T extends Error> = abstract new (...args: any[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * The walk stops at the first non-error cause and never revisits an error.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

