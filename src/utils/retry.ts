import type { SafeWrapAsync } from './wrap.js';

/** Options for {@link retryWithRecovery}. */
export interface RetryWithRecoveryOptions<R> {
  /** Operation to run; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /** Decides whether a successful result still calls for recovery (e.g. a 401 response). */
  shouldRecover: (result: R) => boolean;
  /** Recovery action run before the operation is re-issued (e.g. re-authenticating). */
  recover: () => SafeWrapAsync<Error, unknown>;
  /**
   * Maximum number of recoveries. Passing 0 means "run once, never recover."
   * @default 1
   */
  attempts?: number;
  /**
   * Predicate on a failed recovery. Return true to stop and surface the last result,
   * false to propagate the recovery error.
   */
  errFn?: (e: Error) => boolean;
  /** Releases a result that is replaced by a re-issued attempt (e.g. drains a 401 body). */
  discard?: (result: R) => Promise<unknown> | void;
}

/**
 * Runs `fn`, and while its result calls for recovery, runs `recover` and re-issues `fn`,
 * at most `attempts` times. There is no wait between attempts.
 *
 * Errors returned by `fn` are never retried; they propagate as they are.
 */
export async function retryWithRecovery<R>({
  fn,
  shouldRecover,
  recover,
  attempts = 1,
  errFn,
  discard,
}: RetryWithRecoveryOptions<R>): SafeWrapAsync<Error, R> {
  let outcome = await fn();

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const [err, result] = outcome;
    if (err || !shouldRecover(result)) {
      return outcome;
    }

    const [errRecover] = await recover();
    if (errRecover) {
      if (typeof errFn === 'function' && errFn(errRecover)) {
        return outcome;
      }

      return [errRecover, null];
    }

    await discard?.(result);
    outcome = await fn();
  }

  return outcome;
}
