import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Timeout-driven abort signal plus a handle to cancel the pending timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Cancels the timer once the request settled. Safe to call more than once. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or absent, no timeout signal is created. The timer is
 * unref'd so a pending timeout never keeps the process alive.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  };
}

/** Merged abort signal plus a handle to detach it from its sources. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Removes the listeners left on the sources. Safe to call more than once. */
  dispose: () => void;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, carrying that source's
 *   `reason`, or an {@link AbortError} when the source gave none.
 *
 * Sources may outlive the merged signal (a session signal outlives every request), so
 * callers must `dispose` once the operation settled.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  const [first] = active;
  if (!first) {
    return null;
  }

  if (active.length === 1) {
    return { signal: first, dispose: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const dispose = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    dispose();
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose };
}
