import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Cancels the unread body of a response that is being dropped, so undici can hand its
 * connection back to the pool instead of waiting for garbage collection.
 */
export async function discardBody(response: FetchResponse): SafeWrapAsync<Error, null> {
  const { body } = response;
  if (!body || response.bodyUsed) {
    return [null, null];
  }

  const [err] = await safeWrapAsync(() => body.cancel());
  if (err) {
    return [new Error('error discarding response body in discardBody', { cause: err }), null];
  }

  return [null, null];
}
