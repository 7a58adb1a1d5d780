import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body and parses it as JSON into a tuple-style result.
 *
 * The appliance doesn't always label its JSON with a JSON content type, so the
 * body is parsed whatever the `Content-Type` says.
 *
 * - 204/205 and empty bodies resolve to `[null, null]`.
 * - A body that can't be read or isn't JSON resolves to `[Error, null]` with the original error as cause.
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, unknown> {
  // 204 + 205 carry no body (RFC 9110)
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text.trim()) {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
