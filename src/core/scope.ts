import type { SafeWrapAsync } from '../utils/wrap.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { AdcClient } from './client.js';
import type { AdcClientProps } from './types.js';

/**
 * Opens an {@link AdcClient}, runs `fn` with it and closes it on every path, including
 * a failed initialization and a throwing `fn`.
 *
 * The first error wins: a close failure is only reported when everything before it succeeded.
 *
 * @example
 * const [err, vips] = await withClient(
 *   { baseUrl: 'https://adc.example.com', username: 'admin', password: 'secret' },
 *   (client) => client.request('GET', '/api/load_balance_virtual_server'),
 * );
 */
export async function withClient<T>(
  props: AdcClientProps,
  fn: (client: AdcClient) => SafeWrapAsync<Error, T>,
): SafeWrapAsync<Error, T> {
  const client = new AdcClient(props);

  const [errInit] = await client.initialize();
  if (errInit) {
    await client.close();
    return [errInit, null];
  }

  const [errRun, result] = await safeWrapAsync(() => fn(client));
  const [errClose] = await client.close();

  if (errRun) {
    return [errRun, null];
  }

  const [errResult, value] = result;
  if (errResult) {
    return [errResult, null];
  }

  if (errClose) {
    return [errClose, null];
  }

  return [null, value];
}
