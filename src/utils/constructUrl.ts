import type { QueryParams } from '../types/request.js';

/**
 * Joins a base URL, a request path and query parameters into an absolute URL string.
 *
 * - A trailing slash on the base and a leading slash on the path collapse into one.
 * - `null`/`undefined` query values are skipped; everything else is stringified.
 *
 * @example
 * constructUrl('https://adc.test/', '/api/user/login') // 'https://adc.test/api/user/login'
 */
export function constructUrl(baseUrl: string, path: string, params?: QueryParams): string {
  let url = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const query = searchParams.toString();
  if (query) {
    url += `${url.includes('?') ? '&' : '?'}${query}`;
  }

  return url;
}
