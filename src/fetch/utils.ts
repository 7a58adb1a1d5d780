import { Headers } from 'undici';
import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * A nullish local value removes the global header of the same name.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    merged.set(key, value);
  }

  return merged;
}
