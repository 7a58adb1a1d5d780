/**
 * Fetch entrypoint: exports the undici-backed session and supporting types.
 * @module
 */
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
} from '../types/request.js';
export { DEFAULT_TIMEOUT, FetchClient } from './client.js';
