import type { Headers, Response } from 'undici';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper. A `null` value removes a previously set header. */
export type HeaderOptions = Headers | Record<string, string | null | undefined>;

/** HTTP verbs the appliance API accepts. */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

/** Query parameters; `null` and `undefined` entries are left out of the URL. */
export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/** Request body: a string is sent as-is, anything else is serialized to JSON text. */
export type RequestBody = string | Record<string, unknown> | unknown[];

/** Response returned by the transport. */
export type FetchResponse = Response;

/** Per-request options passed to a {@link FetchClientProviderDefinition}. */
export interface FetchOptions {
  /** Query parameters appended to the URL. */
  params?: QueryParams;
  /** Serialized request body. */
  body?: string;
  /** Headers merged over the session defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a fetch provider (the client's session). */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Whether TLS certificates are verified.
   * @default true
   */
  verifySsl?: boolean;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
}

/**
 * Contract for HTTP session implementations used by the client.
 *
 * Every verb resolves with the raw response whatever its status; only transport
 * failures come back in the error slot.
 */
export interface FetchClientProviderDefinition {
  get: (path: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  post: (path: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  put: (path: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  delete: (path: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Merges new defaults (e.g. the `Authorization` header) into the session. */
  config: (opts: FetchClientOptions) => void;
  /** Aborts in-flight requests and releases the connection pool. */
  close: () => Promise<void>;
}

/** Factory signature for constructing HTTP sessions. */
export interface FetchClientProvider {
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
