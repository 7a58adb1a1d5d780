import { Agent, fetch } from 'undici';
import { AbortError, isAbortError } from '../error/abortError.js';
import { ConnectionError } from '../error/connectionError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 60_000;

/**
 * Thin wrapper around undici's `fetch` acting as the client's HTTP session:
 * - prefixes all requests with a configured base URL,
 * - keeps default headers that later calls can extend (e.g. `Authorization`),
 * - owns one connection pool (`Agent`) honoring the TLS-verification flag,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Responses are returned as they are, whatever their status. Only transport failures
 * (connection, timeout, abort) end up in the error slot.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default headers merged under every request's headers. */
  #headers: HeaderOptions;
  /** Request timeout in ms, `false` when disabled. */
  #timeout: number | false;
  /** Connection pool shared by every request of this session. */
  #agent: Agent;
  /** Aborts in-flight requests when the session is closed. */
  #abortController = new AbortController();

  /** Creates a new session against `baseUrl`. */
  constructor(baseUrl: string, opts: FetchClientOptions = {}) {
    this.#baseUrl = baseUrl;
    this.#headers = mergeHeaderOptions(opts.headers);
    this.#timeout = opts.timeout ?? DEFAULT_TIMEOUT;
    this.#agent = new Agent({
      connect: { rejectUnauthorized: opts.verifySsl ?? true },
    });
  }

  /**
   * Updates default headers (merged with existing ones) and the timeout.
   * TLS verification is fixed for the lifetime of the session.
   */
  public config(opts: FetchClientOptions) {
    this.#headers = mergeHeaderOptions(this.#headers, opts.headers);
    if (opts.timeout !== undefined) {
      this.#timeout = opts.timeout;
    }
  }

  /**
   * Executes a GET request against the given path.
   *
   * @param path - Path below the base URL (e.g. `/api/platform/errMsg`).
   * @param opts - Query params and per-request headers.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(path: string, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('GET', path, opts);
  }

  /**
   * Executes a POST request against the given path.
   *
   * @param path - Path below the base URL.
   * @param opts - Query params, serialized body and per-request headers.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(path: string, opts: FetchOptions = {}): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('POST', path, opts);
  }

  /**
   * Executes a PUT request against the given path.
   *
   * @param path - Path below the base URL.
   * @param opts - Query params, serialized body and per-request headers.
   * @returns A promise resolving to `[error, response]`.
   */
  public put(path: string, opts: FetchOptions = {}): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('PUT', path, opts);
  }

  /**
   * Executes a DELETE request against the given path.
   *
   * @param path - Path below the base URL.
   * @param opts - Query params and per-request headers.
   * @returns A promise resolving to `[error, response]`.
   */
  public delete(path: string, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('DELETE', path, { ...opts, body: undefined });
  }

  /**
   * Aborts in-flight requests and closes the connection pool.
   */
  public async close(): Promise<void> {
    if (!this.#abortController.signal.aborted) {
      this.#abortController.abort(new AbortError('client session was closed'));
    }

    if (!this.#agent.closed) {
      await this.#agent.close();
    }
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Timeouts and aborts are wrapped in `Error` with the original as cause.
   * - Any other fetch rejection becomes a {@link ConnectionError}.
   */
  async #request(method: string, path: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const url = constructUrl(this.#baseUrl, path, opts.params);
    const timeout = createTimeoutSignal(this.#timeout);
    const merged = mergeSignals([opts.signal, timeout?.signal, this.#abortController.signal]);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        body: opts.body,
        headers: mergeHeaderOptions(this.#headers, opts.headers),
        dispatcher: this.#agent,
        ...(merged && { signal: merged.signal }),
      }),
    );
    timeout?.clear();
    merged?.dispose();

    if (!err) {
      return [null, res];
    }

    if (isTimeoutError(err) || isAbortError(err)) {
      return [new Error(`error ${method} request to ${url} aborted`, { cause: err }), null];
    }

    return [new ConnectionError(`error connecting to ${url}`, url, { cause: err }), null];
  }
}
