import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { AuthenticationFailedError, isAuthenticationFailedError } from '../error/authenticationFailedError.js';
import { isConnectionError } from '../error/connectionError.js';
import { HTTPError } from '../error/httpError.js';
import { SessionClosedError } from '../error/sessionClosedError.js';
import { UnsupportedMethodError } from '../error/unsupportedMethodError.js';
import { VendorError } from '../error/vendorError.js';
import { FetchClient } from '../fetch/client.js';
import { createLogger, type Logger } from '../logger/logger.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchResponse,
  HttpMethod,
  QueryParams,
  RequestBody,
} from '../types/request.js';
import { discardBody } from '../utils/discardBody.js';
import { getResponseData } from '../utils/getResponseData.js';
import { retryWithRecovery } from '../utils/retry.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { ErrorCatalog, type ErrorCodes, errorCodesSchema } from './catalog.js';
import { type ClientConfig, clientConfigSchema, DEFAULT_RETRY } from './config.js';
import { unwrapEnvelope } from './envelope.js';
import type { AdcClientProps, HandledResponse, RequestOptions } from './types.js';

/** Login endpoint. */
export const LOGIN_PATH = '/api/user/login';

/** Endpoint serving the vendor error catalog. */
export const ERROR_CODES_PATH = '/api/platform/errMsg';

/** Headers every session starts with. */
export const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
  'Cache-Control': 'no-cache',
} as const;

const HTTP_METHODS: readonly HttpMethod[] = ['get', 'post', 'put', 'delete'];

const loginResponseSchema = z.object({ token: z.string().min(1) });

/**
 * Resolves a method name, in any casing, into one of the supported verbs.
 */
function toHttpMethod(method: string): HttpMethod | null {
  const lower = method.toLowerCase();
  return HTTP_METHODS.find((candidate) => candidate === lower) ?? null;
}

/**
 * Serializes structured bodies to JSON text; strings are sent as they are.
 */
function serializeBody(body?: RequestBody): string | undefined {
  if (body === undefined || typeof body === 'string') {
    return body;
  }

  return JSON.stringify(body);
}

/**
 * Client for an ADC appliance's REST management API.
 *
 * - owns one HTTP session, opened by {@link AdcClient.initialize} and released by {@link AdcClient.close},
 * - authenticates with username/password and keeps the bearer token in the session headers,
 * - re-authenticates and re-issues a request when it comes back 401,
 * - unwraps the `{ payload }` envelope and resolves vendor error codes through the appliance's catalog.
 *
 * All fallible methods return error-first tuples via {@link SafeWrapAsync}. One handle serves one
 * caller at a time; give concurrent callers their own handle.
 */
export class AdcClient {
  /** Options as given to the constructor. */
  #props: AdcClientProps;
  /** Session factory. */
  #fetchProvider: FetchClientProvider;
  /** Validated configuration, set by `initialize`. */
  #config: ClientConfig | null = null;
  /** Open session, `null` before `initialize` and after `close`. */
  #session: FetchClientProviderDefinition | null = null;
  /** Error catalog, loaded once for the lifetime of this handle. */
  #catalog: ErrorCatalog;
  #logger: Logger;

  /**
   * Creates a client. Nothing is sent until {@link AdcClient.initialize} is called.
   *
   * @param props - Connection settings, credentials and optional session/logger overrides.
   */
  constructor(props: AdcClientProps) {
    const { fetchProvider = FetchClient, logger, ...config } = props;

    this.#props = config;
    this.#fetchProvider = fetchProvider;
    this.#logger = logger
      ? logger.child({ baseUrl: config.baseUrl })
      : createLogger({ verbosity: config.verbosity }).child({ baseUrl: config.baseUrl });
    this.#catalog = new ErrorCatalog(() => this.#loadErrorCodes());

    this.#logger.info('Initializing API client');
  }

  /** Whether a session is open. */
  get isOpen(): boolean {
    return this.#session !== null;
  }

  /**
   * Validates the configuration, opens the session with the default JSON headers and
   * authenticates. Calling it on an open client does nothing.
   *
   * When authentication fails the session is released again, so a later call starts over.
   *
   * @returns A promise resolving to `[error, client]`.
   */
  async initialize(): SafeWrapAsync<Error, AdcClient> {
    if (this.#session) {
      return [null, this];
    }

    const [errConfig, config] = await validator(this.#props, clientConfigSchema);
    if (errConfig) {
      this.#logger.error({ err: errConfig }, 'Invalid client configuration');
      return [new Error('error validating client configuration in initialize', { cause: errConfig }), null];
    }

    if (!config.verifySsl) {
      this.#logger.debug('TLS certificate verification is disabled for this session');
    }

    this.#config = config;
    this.#session = new this.#fetchProvider(config.baseUrl, {
      headers: DEFAULT_HEADERS,
      verifySsl: config.verifySsl,
      timeout: config.timeout,
    });

    const [errAuth] = await this.authenticate();
    if (errAuth) {
      await this.close();
      return [errAuth, null];
    }

    return [null, this];
  }

  /**
   * Logs in and installs `Authorization: Bearer <token>` on the session.
   *
   * Errors are returned as they are, after being logged:
   * - {@link AuthenticationFailedError} when the appliance answers 401,
   * - `ConnectionError` when it can't be reached,
   * - anything else (unexpected status, unreadable body, missing token).
   */
  async authenticate(): SafeWrapAsync<Error, null> {
    const session = this.#session;
    const config = this.#config;
    if (!session || !config) {
      return [new SessionClosedError('error authenticating without an open session'), null];
    }

    const [err, response] = await session.post(LOGIN_PATH, {
      body: JSON.stringify({ username: config.username, password: config.password }),
    });
    if (err) {
      if (isConnectionError(err)) {
        this.#logger.error({ err }, `Connection error. Cannot connect to ${config.baseUrl}`);
      } else {
        this.#logger.error({ err }, 'Encountered unhandled error while authenticating');
      }

      return [err, null];
    }

    if (response.status === 401) {
      await this.#discard(response);
      this.#logger.error('Authentication error. Check username and password.');
      return [new AuthenticationFailedError(`error authenticating to ${config.baseUrl}`, config.username), null];
    }

    if (response.status !== 200) {
      const errStatus = new HTTPError(response, `error unexpected status ${response.status} from login`);
      this.#logger.error({ err: errStatus }, 'Encountered unhandled error while authenticating');
      return [errStatus, null];
    }

    const [errBody, body] = await getResponseData(response);
    if (errBody) {
      this.#logger.error({ err: errBody }, 'Encountered unhandled error while authenticating');
      return [errBody, null];
    }

    const [errToken, login] = await validator(body, loginResponseSchema);
    if (errToken) {
      this.#logger.error({ err: errToken }, 'Login response carries no token');
      return [errToken, null];
    }

    session.config({ headers: { Authorization: `Bearer ${login.token}` } });
    this.#logger.info('Authentication successful');

    return [null, null];
  }

  /**
   * Issues a GET request. The response is returned whatever its status.
   */
  get(path: string, params?: QueryParams): SafeWrapAsync<Error, FetchResponse> {
    return this.#withSession((session) => session.get(path, { params }));
  }

  /**
   * Issues a POST request; a structured body is serialized to JSON. The response is returned whatever its status.
   */
  post(path: string, params?: QueryParams, body?: RequestBody): SafeWrapAsync<Error, FetchResponse> {
    return this.#withSession((session) => session.post(path, { params, body: serializeBody(body) }));
  }

  /**
   * Issues a PUT request; a structured body is serialized to JSON. The response is returned whatever its status.
   */
  put(path: string, params?: QueryParams, body?: RequestBody): SafeWrapAsync<Error, FetchResponse> {
    return this.#withSession((session) => session.put(path, { params, body: serializeBody(body) }));
  }

  /**
   * Issues a DELETE request. The response is returned whatever its status.
   */
  delete(path: string, params?: QueryParams): SafeWrapAsync<Error, FetchResponse> {
    return this.#withSession((session) => session.delete(path, { params }));
  }

  /**
   * Dispatches a request by method name (case-insensitive), re-authenticating and re-issuing it
   * when it comes back 401, up to the configured retry budget.
   *
   * - An unknown method name returns {@link UnsupportedMethodError} without touching the network.
   * - A 404 is logged as a warning and returned like any other response.
   * - Transport errors are returned, never turned into a missing response.
   * - If re-authentication is rejected, the original 401 response is returned.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  sendRequest(
    method: string,
    path: string,
    params?: QueryParams,
    body?: RequestBody,
  ): SafeWrapAsync<Error, FetchResponse> {
    const verb = toHttpMethod(method);
    if (!verb) {
      const errMethod = new UnsupportedMethodError(method);
      this.#logger.error(errMethod.message);
      return Promise.resolve([errMethod, null]);
    }

    return retryWithRecovery({
      fn: () => this.#dispatch(verb, path, params, body),
      shouldRecover: (response) => response.status === 401,
      recover: () => {
        this.#logger.info('Unauthorized - retrying');
        return this.authenticate();
      },
      attempts: this.#config?.retry ?? this.#props.retry ?? DEFAULT_RETRY,
      errFn: isAuthenticationFailedError,
      discard: (response) => this.#discard(response),
    });
  }

  /**
   * Parses a response body and applies the envelope contract.
   *
   * Vendor error codes are resolved into messages through the error catalog and logged.
   *
   * @returns A promise resolving to `[error, handled]`; the error slot only carries unreadable or non-JSON bodies.
   */
  async handleResponse(response: FetchResponse): SafeWrapAsync<Error, HandledResponse> {
    const [errBody, body] = await getResponseData(response);
    if (errBody) {
      return [new Error('error reading envelope in handleResponse', { cause: errBody }), null];
    }

    const outcome = unwrapEnvelope(body);
    switch (outcome.kind) {
      case 'missing':
        return [null, { isError: true, message: null, payload: null, code: null }];
      case 'vendor-error': {
        const message = await this.lookupErrorMessage(outcome.code);
        this.#logger.error(`Error response: code ${outcome.code} msg ${message}`);
        return [null, { isError: true, message, payload: null, code: outcome.code }];
      }
      case 'payload':
        return [null, { isError: false, message: null, payload: outcome.payload, code: null }];
    }
  }

  /**
   * Sends a request and returns its unwrapped payload.
   *
   * - 404 becomes a {@link VendorError} of kind `entry-not-found`.
   * - Other non-2xx statuses become an {@link HTTPError}.
   * - A vendor error code becomes a {@link VendorError} whose kind comes from the static code table.
   * - When `schema` is given, the payload is validated and its output returned.
   */
  request<Schema extends StandardSchemaV1>(
    method: string,
    path: string,
    opts: RequestOptions<Schema> & { schema: Schema },
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Schema>>;
  request(method: string, path: string, opts?: RequestOptions): SafeWrapAsync<Error, unknown>;
  async request(method: string, path: string, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const { params, body, schema } = opts;
    const label = `${method.toUpperCase()} ${path}`;

    const [errReq, response] = await this.sendRequest(method, path, params, body);
    if (errReq) {
      return [new Error(`error doing request ${label}`, { cause: errReq }), null];
    }

    if (response.status === 404) {
      await this.#discard(response);
      return [new VendorError({ kind: 'entry-not-found', code: null, message: `Entry not found: ${path}` }), null];
    }

    // The body stays readable through the HTTPError.
    if (!response.ok) {
      return [new HTTPError(response, `error in ${label} request`), null];
    }

    const [errHandle, handled] = await this.handleResponse(response);
    if (errHandle) {
      return [new Error(`error handling response of ${label}`, { cause: errHandle }), null];
    }

    if (handled.isError) {
      const failure =
        handled.code === null
          ? new VendorError({ kind: 'generic', code: null, message: `error response without payload from ${label}` })
          : VendorError.fromCode(handled.code, handled.message);
      return [failure, null];
    }

    if (!schema) {
      return [null, handled.payload];
    }

    const [errValidate, validated] = await validator(handled.payload, schema);
    if (errValidate) {
      return [new Error(`error validating payload of ${label}`, { cause: errValidate }), null];
    }

    return [null, validated];
  }

  /**
   * Returns the appliance's error catalog, fetching it on first use.
   *
   * Never fails: any error while fetching yields an empty catalog, which is memoized too.
   * Without an open session nothing is fetched or memoized; the result is an empty catalog.
   */
  fetchErrorCodes(): Promise<ErrorCodes> {
    if (!this.#catalogReachable()) {
      return Promise.resolve({});
    }

    return this.#catalog.codes();
  }

  /**
   * Resolves a vendor code into its catalog message, or `Error code: <code>` when unknown.
   * Without an open session (and no catalog loaded yet) the fallback is returned and not memoized.
   */
  lookupErrorMessage(code: number): Promise<string> {
    if (!this.#catalogReachable()) {
      return Promise.resolve(`Error code: ${code}`);
    }

    return this.#catalog.message(code);
  }

  /**
   * Aborts in-flight requests and releases the session. Closing a closed client does nothing.
   */
  async close(): SafeWrapAsync<Error, null> {
    const session = this.#session;
    if (!session) {
      return [null, null];
    }

    this.#session = null;
    const [err] = await safeWrapAsync(() => session.close());
    if (err) {
      this.#logger.error({ err }, 'Error closing session');
      return [new Error('error closing session in close', { cause: err }), null];
    }

    this.#logger.info('Session closed.');
    return [null, null];
  }

  /** Identifies the client by the appliance it talks to. */
  toString(): string {
    return `[AdcClient-${this.#config?.baseUrl ?? this.#props.baseUrl}]`;
  }

  /**
   * Runs `fn` with the open session, or returns a {@link SessionClosedError}.
   */
  #withSession(
    fn: (session: FetchClientProviderDefinition) => SafeWrapAsync<Error, FetchResponse>,
  ): SafeWrapAsync<Error, FetchResponse> {
    if (!this.#session) {
      return Promise.resolve([new SessionClosedError('error sending request without an open session'), null]);
    }

    return fn(this.#session);
  }

  /**
   * Whether the catalog is loaded or can be fetched now.
   */
  #catalogReachable(): boolean {
    if (this.#catalog.loaded || this.#session) {
      return true;
    }

    this.#logger.warn('Error codes are unavailable without an open session');
    return false;
  }

  /**
   * Releases the body of a response that won't be returned.
   */
  async #discard(response: FetchResponse): Promise<void> {
    const [err] = await discardBody(response);
    if (err) {
      this.#logger.debug({ err }, 'Could not discard response body');
    }
  }

  /**
   * Issues one attempt of a {@link AdcClient.sendRequest} call and logs its outcome.
   */
  async #dispatch(
    method: HttpMethod,
    path: string,
    params?: QueryParams,
    body?: RequestBody,
  ): SafeWrapAsync<Error, FetchResponse> {
    this.#logger.debug({ params, body }, `${method.toUpperCase()} ${path}`);

    const [err, response] = await (method === 'get' || method === 'delete'
      ? this[method](path, params)
      : this[method](path, params, body));
    if (err) {
      this.#logger.error({ err }, `Encountered unhandled error on ${method.toUpperCase()} ${path}`);
      return [err, null];
    }

    if (response.status === 404) {
      this.#logger.warn({ params }, `Got 404 on ${path}`);
    }

    return [null, response];
  }

  /**
   * Fetches the error catalog without consulting it, so a vendor error on the catalog
   * endpoint itself can't recurse. Falls back to an empty catalog on any failure.
   */
  async #loadErrorCodes(): Promise<ErrorCodes> {
    const [errReq, response] = await this.sendRequest('GET', ERROR_CODES_PATH);
    if (errReq) {
      this.#logger.warn({ err: errReq }, 'Could not fetch error codes');
      return {};
    }

    const [errBody, body] = await getResponseData(response);
    if (errBody) {
      this.#logger.warn({ err: errBody }, 'Could not read error codes');
      return {};
    }

    const outcome = unwrapEnvelope(body);
    if (outcome.kind !== 'payload') {
      this.#logger.warn(`Error codes endpoint answered ${response.status} without a catalog`);
      return {};
    }

    const [errCodes, codes] = await validator(outcome.payload, errorCodesSchema);
    if (errCodes) {
      this.#logger.warn({ err: errCodes }, 'Error codes payload is not a code-to-message map');
      return {};
    }

    this.#logger.debug(`Loaded ${Object.keys(codes).length} error codes`);
    return codes;
  }
}
