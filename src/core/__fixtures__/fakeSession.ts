import { type Headers, Response } from 'undici';
import { mergeHeaderOptions } from '../../fetch/utils.js';
import { createLogger, type Logger } from '../../logger/logger.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HttpMethod,
  QueryParams,
} from '../../types/request.js';
import type { SafeWrapAsync } from '../../utils/wrap.js';

/** One request as the fake session saw it. */
export interface RecordedCall {
  method: HttpMethod;
  path: string;
  params?: QueryParams;
  body?: string;
  /** `Authorization` header in effect when the request was sent. */
  authorization: string | null;
}

/** Answers a recorded call with a response, or an error standing for a transport failure. */
export type RouteHandler = (call: RecordedCall) => FetchResponse | Error;

/** In-process stand-in for the undici session, driven by a route handler. */
export function createFakeSession(handler: RouteHandler) {
  const calls: RecordedCall[] = [];
  const sessions: FakeSession[] = [];

  class FakeSession implements FetchClientProviderDefinition {
    readonly baseUrl: string;
    readonly options: FetchClientOptions;
    headers: Headers;
    closeCount = 0;

    constructor(baseUrl: string, opts: FetchClientOptions) {
      this.baseUrl = baseUrl;
      this.options = opts;
      this.headers = mergeHeaderOptions(opts.headers);
      sessions.push(this);
    }

    config(opts: FetchClientOptions) {
      this.headers = mergeHeaderOptions(this.headers, opts.headers);
    }

    get(path: string, opts: Omit<FetchOptions, 'body'> = {}) {
      return this.#handle('get', path, opts);
    }

    post(path: string, opts: FetchOptions = {}) {
      return this.#handle('post', path, opts);
    }

    put(path: string, opts: FetchOptions = {}) {
      return this.#handle('put', path, opts);
    }

    delete(path: string, opts: Omit<FetchOptions, 'body'> = {}) {
      return this.#handle('delete', path, opts);
    }

    async close() {
      this.closeCount += 1;
    }

    async #handle(method: HttpMethod, path: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
      const call: RecordedCall = {
        method,
        path,
        params: opts.params,
        body: opts.body,
        authorization: this.headers.get('authorization'),
      };
      calls.push(call);

      const outcome = handler(call);
      if (outcome instanceof Error) {
        return [outcome, null];
      }

      return [null, outcome];
    }
  }

  return { Provider: FakeSession, calls, sessions };
}

/** JSON response helper. */
export function json(body: unknown, status = 200): FetchResponse {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Logger writing parsed lines into memory. */
export function memoryLogger(verbosity = 5): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    verbosity,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });

  return { logger, lines };
}
