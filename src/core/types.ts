import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from '../logger/logger.js';
import type { FetchClientProvider, QueryParams, RequestBody } from '../types/request.js';
import type { ClientConfigInput } from './config.js';

/** Constructor options for {@link AdcClient}, extends {@link ClientConfigInput}. */
export interface AdcClientProps extends ClientConfigInput {
  /** HTTP session implementation. Defaults to the undici-backed `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /**
   * Logger to write through. When absent, a pino logger is created from `verbosity`.
   */
  logger?: Logger;
}

/**
 * Outcome of {@link AdcClient.handleResponse}.
 *
 * - success: `isError: false`, the unwrapped `payload`.
 * - vendor error: `isError: true`, the vendor `code` and its catalog `message`.
 * - missing payload: `isError: true` with neither code nor message.
 */
export type HandledResponse =
  | { isError: false; message: null; payload: unknown; code: null }
  | { isError: true; message: string; payload: null; code: number }
  | { isError: true; message: null; payload: null; code: null };

/** Options for {@link AdcClient.request}. */
export interface RequestOptions<Schema extends StandardSchemaV1 = StandardSchemaV1> {
  params?: QueryParams;
  body?: RequestBody;
  /** Validates the unwrapped payload; its output becomes the result. */
  schema?: Schema;
}
