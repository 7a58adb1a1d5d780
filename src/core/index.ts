/**
 * Core entrypoint: exports the appliance client, its configuration and the error catalog.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/** Client for the appliance's REST management API. */
export { AdcClient, DEFAULT_HEADERS, ERROR_CODES_PATH, LOGIN_PATH } from './client.js';
/** Scoped client usage that always releases the session. */
export { withClient } from './scope.js';
/** Client configuration schema and defaults. */
export { type ClientConfig, type ClientConfigInput, clientConfigSchema, DEFAULT_RETRY } from './config.js';
/** Memoized vendor error catalog. */
export { ErrorCatalog, type ErrorCodes } from './catalog.js';
/** Envelope contract helpers. */
export { type EnvelopeOutcome, isVendorErrorCode, unwrapEnvelope } from './envelope.js';
export type { AdcClientProps, HandledResponse, RequestOptions } from './types.js';
