/**
 * Root entrypoint: re-exports the client, its session layer, logging and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export * from './fetch/index.js';

/** Logger factory and verbosity mapping. */
export { createLogger, DEFAULT_VERBOSITY, type Logger, levelForVerbosity } from './logger/logger.js';

export type { HttpMethod, QueryParams, RequestBody } from './types/request.js';

/** Tuple-style results returned by every fallible operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
