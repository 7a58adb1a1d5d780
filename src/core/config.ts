import { z } from 'zod';
import { DEFAULT_TIMEOUT } from '../fetch/client.js';
import { DEFAULT_VERBOSITY } from '../logger/logger.js';

/** Default number of re-authentications per request after a 401. */
export const DEFAULT_RETRY = 1;

/**
 * Schema for the client configuration. Validated through the standard-schema interface
 * when the client initializes.
 */
export const clientConfigSchema = z.object({
  /** Appliance URL, e.g. `https://adc.example.com`. Trailing slashes are stripped. */
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string().min(1),
  password: z.string(),
  verifySsl: z.boolean().default(false),
  verbosity: z.number().int().min(0).max(5).default(DEFAULT_VERBOSITY),
  timeout: z.union([z.number().int().positive(), z.literal(false)]).default(DEFAULT_TIMEOUT),
  retry: z.number().int().min(0).default(DEFAULT_RETRY),
});

/** Configuration as accepted by the client (defaults optional). */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Configuration after validation, defaults applied. */
export type ClientConfig = z.output<typeof clientConfigSchema>;
