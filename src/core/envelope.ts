import { z } from 'zod';

/** Wrapper object the appliance puts around every API result. */
export const envelopeSchema = z.object({ payload: z.unknown() });

/** Result of unwrapping an envelope. */
export type EnvelopeOutcome =
  | { kind: 'payload'; payload: unknown }
  | { kind: 'vendor-error'; code: number }
  | { kind: 'missing' };

/**
 * Checks whether a payload is a vendor error code (a negative integer).
 */
export function isVendorErrorCode(payload: unknown): payload is number {
  return typeof payload === 'number' && Number.isInteger(payload) && payload < 0;
}

/**
 * Applies the envelope contract to a parsed response body:
 * - no `payload` key (or a body that isn't an object) is an error without a code,
 * - a negative integer payload is a vendor error carrying that code,
 * - anything else is the result.
 */
export function unwrapEnvelope(body: unknown): EnvelopeOutcome {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success || parsed.data.payload === undefined) {
    return { kind: 'missing' };
  }

  const { payload } = parsed.data;
  if (isVendorErrorCode(payload)) {
    return { kind: 'vendor-error', code: payload };
  }

  return { kind: 'payload', payload };
}
