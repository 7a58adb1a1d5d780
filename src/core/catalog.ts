import { z } from 'zod';

/** Vendor error catalog: stringified numeric code to message text. */
export type ErrorCodes = Record<string, string>;

/** Shape of the catalog payload served by the appliance. */
export const errorCodesSchema = z.record(z.string(), z.string());

/**
 * Memoized view over the appliance's error catalog, owned by one client handle.
 *
 * The catalog is loaded at most once (concurrent first callers share the load) and
 * never expires. `load` must resolve, falling back to an empty catalog on failure.
 */
export class ErrorCatalog {
  #load: () => Promise<ErrorCodes>;
  #codes: Promise<ErrorCodes> | null = null;
  #messages = new Map<number, string>();

  /** Creates a catalog backed by the given loader. */
  constructor(load: () => Promise<ErrorCodes>) {
    this.#load = load;
  }

  /** Whether the catalog load has been started. */
  get loaded(): boolean {
    return this.#codes !== null;
  }

  /** Returns the catalog, loading it on first use. */
  codes(): Promise<ErrorCodes> {
    this.#codes ??= this.#load();
    return this.#codes;
  }

  /**
   * Returns the catalog message for `code`, or `Error code: <code>` when the catalog doesn't know it.
   */
  async message(code: number): Promise<string> {
    const cached = this.#messages.get(code);
    if (cached !== undefined) {
      return cached;
    }

    const codes = await this.codes();
    const known = Object.hasOwn(codes, String(code)) ? codes[String(code)] : undefined;
    const message = known ?? `Error code: ${code}`;
    this.#messages.set(code, message);

    return message;
  }
}
