import { type DestinationStream, type Level, type Logger, pino } from 'pino';

/** Logger type used across the client. */
export type { Logger } from 'pino';

/** Pino levels indexed by verbosity, 0 being quietest. */
export const VERBOSITY_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug'] as const satisfies ReadonlyArray<
  Level | 'silent'
>;

/** Verbosity used when none is configured (`info`). */
export const DEFAULT_VERBOSITY = 4;

/** Options for {@link createLogger}. */
export interface CreateLoggerOptions {
  /** Logger name, printed as `name` on every line. @default 'ADC' */
  name?: string;
  /** Verbosity 0..5, clamped when out of range. @default 4 */
  verbosity?: number;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Resolves a verbosity number into a pino level.
 */
export function levelForVerbosity(verbosity: number): (typeof VERBOSITY_LEVELS)[number] {
  const index = Math.min(Math.max(Math.trunc(verbosity), 0), VERBOSITY_LEVELS.length - 1);
  return VERBOSITY_LEVELS[index] ?? 'info';
}

/**
 * Builds the pino logger a client logs through when the caller doesn't inject one.
 */
export function createLogger({ name = 'ADC', verbosity = DEFAULT_VERBOSITY, destination }: CreateLoggerOptions = {}): Logger {
  const options = {
    name,
    level: levelForVerbosity(verbosity),
    formatters: { level: (label: string) => ({ level: label }) },
  };

  return destination ? pino(options, destination) : pino(options);
}
