import { describe, expect, it } from 'vitest';
import { createLogger, levelForVerbosity } from './logger.js';

/** Collects every line pino writes. */
function memoryDestination() {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe('levelForVerbosity', () => {
  it.each([
    [0, 'silent'],
    [1, 'fatal'],
    [2, 'error'],
    [3, 'warn'],
    [4, 'info'],
    [5, 'debug'],
  ] as const)('maps %i to %s', (verbosity, level) => {
    expect(levelForVerbosity(verbosity)).toBe(level);
  });

  it('clamps out-of-range verbosity', () => {
    expect(levelForVerbosity(-3)).toBe('silent');
    expect(levelForVerbosity(42)).toBe('debug');
  });
});

describe('createLogger', () => {
  it('writes named lines with a textual level', () => {
    const destination = memoryDestination();
    const logger = createLogger({ verbosity: 4, destination });

    logger.info('Initializing API client');

    expect(destination.lines).toHaveLength(1);
    expect(destination.lines[0]).toMatchObject({ name: 'ADC', level: 'info', msg: 'Initializing API client' });
  });

  it('drops lines below the verbosity level', () => {
    const destination = memoryDestination();
    const logger = createLogger({ name: 'test', verbosity: 3, destination });

    logger.info('dropped');
    logger.warn('kept');

    expect(destination.lines.map((line) => line.msg)).toEqual(['kept']);
  });
});
