import { describe, expect, it } from 'vitest';
import { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';

describe('ConnectionError', () => {
  it('exposes url via getter', () => {
    const err = new ConnectionError('cannot connect', 'https://adc.test/api/user/login');
    expect(err.url).toBe('https://adc.test/api/user/login');
  });
});

describe('isConnectionError', () => {
  it('returns true for instances of ConnectionError', () => {
    expect(isConnectionError(new ConnectionError('cannot connect', 'https://adc.test'))).toBe(true);
  });

  it('returns false for non ConnectionError errors', () => {
    expect(isConnectionError(new TypeError('fetch failed'))).toBe(false);
  });
});

describe('getConnectionError', () => {
  it('unwraps nested causes', () => {
    const err = new ConnectionError('cannot connect', 'https://adc.test');
    const wrapped = new Error('outer', { cause: err });
    expect(getConnectionError(wrapped)).toBe(err);
  });

  it('returns null when no ConnectionError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });
    expect(getConnectionError(wrapped)).toBeNull();
  });
});
