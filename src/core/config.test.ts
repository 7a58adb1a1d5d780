import { describe, expect, it } from 'vitest';
import { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import { clientConfigSchema } from './config.js';

describe('clientConfigSchema', () => {
  it('applies defaults and strips trailing slashes', async () => {
    const [err, config] = await validator(
      { baseUrl: 'https://adc.test/', username: 'admin', password: 'test-secret' },
      clientConfigSchema,
    );

    expect(err).toBeNull();
    expect(config).toEqual({
      baseUrl: 'https://adc.test',
      username: 'admin',
      password: 'test-secret',
      verifySsl: false,
      verbosity: 4,
      timeout: 60_000,
      retry: 1,
    });
  });

  it('accepts a disabled timeout', async () => {
    const [err, config] = await validator(
      { baseUrl: 'https://adc.test', username: 'admin', password: 'test-secret', timeout: false },
      clientConfigSchema,
    );

    expect(err).toBeNull();
    expect(config?.timeout).toBe(false);
  });

  it('rejects a malformed base URL and an empty username', async () => {
    const [err, config] = await validator(
      { baseUrl: 'adc.test', username: '', password: 'test-secret' },
      clientConfigSchema,
    );

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.issues.map((issue) => issue.path?.[0])).toEqual([
      'baseUrl',
      'username',
    ]);
  });

  it('rejects verbosity outside 0..5', async () => {
    const [err] = await validator(
      { baseUrl: 'https://adc.test', username: 'admin', password: 'test-secret', verbosity: 9 },
      clientConfigSchema,
    );

    expect(err).toBeInstanceOf(ValidationError);
  });
});
