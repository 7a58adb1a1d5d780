import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(TargetError, null)).toBeNull();
    expect(unwrapErrorType(TargetError, 'boom')).toBeNull();
    expect(unwrapErrorType(TargetError, { cause: new TargetError('hidden') })).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new TargetError('direct');
    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  it('returns the outermost match in the cause chain', () => {
    const inner = new TargetError('inner');
    const outer = new TargetError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(TargetError, new Error('top', { cause: outer }))).toBe(outer);
  });

  it('stops at a non-error cause', () => {
    const err = new Error('top', { cause: 'string cause' });
    expect(unwrapErrorType(TargetError, err)).toBeNull();
  });

  it('terminates on cyclic cause chains', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(unwrapErrorType(TargetError, a)).toBeNull();
  });
});
