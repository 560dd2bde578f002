import { describe, it, expect } from 'vitest';
import { getErrorMessage, wrapError } from '../../../src/utils/error-utils';

describe('getErrorMessage', () => {
  it('reads the message of an Error', () => {
    expect(getErrorMessage(new TypeError('bad input'))).toBe('bad input');
  });

  it('stringifies anything else', () => {
    expect(getErrorMessage('raw')).toBe('raw');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('wrapError', () => {
  it('prefixes the context and keeps the original as cause', () => {
    const original = new Error('EACCES');
    const wrapped = wrapError(original, 'Cannot read a.json');
    expect(wrapped.message).toBe('Cannot read a.json: EACCES');
    expect(wrapped.cause).toBe(original);
  });

  it('sets no cause for non-Error values', () => {
    const wrapped = wrapError('oops', 'Loading');
    expect(wrapped.message).toBe('Loading: oops');
    expect(wrapped.cause).toBeUndefined();
  });
});
