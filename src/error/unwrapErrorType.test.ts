import { describe, expect, it } from 'vitest';
import { DecodeError } from './decodeError.js';
import { TransportError } from './transportError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

describe('unwrapErrorType', () => {
  it('returns null for non-errors', () => {
    expect(unwrapErrorType(TransportError, undefined)).toBeNull();
    expect(unwrapErrorType(TransportError, 42)).toBeNull();
  });

  it('returns the same instance when it matches directly', () => {
    const err = new TransportError('error wrapping GET request in fetchClient', 'GET', '/tags');

    expect(unwrapErrorType(TransportError, err)).toBe(err);
  });

  it('returns the nested instance from a cause chain', () => {
    const err = new DecodeError('error validating response body', 'GET', '/tags/1');
    const wrapped = new Error('outer', { cause: new Error('middle', { cause: err }) });

    expect(unwrapErrorType(DecodeError, wrapped)).toBe(err);
  });

  it('returns null when no link in the chain matches', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });

    expect(unwrapErrorType(DecodeError, wrapped)).toBeNull();
  });
});
