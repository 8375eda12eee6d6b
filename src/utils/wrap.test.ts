import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new Error('boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('boom');
  });

  it('keeps SyntaxError from JSON.parse as-is', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ nope'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });
});

describe('toError', () => {
  it('returns errors untouched', () => {
    const original = new TypeError('fetch failed');

    expect(toError(original)).toBe(original);
  });

  it('wraps strings as the message', () => {
    const err = toError('socket hang up');

    expect(err.message).toBe('socket hang up');
    expect(err.cause).toBe('socket hang up');
  });

  it('wraps other values with the value as cause', () => {
    const err = toError({ code: 'ECONNRESET' });

    expect(err.message).toBe('non-error value thrown');
    expect(err.cause).toEqual({ code: 'ECONNRESET' });
  });
});
