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
    expect(err?.message).toBe('boom');
  });

  it('wraps thrown strings into an Error', () => {
    const [err] = safeWrap(() => {
      throw 'plain';
    });

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain');
    expect(err?.cause).toBe('plain');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(async () => 'ok');

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const rejection = new TypeError('fetch failed');
    const [err, data] = await safeWrapAsync(() => Promise.reject(rejection));

    expect(data).toBeNull();
    expect(err).toBe(rejection);
  });
});

describe('toError', () => {
  it('keeps errors as they are', () => {
    const err = new RangeError('out');

    expect(toError(err)).toBe(err);
  });

  it('describes non-error values and keeps them as cause', () => {
    const err = toError({ code: 7 });

    expect(err.message).toBe('error non-error value thrown');
    expect(err.cause).toEqual({ code: 7 });
  });
});
