import { describe, it, expect } from 'vitest';
import { tryFn, tryFnSync } from '../../src/concerns/try-fn.js';

describe('tryFn', () => {
  it('should return the value of a resolved promise', async () => {
    expect(await tryFn(Promise.resolve(42))).toEqual([true, null, 42]);
  });

  it('should call a function and await its result', async () => {
    expect(await tryFn(async () => 'done')).toEqual([true, null, 'done']);
  });

  it('should capture rejections', async () => {
    const [ok, err, data] = await tryFn(Promise.reject(new Error('boom')));
    expect(ok).toBe(false);
    expect(err?.message).toBe('boom');
    expect(data).toBeUndefined();
  });

  it('should wrap non-error rejections', async () => {
    const [ok, err] = await tryFn(async () => {
      throw 'plain string';
    });
    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain string');
  });
});

describe('tryFnSync', () => {
  it('should return the value', () => {
    expect(tryFnSync(() => JSON.parse('{"a":1}'))).toEqual([true, null, { a: 1 }]);
  });

  it('should capture thrown errors', () => {
    const [ok, err] = tryFnSync(() => JSON.parse('{'));
    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(SyntaxError);
  });
});
