/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Awaits an async function or promise and returns `[ok, err, data]` instead
 * of throwing. Used where a failure is an expected outcome that the caller
 * branches on (backend calls, file writes).
 */
export async function tryFn<T>(fnOrPromise: (() => Promise<T>) | Promise<T>): Promise<TryResult<T>> {
  try {
    const data = typeof fnOrPromise === 'function' ? await fnOrPromise() : await fnOrPromise;
    return [true, null, data];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

/**
 * Synchronous version of tryFn for parsers and other pure steps
 */
export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    return [true, null, fn()];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

export default tryFn;
