/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * tryFn - turns a rejected promise (or a throwing async function) into a
 * result tuple, so failures can be handled as values.
 */
export async function tryFn<T>(fnOrPromise: Promise<T> | (() => Promise<T>)): Promise<TryResult<T>> {
  try {
    const data = await (typeof fnOrPromise === 'function' ? fnOrPromise() : fnOrPromise);
    return [true, null, data];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

export default tryFn;
