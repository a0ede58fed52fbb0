// A value in the idiom of whichever scheduling model produced it: plain for
// blocking code, a promise for cooperative and offloaded code.
export type Awaitable<T> = T | PromiseLike<T>;

export function isPromiseLike<T>(value: Awaitable<T>): value is PromiseLike<T> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Continue with `next` once `value` is available, staying synchronous when
 * it already is.
 */
export function settle<T, U>(value: Awaitable<T>, next: (resolved: T) => Awaitable<U>): Awaitable<U> {
  if (isPromiseLike(value)) {
    return new Promise<T>((resolve) => resolve(value)).then(next);
  }
  return next(value);
}
