/**
 * Discriminated result returned by every fallible timestamp operation.
 * Shaped like zod's `safeParse` so both read the same at call sites.
 */

export interface Ok<T> {
  readonly success: true;
  readonly value: T;
}

export interface Err<E> {
  readonly success: false;
  readonly error: E;
}

export type Result<T, E extends Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { success: true, value };
}

export function err<E extends Error>(error: E): Err<E> {
  return { success: false, error };
}

/**
 * Return the value or throw the carried error.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.success) return result.value;
  throw result.error;
}
