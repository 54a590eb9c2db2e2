/**
 * Result Type Module
 *
 * Explicit success/failure values for boundaries that must not throw,
 * such as tool dispatch.
 */

/** Successful result */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed result */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
