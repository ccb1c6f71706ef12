import type { AppError } from "../errors/app-error.js";

/**
 * Result monad. Services never throw across their boundary; every fallible
 * operation returns Result<T, E>.
 */

export type Result<T, E = AppError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Rewrite the error, e.g. a store CONFLICT into the error a service reports */
export const mapErr = <T, E, F>(result: Result<T, E>, fn: (e: E) => F): Result<T, F> =>
  result.ok ? result : err(fn(result.error));
