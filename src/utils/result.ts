/**
 * Helper functions for working with Result<T, E> types.
 *
 * @module result
 */

import { Result, Ok as OkType, Err as ErrType } from '../types/result';

/**
 * Create a successful Result containing a value.
 *
 * @example
 * ```typescript
 * const result = Ok("/events");
 * // result: Ok<string> = { ok: true, value: "/events" }
 * ```
 */
export function Ok<T>(value: T): OkType<T> {
  return { ok: true, value };
}

/**
 * Create a failed Result containing an error.
 *
 * @example
 * ```typescript
 * const result = Err(new DefinitionError("Invalid `to`"));
 * // result.ok === false
 * ```
 */
export function Err<E>(error: E): ErrType<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is OkType<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrType<E> {
  return result.ok === false;
}

/**
 * Return the success value, or throw the error held by an Err.
 *
 * Used at the boundary between the internal Result-based helpers and the
 * public, exception-based resource operations.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (isErr(result)) {
    throw result.error;
  }
  return result.value;
}
