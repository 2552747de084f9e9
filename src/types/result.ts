/**
 * Result<T, E> type for the fallible steps inside the request pipeline.
 *
 * A Result is either:
 * - Ok: contains a success value of type T
 * - Err: contains an error value of type E
 *
 * Parsing and validation helpers return a Result; the public operations
 * unwrap it and throw, so callers of a resource only ever see exceptions.
 *
 * @example
 * ```typescript
 * const limit = parseLimit({ limit: "all" });
 * if (!limit.ok) {
 *   throw limit.error;
 * }
 * console.log(limit.value.kind); // "all"
 * ```
 */

/**
 * Success variant of Result<T, E>
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error variant of Result<T, E>
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;
