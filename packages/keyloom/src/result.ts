/**
 * Explicit success/failure values for operations whose failures are
 * expected outcomes (bad key, bad format, unsupported primitive).
 */

import type { KeyloomError } from './errors.js'

/**
 * Outcome of a fallible keyloom operation.
 * @public
 */
export type Result<T, E extends KeyloomError = KeyloomError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

/** Wrap a value as a successful result. */
export const success = <T>(value: T): Result<T, never> => ({ ok: true, value })

/** The successful result of an operation with no value. */
export const OK: Result<void, never> = { ok: true, value: undefined }

/** Wrap an error as a failed result. */
export const failure = <E extends KeyloomError>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Return the value of a successful result, or throw the carried error.
 *
 * @throws {@link KeyloomError} the error of a failed result
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

