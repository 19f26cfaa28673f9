/**
 * Shared test helpers for inspecting results.
 */

import type { KeyloomError } from '../../src/errors.js'
import type { Result } from '../../src/result.js'

/** Return the value of a successful result, failing the test otherwise. */
export function expectOk<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.name}: ${result.error.message}`)
  }
  return result.value
}

/** Return the error of a failed result, failing the test otherwise. */
export function expectErr(result: Result<unknown>): KeyloomError {
  if (result.ok) {
    throw new Error('Expected failure, got success')
  }
  return result.error
}
