/**
 * Randomness sources for key generation.
 */

import * as crypto from 'node:crypto'

/**
 * A source of cryptographic-quality random bytes.
 *
 * @remarks
 * Key managers share one source across concurrent `createKey` calls, so an
 * implementation must be safe to call from interleaved tasks.
 * @public
 */
export interface RandomSource {
  /**
   * @param length - Number of bytes to return
   * @throws RangeError if `length` is negative or not an integer
   */
  getRandomBytes(length: number): Uint8Array
}

/**
 * Random source backed by `crypto.randomBytes`.
 * @public
 */
export const nodeRandomSource: RandomSource = Object.freeze({
  getRandomBytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Random byte length must be a non-negative integer, got ${String(length)}`)
    }
    return new Uint8Array(crypto.randomBytes(length))
  },
})
