/**
 * Deterministic randomness for tests.
 */

import * as crypto from 'node:crypto'
import type { RandomSource } from 'keyloom'

/**
 * A reproducible {@link RandomSource}.
 *
 * @remarks
 * Output is the concatenation of `SHA-256(seed || counter)` blocks, with a
 * 32-bit big-endian counter starting at 0. Successive calls continue the same
 * stream, so two draws of 8 bytes equal one draw of 16. Not for production
 * use.
 *
 * @example
 * ```ts
 * const manager = new AesGcmKeyManager({ random: new SeededRandomSource('test-seed') })
 * ```
 *
 * @public
 */
export class SeededRandomSource implements RandomSource {
  readonly #seed: Buffer
  #counter = 0
  #pending: Buffer = Buffer.alloc(0)
  #drawn = 0

  constructor(seed: string | Uint8Array) {
    this.#seed = typeof seed === 'string' ? Buffer.from(seed, 'utf-8') : Buffer.from(seed)
  }

  /** @public */
  getRandomBytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Random byte length must be a non-negative integer, got ${String(length)}`)
    }
    while (this.#pending.byteLength < length) {
      const counter = Buffer.alloc(4)
      counter.writeUInt32BE(this.#counter)
      this.#counter++
      const block = crypto.createHash('sha256').update(this.#seed).update(counter).digest()
      this.#pending = Buffer.concat([this.#pending, block])
    }
    const out = new Uint8Array(this.#pending.subarray(0, length))
    this.#pending = this.#pending.subarray(length)
    this.#drawn += length
    return out
  }

  /**
   * Total number of bytes handed out so far.
   * @public
   */
  get bytesDrawn(): number {
    return this.#drawn
  }
}
