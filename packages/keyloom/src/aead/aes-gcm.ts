/**
 * AES-GCM authenticated encryption using `node:crypto`.
 */

import * as crypto from 'node:crypto'
import { DecryptionError, InvalidKeyError } from '../errors.js'
import { failure, success } from '../result.js'
import type { Result } from '../result.js'
import { nodeRandomSource } from '../util/random.js'
import type { RandomSource } from '../util/random.js'
import type { Aead } from './types.js'

const IV_SIZE = 12
const TAG_SIZE = 16

const CIPHERS = {
  16: 'aes-128-gcm',
  32: 'aes-256-gcm',
} as const

/**
 * AES-GCM with a random 96-bit IV per message.
 *
 * @remarks
 * Ciphertext layout: `iv (12 bytes) || encrypted plaintext || tag (16 bytes)`.
 * @public
 */
export class AesGcm implements Aead {
  readonly #key: Buffer
  readonly #cipher: (typeof CIPHERS)[keyof typeof CIPHERS]
  readonly #random: RandomSource

  private constructor(key: Buffer, cipher: (typeof CIPHERS)[keyof typeof CIPHERS], random: RandomSource) {
    this.#key = key
    this.#cipher = cipher
    this.#random = random
  }

  /**
   * Build an AES-GCM primitive over a copy of `key`.
   *
   * @param key - 16- or 32-byte AES key
   * @param random - Source of IVs; defaults to `nodeRandomSource`
   */
  static create(key: Uint8Array, random: RandomSource = nodeRandomSource): Result<AesGcm> {
    const size = key.byteLength
    if (size !== 16 && size !== 32) {
      return failure(
        new InvalidKeyError(`AES-GCM key must be 16 or 32 bytes, got ${String(size)}`, 'AesGcm', 'key-size'),
      )
    }
    return success(new AesGcm(Buffer.from(key), CIPHERS[size], random))
  }

  encrypt(plaintext: Uint8Array, associatedData: Uint8Array): Uint8Array {
    const iv = this.#random.getRandomBytes(IV_SIZE)
    const cipher = crypto.createCipheriv(this.#cipher, this.#key, iv, { authTagLength: TAG_SIZE })
    cipher.setAAD(associatedData)
    const body = Buffer.concat([cipher.update(plaintext), cipher.final()])
    return new Uint8Array(Buffer.concat([iv, body, cipher.getAuthTag()]))
  }

  decrypt(ciphertext: Uint8Array, associatedData: Uint8Array): Result<Uint8Array> {
    if (ciphertext.byteLength < IV_SIZE + TAG_SIZE) {
      return failure(new DecryptionError('Ciphertext too short'))
    }
    const iv = ciphertext.subarray(0, IV_SIZE)
    const body = ciphertext.subarray(IV_SIZE, ciphertext.byteLength - TAG_SIZE)
    const tag = ciphertext.subarray(ciphertext.byteLength - TAG_SIZE)

    const decipher = crypto.createDecipheriv(this.#cipher, this.#key, iv, { authTagLength: TAG_SIZE })
    decipher.setAAD(associatedData)
    decipher.setAuthTag(tag)
    try {
      return success(new Uint8Array(Buffer.concat([decipher.update(body), decipher.final()])))
    } catch (err) {
      return failure(new DecryptionError('AES-GCM authentication failed', { cause: err }))
    }
  }
}
