/**
 * JWE token encryption using `jose` with `dir` + `A128GCM`/`A256GCM`.
 */

import * as crypto from 'node:crypto'
import { FlattenedEncrypt, flattenedDecrypt } from 'jose'
import type { FlattenedJWE } from 'jose'
import { DecryptionError, InvalidKeyError } from '../errors.js'
import { failure, success } from '../result.js'
import type { Result } from '../result.js'
import type { TokenCipher } from './types.js'

const ALGORITHM = 'dir'

const ENCRYPTIONS = {
  16: 'A128GCM',
  32: 'A256GCM',
} as const

type Encryption = (typeof ENCRYPTIONS)[keyof typeof ENCRYPTIONS]

/**
 * Options for token cipher construction.
 * @public
 */
export interface JweTokenCipherOptions {
  /** Key ID to embed in the protected header of every sealed token. */
  kid?: string | undefined
}

/**
 * Type guard that checks whether an unknown value is a non-null object.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parses a raw JSON value into a flattened JWE, keeping only the members
 * `dir` encryption uses. Returns `undefined` if a member has the wrong type.
 */
function parseFlattenedJwe(raw: unknown): FlattenedJWE | undefined {
  if (!isObject(raw)) {
    return undefined
  }

  const { ciphertext, iv, tag, aad } = raw
  const protectedHeader = raw.protected

  if (typeof ciphertext !== 'string') return undefined
  if (typeof protectedHeader !== 'string') return undefined
  if (typeof iv !== 'string') return undefined
  if (typeof tag !== 'string') return undefined
  if (aad !== undefined && typeof aad !== 'string') return undefined

  const jwe: FlattenedJWE = { ciphertext, protected: protectedHeader, iv, tag }
  if (aad !== undefined) {
    jwe.aad = aad
  }
  return jwe
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.byteLength === b.byteLength && crypto.timingSafeEqual(a, b)
}

/**
 * {@link TokenCipher} producing flattened JWE JSON with direct key agreement.
 *
 * @remarks
 * The associated data travels in the token's `aad` member and is bound by
 * the content encryption; `open` additionally requires it to equal the
 * associated data the caller expects.
 * @public
 */
export class JweTokenCipher implements TokenCipher {
  readonly #key: Uint8Array
  readonly #enc: Encryption
  readonly #kid: string | undefined

  private constructor(key: Uint8Array, enc: Encryption, kid: string | undefined) {
    this.#key = key
    this.#enc = enc
    this.#kid = kid
  }

  /**
   * Build a token cipher over a copy of `key`.
   * @param key - 16- or 32-byte AES key
   */
  static create(key: Uint8Array, options?: JweTokenCipherOptions): Result<JweTokenCipher> {
    const size = key.byteLength
    if (size !== 16 && size !== 32) {
      return failure(
        new InvalidKeyError(`JWE content key must be 16 or 32 bytes, got ${String(size)}`, 'JweTokenCipher', 'key-size'),
      )
    }
    return success(new JweTokenCipher(new Uint8Array(key), ENCRYPTIONS[size], options?.kid))
  }

  async seal(plaintext: Uint8Array, associatedData: Uint8Array): Promise<string> {
    const header: { alg: typeof ALGORITHM; enc: Encryption; kid?: string } = {
      alg: ALGORITHM,
      enc: this.#enc,
    }
    if (this.#kid !== undefined) {
      header.kid = this.#kid
    }

    const encrypt = new FlattenedEncrypt(plaintext).setProtectedHeader(header)
    if (associatedData.byteLength > 0) {
      encrypt.setAdditionalAuthenticatedData(associatedData)
    }
    const jwe = await encrypt.encrypt(this.#key)
    return JSON.stringify(jwe)
  }

  async open(token: string, associatedData: Uint8Array): Promise<Result<Uint8Array>> {
    let parsed: unknown
    try {
      parsed = JSON.parse(token)
    } catch {
      return failure(new DecryptionError('JWE token is not valid JSON'))
    }

    const jwe = parseFlattenedJwe(parsed)
    if (jwe === undefined) {
      return failure(new DecryptionError('JWE token is not a flattened dir-encrypted JWE'))
    }

    let plaintext: Uint8Array
    let boundData: Uint8Array
    try {
      const result = await flattenedDecrypt(jwe, this.#key, {
        keyManagementAlgorithms: [ALGORITHM],
        contentEncryptionAlgorithms: [this.#enc],
      })
      plaintext = result.plaintext
      boundData = result.additionalAuthenticatedData ?? new Uint8Array()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      return failure(new DecryptionError(`JWE decryption failed: ${message}`, { cause: err }))
    }

    if (!sameBytes(boundData, associatedData)) {
      return failure(new DecryptionError('JWE associated data does not match'))
    }
    return success(plaintext)
  }

  /** Key ID embedded in sealed tokens, if any. */
  get kid(): string | undefined {
    return this.#kid
  }
}
