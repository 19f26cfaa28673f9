/**
 * Authenticated-encryption primitive interfaces and their tokens.
 */

import { definePrimitive } from '../primitive/types.js'
import type { Result } from '../result.js'

/**
 * Authenticated encryption with associated data.
 *
 * @remarks
 * `associatedData` is authenticated but not encrypted; decryption succeeds
 * only with the same associated data that was used to encrypt.
 * @public
 */
export interface Aead {
  encrypt(plaintext: Uint8Array, associatedData: Uint8Array): Uint8Array
  decrypt(ciphertext: Uint8Array, associatedData: Uint8Array): Result<Uint8Array>
}

/**
 * Authenticated encryption to a self-describing JWE token.
 * @public
 */
export interface TokenCipher {
  /** Encrypt `plaintext` into a flattened JWE, serialized as JSON. */
  seal(plaintext: Uint8Array, associatedData: Uint8Array): Promise<string>
  open(token: string, associatedData: Uint8Array): Promise<Result<Uint8Array>>
}

function hasMethods(value: unknown, ...names: string[]): boolean {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  return names.every((name) => typeof Reflect.get(value, name) === 'function')
}

/** Token for the {@link Aead} primitive. */
export const AEAD = definePrimitive<Aead>('Aead', (value): value is Aead =>
  hasMethods(value, 'encrypt', 'decrypt'),
)

/** Token for the {@link TokenCipher} primitive. */
export const TOKEN_CIPHER = definePrimitive<TokenCipher>(
  'TokenCipher',
  (value): value is TokenCipher => hasMethods(value, 'seal', 'open'),
)
