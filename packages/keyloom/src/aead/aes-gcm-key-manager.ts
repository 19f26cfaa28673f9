/**
 * Key manager for AES-GCM keys.
 */

import { InvalidKeyFormatError } from '../errors.js'
import { GeneratingKeyTypeManager } from '../keys/manager.js'
import type { KeyManagerOptions, KeyMaterialType } from '../keys/types.js'
import { AES_KEY_SIZES, validateAesKeySize, validateVersion } from '../keys/validation.js'
import { PrimitiveRegistry } from '../primitive/registry.js'
import type { PrimitiveFactory } from '../primitive/types.js'
import { OK, failure } from '../result.js'
import type { Result } from '../result.js'
import type { RandomSource } from '../util/random.js'
import { AesGcm } from './aes-gcm.js'
import { JweTokenCipher } from './token-cipher.js'
import { AEAD, TOKEN_CIPHER } from './types.js'
import type { Aead, TokenCipher } from './types.js'

/** Key type identifier of {@link AesGcmKeyManager}. */
export const AES_GCM_KEY_TYPE = 'keyloom.AesGcmKey'

/**
 * An AES-GCM key.
 * @public
 */
export interface AesGcmKey {
  /** Format version the key was produced under. */
  readonly version: number
  /** Raw AES key bytes. */
  readonly keyValue: Uint8Array
}

/**
 * Parameters for generating an AES-GCM key.
 * @public
 */
export interface AesGcmKeyFormat {
  /** Key size in bytes: 16 or 32. */
  readonly keySize: number
}

/**
 * Options for {@link AesGcmKeyManager}.
 * @public
 */
export interface AesGcmKeyManagerOptions extends KeyManagerOptions {
  /**
   * Primitive factories to serve. Defaults to {@link AEAD} and
   * {@link TOKEN_CIPHER}.
   */
  primitives?: PrimitiveRegistry<AesGcmKey> | undefined
}

/** Builds an {@link AesGcm} primitive. */
export const aesGcmAeadFactory: PrimitiveFactory<AesGcmKey, Aead> = Object.freeze({
  primitive: AEAD,
  create: (key: AesGcmKey) => AesGcm.create(key.keyValue),
})

/** Builds a {@link JweTokenCipher} primitive. */
export const aesGcmTokenCipherFactory: PrimitiveFactory<AesGcmKey, TokenCipher> = Object.freeze({
  primitive: TOKEN_CIPHER,
  create: (key: AesGcmKey) => JweTokenCipher.create(key.keyValue),
})

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates, generates and uses AES-GCM keys.
 *
 * @example
 * ```ts
 * const manager = new AesGcmKeyManager()
 * const key = unwrap(manager.createKey({ keySize: 16 }))
 * const aead = unwrap(manager.create(AEAD, key))
 * ```
 *
 * @remarks
 * Instances are frozen once constructed.
 * @public
 */
export class AesGcmKeyManager extends GeneratingKeyTypeManager<AesGcmKey, AesGcmKeyFormat> {
  readonly keyType = AES_GCM_KEY_TYPE
  readonly version = 0
  readonly keyMaterialType: KeyMaterialType = 'SYMMETRIC'

  constructor(options?: AesGcmKeyManagerOptions) {
    super(
      options?.primitives ?? PrimitiveRegistry.of<AesGcmKey>(aesGcmAeadFactory, aesGcmTokenCipherFactory),
      options,
    )
    Object.freeze(this)
  }

  validateKey(key: AesGcmKey): Result<void> {
    const version = validateVersion(this.keyType, key.version, this.version)
    if (!version.ok) {
      return version
    }
    return validateAesKeySize(this.keyType, key.keyValue.byteLength)
  }

  validateKeyFormat(format: AesGcmKeyFormat): Result<void> {
    if (!AES_KEY_SIZES.includes(format.keySize)) {
      return failure(
        new InvalidKeyFormatError(
          `Invalid AES key size ${String(format.keySize)} bytes; supported sizes: ${AES_KEY_SIZES.join(', ')}`,
          this.keyType,
          'key-size',
        ),
      )
    }
    return OK
  }

  isKey(value: unknown): value is AesGcmKey {
    return isObject(value) && typeof value.version === 'number' && value.keyValue instanceof Uint8Array
  }

  isKeyFormat(value: unknown): value is AesGcmKeyFormat {
    return isObject(value) && typeof value.keySize === 'number'
  }

  protected generateKey(format: AesGcmKeyFormat, random: RandomSource): AesGcmKey {
    return {
      version: this.version,
      keyValue: random.getRandomBytes(format.keySize),
    }
  }
}
