/**
 * Pre-wired key managers for consumer tests.
 */

import {
  AesGcmKeyManager,
  KeyTypeManager,
  PrimitiveRegistry,
  aesGcmAeadFactory,
  validateAesKeySize,
  validateVersion,
} from 'keyloom'
import type { AesGcmKey, KeyManagerOptions, KeyMaterialType, Result } from 'keyloom'
import { rawKeyAccessFactory } from './raw-key-access.js'

/**
 * An AES-GCM manager serving two primitives from the same key: `AEAD` and
 * `RAW_KEY_ACCESS`.
 *
 * @public
 */
export function createMultiPrimitiveManager(options?: KeyManagerOptions): AesGcmKeyManager {
  return new AesGcmKeyManager({
    ...options,
    primitives: PrimitiveRegistry.of<AesGcmKey>(aesGcmAeadFactory, rawKeyAccessFactory),
  })
}

/**
 * Key type of {@link UseOnlyAesGcmKeyManager}.
 * @public
 */
export const USE_ONLY_KEY_TYPE = 'keyloom.test.UseOnlyAesGcmKey'

/**
 * A manager that uses AES-GCM keys but cannot generate them.
 *
 * @remarks
 * Accepts keys produced by any AES-GCM manager whose version is at most
 * {@link UseOnlyAesGcmKeyManager.version}.
 *
 * @public
 */
export class UseOnlyAesGcmKeyManager extends KeyTypeManager<AesGcmKey> {
  readonly keyType = USE_ONLY_KEY_TYPE
  readonly version: number
  readonly keyMaterialType: KeyMaterialType = 'SYMMETRIC'

  /**
   * @param version - Newest key version to accept. Defaults to 0.
   */
  constructor(version = 0) {
    super(PrimitiveRegistry.of<AesGcmKey>(aesGcmAeadFactory, rawKeyAccessFactory))
    this.version = version
    Object.freeze(this)
  }

  /** @public */
  validateKey(key: AesGcmKey): Result<void> {
    const version = validateVersion(this.keyType, key.version, this.version)
    if (!version.ok) {
      return version
    }
    return validateAesKeySize(this.keyType, key.keyValue.byteLength)
  }

  /** @public */
  isKey(value: unknown): value is AesGcmKey {
    return (
      typeof value === 'object' &&
      value !== null &&
      typeof Reflect.get(value, 'version') === 'number' &&
      Reflect.get(value, 'keyValue') instanceof Uint8Array
    )
  }
}
