/**
 * A primitive that exposes key bytes, for testing multi-primitive managers.
 */

import { definePrimitive, success } from 'keyloom'
import type { AesGcmKey, PrimitiveFactory } from 'keyloom'

/**
 * Read access to the raw material of a key.
 *
 * @remarks
 * Offers no protection at all; it exists so tests can check that every
 * primitive a manager builds sees the same key material.
 * @public
 */
export interface KeyBytesAccess {
  getKeyBytes(): Uint8Array
}

/** Token for the {@link KeyBytesAccess} primitive. */
export const RAW_KEY_ACCESS = definePrimitive<KeyBytesAccess>(
  'RawKeyAccess',
  (value): value is KeyBytesAccess =>
    typeof value === 'object' && value !== null && typeof Reflect.get(value, 'getKeyBytes') === 'function',
)

/**
 * Holds a copy of the key bytes it was built from.
 * @public
 */
export class RawKeyAccess implements KeyBytesAccess {
  readonly #bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    this.#bytes = new Uint8Array(bytes)
  }

  /** @public */
  getKeyBytes(): Uint8Array {
    return new Uint8Array(this.#bytes)
  }
}

/** Builds a {@link RawKeyAccess} over an AES-GCM key. */
export const rawKeyAccessFactory: PrimitiveFactory<AesGcmKey, KeyBytesAccess> = Object.freeze({
  primitive: RAW_KEY_ACCESS,
  create: (key: AesGcmKey) => success(new RawKeyAccess(key.keyValue)),
})
