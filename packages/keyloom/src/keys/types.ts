/**
 * Key management types for keyloom.
 */

import type { RandomSource } from '../util/random.js'

/**
 * Classification of a key's role.
 * @public
 */
export type KeyMaterialType = 'SYMMETRIC' | 'ASYMMETRIC_PRIVATE' | 'ASYMMETRIC_PUBLIC' | 'REMOTE'

/** All key material classifications. */
export const KEY_MATERIAL_TYPES: readonly KeyMaterialType[] = [
  'SYMMETRIC',
  'ASYMMETRIC_PRIVATE',
  'ASYMMETRIC_PUBLIC',
  'REMOTE',
]

/**
 * Constructor options for key managers that generate keys.
 * @public
 */
export interface KeyManagerOptions {
  /** Source of key material. Defaults to `nodeRandomSource`. */
  random?: RandomSource | undefined
}

/**
 * A plain, serializable summary of a key manager.
 * @public
 */
export interface KeyManagerDescription {
  keyType: string
  version: number
  keyMaterialType: KeyMaterialType
  /** Names of the primitives the manager can build. */
  primitives: string[]
  /** Whether the manager can generate new keys. */
  generatesKeys: boolean
}
