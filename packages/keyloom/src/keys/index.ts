/**
 * Key management barrel export.
 *
 * @packageDocumentation
 */

export { KeyTypeManager, GeneratingKeyTypeManager, canGenerateKeys } from './manager.js'
export type { KeyManagerHandle } from './manager.js'
export { KEY_MATERIAL_TYPES } from './types.js'
export type { KeyMaterialType, KeyManagerOptions, KeyManagerDescription } from './types.js'
export { AES_KEY_SIZES, validateVersion, validateAesKeySize } from './validation.js'
