/**
 * keyloom test-helpers: test utilities for keyloom consumers.
 *
 * @packageDocumentation
 */

export { SeededRandomSource } from './seeded-random.js'
export { RAW_KEY_ACCESS, RawKeyAccess, rawKeyAccessFactory } from './raw-key-access.js'
export type { KeyBytesAccess } from './raw-key-access.js'
export {
  createMultiPrimitiveManager,
  UseOnlyAesGcmKeyManager,
  USE_ONLY_KEY_TYPE,
} from './managers.js'
