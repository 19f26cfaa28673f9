/**
 * Key manager registry barrel export.
 *
 * @packageDocumentation
 */

export { KeyManagerRegistry, KeyManagerRegistryBuilder } from './key-manager-registry.js'
export type {
  KeyManagerSource,
  KeyTypeEntryOptions,
  KeyTypeEntryDescription,
} from './key-manager-registry.js'
export { loadKeyManagerRegistry } from './load.js'
export type { LoadRegistryOptions } from './load.js'
