/**
 * Primitive registry barrel export.
 *
 * @packageDocumentation
 */

export { definePrimitive } from './types.js'
export type { PrimitiveType, PrimitiveFactory, PrimitiveRegistryDescription } from './types.js'
export { PrimitiveRegistry, PrimitiveRegistryBuilder } from './registry.js'
