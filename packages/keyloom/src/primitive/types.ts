/**
 * Primitive interface tokens and the factory contract.
 */

import type { Result } from '../result.js'

/**
 * Runtime identity of a primitive interface `P`.
 *
 * @remarks
 * Tokens stand in for the interface at call sites: a caller asks a key
 * manager for `create(AEAD, key)` and receives an `Aead`. Identity is object
 * identity, so two tokens with the same `name` are still distinct
 * interfaces. The `guard` is checked against every value a factory
 * produces, which is what lets a type-erased registry hand back a `P`.
 * @public
 */
export interface PrimitiveType<P> {
  /** Human-readable interface name, used in error messages. */
  readonly name: string

  /** Structural check that a value implements `P`. */
  readonly guard: (value: unknown) => value is P
}

/**
 * Define a new primitive interface token.
 *
 * @example
 * ```ts
 * interface Mac { computeMac(data: Uint8Array): Uint8Array }
 * const MAC = definePrimitive<Mac>('Mac', (v): v is Mac =>
 *   typeof v === 'object' && v !== null && 'computeMac' in v)
 * ```
 * @public
 */
export function definePrimitive<P>(
  name: string,
  guard: (value: unknown) => value is P,
): PrimitiveType<P> {
  return Object.freeze({ name, guard })
}

/**
 * Converts a validated key of type `K` into an instance of primitive `P`.
 *
 * @remarks
 * Factories are registered once, when a key manager is constructed, and
 * may then be called from any number of interleaved tasks. An
 * implementation must therefore be reentrant: no mutable state of its own,
 * and no reference to `key` kept after `create` returns. Keys reach the
 * factory only after the manager has validated them; a factory may still
 * re-check the fields it depends on.
 * @public
 */
export interface PrimitiveFactory<K, P> {
  /** The interface this factory produces. */
  readonly primitive: PrimitiveType<P>

  /**
   * Build a primitive from `key`.
   * @returns The primitive, or an algorithm-specific construction failure
   */
  create(key: K): Result<P>
}

/**
 * A plain, serializable summary of a primitive registry.
 * @public
 */
export interface PrimitiveRegistryDescription {
  primitives: string[]
}
