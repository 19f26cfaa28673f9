/**
 * Registry mapping primitive interface tokens to the factories that build
 * them.
 *
 * @remarks
 * A registry is populated through a builder and then frozen. Dispatch is by
 * the token requested at the call site, never by inspecting the key.
 *
 * @packageDocumentation
 */

import { DuplicateRegistrationError, FactoryConstructionError, KeyloomError } from '../errors.js'
import { failure, success } from '../result.js'
import type { Result } from '../result.js'
import type { PrimitiveFactory, PrimitiveRegistryDescription, PrimitiveType } from './types.js'

/** @internal */
export type FactoryMap<K> = Map<PrimitiveType<unknown>, PrimitiveFactory<K, unknown>>

/**
 * Run a type-erased factory and check its output against the requested
 * token.
 */
function createChecked<K, P>(
  primitive: PrimitiveType<P>,
  factory: PrimitiveFactory<K, unknown>,
  key: K,
): Result<P> {
  let result: Result<unknown>
  try {
    result = factory.create(key)
  } catch (err) {
    if (err instanceof KeyloomError) {
      return failure(err)
    }
    const message = err instanceof Error ? err.message : String(err)
    return failure(
      new FactoryConstructionError(
        `Factory for ${primitive.name} failed: ${message}`,
        primitive.name,
        { cause: err },
      ),
    )
  }

  if (!result.ok) {
    return result
  }
  const { value } = result
  if (!primitive.guard(value)) {
    return failure(
      new FactoryConstructionError(
        `Factory registered for ${primitive.name} produced a value that does not implement it`,
        primitive.name,
      ),
    )
  }
  return success(value)
}

/**
 * Immutable mapping from primitive token to factory, for keys of type `K`.
 * @public
 */
export class PrimitiveRegistry<K> {
  readonly #factories: ReadonlyMap<PrimitiveType<unknown>, PrimitiveFactory<K, unknown>>

  private constructor(factories: FactoryMap<K>) {
    this.#factories = factories
    Object.freeze(this)
  }

  /** Start building a registry for keys of type `K`. */
  static builder<K>(): PrimitiveRegistryBuilder<K> {
    return new PrimitiveRegistryBuilder<K>((factories) => new PrimitiveRegistry(factories))
  }

  /**
   * Build a registry from a list of factories.
   * @throws {@link DuplicateRegistrationError} if two factories share a token
   */
  static of<K>(...factories: PrimitiveFactory<K, unknown>[]): PrimitiveRegistry<K> {
    const builder = PrimitiveRegistry.builder<K>()
    for (const factory of factories) {
      builder.register(factory)
    }
    return builder.build()
  }

  /**
   * Find the factory for `primitive`.
   *
   * @returns A factory whose output is checked against `primitive`, or
   *   `undefined` if none is registered
   */
  lookup<P>(primitive: PrimitiveType<P>): PrimitiveFactory<K, P> | undefined {
    const factory = this.#factories.get(primitive)
    if (factory === undefined) {
      return undefined
    }
    return {
      primitive,
      create: (key: K) => createChecked(primitive, factory, key),
    }
  }

  /** Whether a factory is registered for `primitive`. */
  has(primitive: PrimitiveType<unknown>): boolean {
    return this.#factories.has(primitive)
  }

  /** Registered primitive tokens, in registration order. */
  get primitives(): PrimitiveType<unknown>[] {
    return Array.from(this.#factories.keys())
  }

  get size(): number {
    return this.#factories.size
  }

  describe(): PrimitiveRegistryDescription {
    return { primitives: this.primitives.map((p) => p.name) }
  }
}

/**
 * Collects factory registrations for a {@link PrimitiveRegistry}.
 *
 * @remarks
 * Conflicts are reported eagerly, from `register`, so an ambiguous
 * configuration can never surface later as a lookup miss. A builder can be
 * built once.
 * @public
 */
export class PrimitiveRegistryBuilder<K> {
  readonly #factories: FactoryMap<K> = new Map()
  readonly #finish: (factories: FactoryMap<K>) => PrimitiveRegistry<K>
  #built = false

  /** @internal */
  constructor(finish: (factories: FactoryMap<K>) => PrimitiveRegistry<K>) {
    this.#finish = finish
  }

  /**
   * Register a factory.
   * @throws {@link DuplicateRegistrationError} if a factory for the same token is already registered
   * @throws {@link KeyloomError} if the builder has already been built
   */
  register<P>(factory: PrimitiveFactory<K, P>): this {
    this.#requireOpen()
    const { primitive } = factory
    if (this.#factories.has(primitive)) {
      throw new DuplicateRegistrationError(
        `A factory for primitive ${primitive.name} is already registered`,
        primitive.name,
      )
    }
    this.#factories.set(primitive, factory)
    return this
  }

  /**
   * Freeze the registrations into a registry.
   * @throws {@link KeyloomError} if the builder has already been built
   */
  build(): PrimitiveRegistry<K> {
    this.#requireOpen()
    this.#built = true
    return this.#finish(new Map(this.#factories))
  }

  #requireOpen(): void {
    if (this.#built) {
      throw new KeyloomError('PrimitiveRegistryBuilder has already been built', 'failed-precondition')
    }
  }
}
