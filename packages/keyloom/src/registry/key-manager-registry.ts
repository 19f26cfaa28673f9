/**
 * Catalogue of key managers, keyed by key type.
 *
 * @remarks
 * The registry routes keys and key formats of unknown static type to the
 * manager for their key type, and records whether new keys may be generated
 * for each type. Like a primitive registry, it is built once and then
 * frozen.
 *
 * @packageDocumentation
 */

import type { KeyloomConfig } from '../config.js'
import {
  ConfigError,
  DuplicateRegistrationError,
  KeyGenerationNotAllowedError,
  KeyloomError,
  UnknownKeyTypeError,
} from '../errors.js'
import type { KeyManagerHandle } from '../keys/manager.js'
import type { KeyManagerDescription } from '../keys/types.js'
import type { PrimitiveType } from '../primitive/types.js'
import { failure } from '../result.js'
import type { Result } from '../result.js'

/**
 * Anything that can be catalogued: every key manager qualifies.
 * @public
 */
export interface KeyManagerSource {
  readonly keyType: string
  toHandle(): KeyManagerHandle
}

/**
 * Per-key-type registration options.
 * @public
 */
export interface KeyTypeEntryOptions {
  /** Whether `newKey` may generate keys of this type. Defaults to `true`. */
  newKeyAllowed?: boolean | undefined
}

/**
 * Summary of one catalogued key type.
 * @public
 */
export interface KeyTypeEntryDescription extends KeyManagerDescription {
  newKeyAllowed: boolean
}

/** @internal */
export interface RegistryEntry {
  handle: KeyManagerHandle
  newKeyAllowed: boolean
}

/**
 * Immutable catalogue of key managers.
 * @public
 */
export class KeyManagerRegistry {
  readonly #entries: ReadonlyMap<string, RegistryEntry>

  private constructor(entries: Map<string, RegistryEntry>) {
    this.#entries = entries
    Object.freeze(this)
  }

  /** Start building a registry. */
  static builder(): KeyManagerRegistryBuilder {
    return new KeyManagerRegistryBuilder((entries) => new KeyManagerRegistry(entries))
  }

  /**
   * Build a registry holding the key types a configuration enables.
   *
   * @remarks
   * Managers for key types the configuration does not list, or disables,
   * are left out.
   *
   * @param config - A validated configuration
   * @param managers - Candidate managers, at most one per key type
   * @throws {@link ConfigError} if an enabled key type has no manager in `managers`
   * @throws {@link DuplicateRegistrationError} if `managers` holds two managers for one key type
   */
  static fromConfig(config: KeyloomConfig, managers: readonly KeyManagerSource[]): KeyManagerRegistry {
    const byType = new Map<string, KeyManagerSource>()
    for (const manager of managers) {
      if (byType.has(manager.keyType)) {
        throw new DuplicateRegistrationError(
          `Two key managers supplied for key type ${manager.keyType}`,
          manager.keyType,
        )
      }
      byType.set(manager.keyType, manager)
    }

    const builder = KeyManagerRegistry.builder()
    for (const [i, entry] of config.keyTypes.entries()) {
      if (!entry.enabled) {
        continue
      }
      const manager = byType.get(entry.keyType)
      if (manager === undefined) {
        throw new ConfigError(
          `No key manager available for configured key type ${entry.keyType}`,
          `keyTypes[${String(i)}].keyType`,
        )
      }
      builder.register(manager, { newKeyAllowed: entry.newKeyAllowed })
    }
    return builder.build()
  }

  /**
   * Build primitive `P` from a key of the given type.
   *
   * @returns The primitive, {@link UnknownKeyTypeError} for an uncatalogued
   *   type, or whatever the manager's `create` returns
   */
  getPrimitive<P>(keyType: string, primitive: PrimitiveType<P>, key: unknown): Result<P> {
    const entry = this.#entries.get(keyType)
    if (entry === undefined) {
      return failure(this.#unknown(keyType))
    }
    return entry.handle.getPrimitive(primitive, key)
  }

  /**
   * Generate a new key of the given type.
   *
   * @returns The new key, {@link UnknownKeyTypeError} for an uncatalogued
   *   type, {@link KeyGenerationNotAllowedError} if the manager cannot or may
   *   not generate keys, or the manager's format validation failure
   */
  newKey(keyType: string, format: unknown): Result<unknown> {
    const entry = this.#entries.get(keyType)
    if (entry === undefined) {
      return failure(this.#unknown(keyType))
    }
    const { newKey } = entry.handle
    if (newKey === undefined) {
      return failure(
        new KeyGenerationNotAllowedError(`Key manager for ${keyType} does not generate keys`, keyType),
      )
    }
    if (!entry.newKeyAllowed) {
      return failure(
        new KeyGenerationNotAllowedError(`Generating new keys is not allowed for ${keyType}`, keyType),
      )
    }
    return newKey(format)
  }

  /** Whether a manager is catalogued for `keyType`. */
  has(keyType: string): boolean {
    return this.#entries.has(keyType)
  }

  /** Catalogued key types, in registration order. */
  get keyTypes(): string[] {
    return Array.from(this.#entries.keys())
  }

  describe(): KeyTypeEntryDescription[] {
    return Array.from(this.#entries.values()).map(({ handle, newKeyAllowed }) => ({
      ...handle.describe(),
      newKeyAllowed,
    }))
  }

  #unknown(keyType: string): UnknownKeyTypeError {
    const known = this.keyTypes
    return new UnknownKeyTypeError(
      `No key manager registered for key type: ${keyType}. ` +
        `Known types: ${known.length > 0 ? known.join(', ') : '(none)'}`,
      keyType,
      known,
    )
  }
}

/**
 * Collects key manager registrations for a {@link KeyManagerRegistry}.
 * @public
 */
export class KeyManagerRegistryBuilder {
  readonly #entries = new Map<string, RegistryEntry>()
  readonly #finish: (entries: Map<string, RegistryEntry>) => KeyManagerRegistry
  #built = false

  /** @internal */
  constructor(finish: (entries: Map<string, RegistryEntry>) => KeyManagerRegistry) {
    this.#finish = finish
  }

  /**
   * Catalogue a key manager under its key type.
   * @throws {@link DuplicateRegistrationError} if the key type is already catalogued
   * @throws {@link KeyloomError} if the builder has already been built
   */
  register(manager: KeyManagerSource, options?: KeyTypeEntryOptions): this {
    this.#requireOpen()
    const { keyType } = manager
    if (this.#entries.has(keyType)) {
      throw new DuplicateRegistrationError(
        `A key manager for key type ${keyType} is already registered`,
        keyType,
      )
    }
    this.#entries.set(keyType, {
      handle: manager.toHandle(),
      newKeyAllowed: options?.newKeyAllowed ?? true,
    })
    return this
  }

  /**
   * Freeze the registrations into a registry.
   * @throws {@link KeyloomError} if the builder has already been built
   */
  build(): KeyManagerRegistry {
    this.#requireOpen()
    this.#built = true
    return this.#finish(new Map(this.#entries))
  }

  #requireOpen(): void {
    if (this.#built) {
      throw new KeyloomError('KeyManagerRegistryBuilder has already been built', 'failed-precondition')
    }
  }
}
