/**
 * Key managers: validation, generation and primitive creation for one key
 * type.
 */

import { InvalidKeyError, InvalidKeyFormatError, UnsupportedPrimitiveError } from '../errors.js'
import { failure, success } from '../result.js'
import type { Result } from '../result.js'
import { nodeRandomSource } from '../util/random.js'
import type { RandomSource } from '../util/random.js'
import type { PrimitiveRegistry } from '../primitive/registry.js'
import type { PrimitiveType } from '../primitive/types.js'
import type { KeyManagerDescription, KeyManagerOptions, KeyMaterialType } from './types.js'

/**
 * Type-erased view of a key manager, accepting keys and formats of unknown
 * shape and routing them through the manager's guards.
 * @internal
 */
export interface KeyManagerHandle {
  readonly keyType: string
  describe(): KeyManagerDescription
  getPrimitive<P>(primitive: PrimitiveType<P>, key: unknown): Result<P>
  /** Present only for managers that generate keys. */
  readonly newKey: ((format: unknown) => Result<unknown>) | undefined
}

/**
 * Manages one key type: validates keys and builds primitives from them.
 *
 * @remarks
 * The set of primitives a manager supports is fixed by the registry it is
 * constructed with. Subclasses declare the manager-level constants and the
 * validation rules. Field initializers of a subclass run after this
 * constructor, so each concrete manager calls `Object.freeze(this)` at the
 * end of its own constructor. A frozen manager may serve concurrent callers
 * provided its factories are reentrant.
 *
 * Managers created from this class can only use keys; extend
 * {@link GeneratingKeyTypeManager} to generate them as well.
 * @public
 */
export abstract class KeyTypeManager<K> {
  /** Key type identifier, e.g. `keyloom.AesGcmKey`. */
  abstract readonly keyType: string

  /** Newest key version this manager understands. */
  abstract readonly version: number

  abstract readonly keyMaterialType: KeyMaterialType

  readonly #registry: PrimitiveRegistry<K>

  protected constructor(registry: PrimitiveRegistry<K>) {
    this.#registry = registry
  }

  /**
   * Check a key against this manager's version and structural constraints.
   * Must be pure and idempotent.
   */
  abstract validateKey(key: K): Result<void>

  /** Structural check that a value of unknown origin is a key of this type. */
  abstract isKey(value: unknown): value is K

  /**
   * Build primitive `P` from `key`.
   *
   * @remarks
   * The factory lookup happens first: a primitive with no registered factory
   * fails with {@link UnsupportedPrimitiveError} whatever the key. Otherwise
   * the key is validated, and only a valid key reaches the factory, whose
   * result or error is returned unmodified.
   */
  create<P>(primitive: PrimitiveType<P>, key: K): Result<P> {
    const factory = this.#registry.lookup(primitive)
    if (factory === undefined) {
      return failure(this.#unsupported(primitive))
    }
    const valid = this.validateKey(key)
    if (!valid.ok) {
      return valid
    }
    return factory.create(key)
  }

  /** Whether this manager can build `primitive`. */
  supports(primitive: PrimitiveType<unknown>): boolean {
    return this.#registry.has(primitive)
  }

  /** The primitives this manager can build, in registration order. */
  get primitives(): PrimitiveType<unknown>[] {
    return this.#registry.primitives
  }

  describe(): KeyManagerDescription {
    return {
      keyType: this.keyType,
      version: this.version,
      keyMaterialType: this.keyMaterialType,
      primitives: this.#registry.describe().primitives,
      generatesKeys: false,
    }
  }

  /** @internal */
  toHandle(): KeyManagerHandle {
    return {
      keyType: this.keyType,
      describe: () => this.describe(),
      getPrimitive: <P>(primitive: PrimitiveType<P>, key: unknown): Result<P> => {
        if (!this.supports(primitive)) {
          return failure(this.#unsupported(primitive))
        }
        if (!this.isKey(key)) {
          return failure(
            new InvalidKeyError(`Value is not a well-formed ${this.keyType} key`, this.keyType, 'shape'),
          )
        }
        return this.create(primitive, key)
      },
      newKey: undefined,
    }
  }

  #unsupported(primitive: PrimitiveType<unknown>): UnsupportedPrimitiveError {
    const supported = this.#registry.describe().primitives
    return new UnsupportedPrimitiveError(
      `Key manager for ${this.keyType} does not support primitive ${primitive.name}. ` +
        `Supported primitives: ${supported.length > 0 ? supported.join(', ') : '(none)'}`,
      primitive.name,
      this.keyType,
      supported,
    )
  }
}

/**
 * A key manager that also generates new keys from key formats of type `F`.
 *
 * @remarks
 * Every key returned by {@link GeneratingKeyTypeManager.createKey} has
 * passed {@link KeyTypeManager.validateKey} on the same manager.
 * @public
 */
export abstract class GeneratingKeyTypeManager<K, F> extends KeyTypeManager<K> {
  /** Source of fresh key material, shared across calls. */
  protected readonly random: RandomSource

  protected constructor(registry: PrimitiveRegistry<K>, options?: KeyManagerOptions) {
    super(registry)
    this.random = options?.random ?? nodeRandomSource
  }

  /** Check generation parameters. Must be pure and idempotent. */
  abstract validateKeyFormat(format: F): Result<void>

  /** Structural check that a value of unknown origin is a key format of this type. */
  abstract isKeyFormat(value: unknown): value is F

  /**
   * Produce a key from an already-validated format.
   * @param random - The manager's randomness source
   */
  protected abstract generateKey(format: F, random: RandomSource): K

  /**
   * Validate `format` and generate a new key from it.
   *
   * @returns The new key, or the format's validation failure
   */
  createKey(format: F): Result<K> {
    const validFormat = this.validateKeyFormat(format)
    if (!validFormat.ok) {
      return validFormat
    }
    const key = this.generateKey(format, this.random)
    const validKey = this.validateKey(key)
    if (!validKey.ok) {
      return validKey
    }
    return success(key)
  }

  override describe(): KeyManagerDescription {
    return { ...super.describe(), generatesKeys: true }
  }

  /** @internal */
  override toHandle(): KeyManagerHandle {
    return {
      ...super.toHandle(),
      newKey: (format: unknown): Result<unknown> => {
        if (!this.isKeyFormat(format)) {
          return failure(
            new InvalidKeyFormatError(
              `Value is not a well-formed ${this.keyType} key format`,
              this.keyType,
              'shape',
            ),
          )
        }
        return this.createKey(format)
      },
    }
  }
}

/**
 * Type guard for key managers that can generate keys.
 * @public
 */
export function canGenerateKeys<K>(
  manager: KeyTypeManager<K>,
): manager is GeneratingKeyTypeManager<K, unknown> {
  return manager instanceof GeneratingKeyTypeManager
}
