/**
 * Shared test helpers: toy primitives and a toy key manager.
 */

import { definePrimitive } from '../../src/primitive/types.js'
import type { PrimitiveFactory } from '../../src/primitive/types.js'
import { PrimitiveRegistry } from '../../src/primitive/registry.js'
import { GeneratingKeyTypeManager, KeyTypeManager } from '../../src/keys/manager.js'
import type { KeyManagerOptions, KeyMaterialType } from '../../src/keys/types.js'
import { validateVersion } from '../../src/keys/validation.js'
import { InvalidKeyError, InvalidKeyFormatError } from '../../src/errors.js'
import { OK, failure, success } from '../../src/result.js'
import type { Result } from '../../src/result.js'
import type { RandomSource } from '../../src/util/random.js'

export interface TestKey {
  version: number
  material: Uint8Array
}

export interface TestKeyFormat {
  size: number
}

/** Exposes the key bytes it was built from. */
export interface ByteView {
  bytes(): Uint8Array
}

/** Reports the length of the key it was built from. */
export interface LengthProbe {
  length(): number
}

/** Never registered anywhere. */
export interface Unregistered {
  nothing(): void
}

function hasMethod(value: unknown, name: string): boolean {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, name) === 'function'
}

export const BYTE_VIEW = definePrimitive<ByteView>('ByteView', (v): v is ByteView => hasMethod(v, 'bytes'))

export const LENGTH_PROBE = definePrimitive<LengthProbe>('LengthProbe', (v): v is LengthProbe =>
  hasMethod(v, 'length'),
)

export const NOT_REGISTERED = definePrimitive<Unregistered>('NotRegistered', (v): v is Unregistered =>
  hasMethod(v, 'nothing'),
)

export const byteViewFactory: PrimitiveFactory<TestKey, ByteView> = {
  primitive: BYTE_VIEW,
  create: (key) => {
    const copy = new Uint8Array(key.material)
    return success({ bytes: () => copy })
  },
}

export const lengthProbeFactory: PrimitiveFactory<TestKey, LengthProbe> = {
  primitive: LENGTH_PROBE,
  create: (key) => {
    const { byteLength } = key.material
    return success({ length: () => byteLength })
  },
}

export const TEST_KEY_TYPE = 'test.Key'

/**
 * Manager for {@link TestKey}: version 1, material of 1 to 64 bytes.
 * Counts validation calls so tests can observe dispatch order.
 */
export class TestKeyManager extends GeneratingKeyTypeManager<TestKey, TestKeyFormat> {
  readonly keyType = TEST_KEY_TYPE
  readonly version = 1
  readonly keyMaterialType: KeyMaterialType = 'SYMMETRIC'
  validateKeyCalls = 0

  constructor(
    registry: PrimitiveRegistry<TestKey> = PrimitiveRegistry.of<TestKey>(byteViewFactory, lengthProbeFactory),
    options?: KeyManagerOptions,
  ) {
    super(registry, options)
  }

  validateKey(key: TestKey): Result<void> {
    this.validateKeyCalls++
    const version = validateVersion(this.keyType, key.version, this.version)
    if (!version.ok) {
      return version
    }
    const size = key.material.byteLength
    if (size < 1 || size > 64) {
      return failure(new InvalidKeyError(`Test key must be 1 to 64 bytes, got ${String(size)}`, this.keyType, 'key-size'))
    }
    return OK
  }

  validateKeyFormat(format: TestKeyFormat): Result<void> {
    if (!Number.isInteger(format.size) || format.size < 1 || format.size > 64) {
      return failure(
        new InvalidKeyFormatError(`Test key size must be 1 to 64, got ${String(format.size)}`, this.keyType, 'key-size'),
      )
    }
    return OK
  }

  isKey(value: unknown): value is TestKey {
    return (
      typeof value === 'object' &&
      value !== null &&
      typeof Reflect.get(value, 'version') === 'number' &&
      Reflect.get(value, 'material') instanceof Uint8Array
    )
  }

  isKeyFormat(value: unknown): value is TestKeyFormat {
    return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'size') === 'number'
  }

  protected generateKey(format: TestKeyFormat, random: RandomSource): TestKey {
    return { version: this.version, material: random.getRandomBytes(format.size) }
  }
}

/** Uses test keys but cannot generate them. */
export class UseOnlyManager extends KeyTypeManager<TestKey> {
  readonly keyType = 'test.UseOnlyKey'
  readonly version = 0
  readonly keyMaterialType: KeyMaterialType = 'REMOTE'

  constructor() {
    super(PrimitiveRegistry.of<TestKey>(byteViewFactory))
    Object.freeze(this)
  }

  validateKey(): Result<void> {
    return OK
  }

  isKey(value: unknown): value is TestKey {
    return typeof value === 'object' && value !== null && Reflect.get(value, 'material') instanceof Uint8Array
  }
}

/** A random source returning `fill` repeated, recording each request. */
export function fixedRandomSource(fill: number): RandomSource & { requests: number[] } {
  const requests: number[] = []
  return {
    requests,
    getRandomBytes: (length: number) => {
      requests.push(length)
      return new Uint8Array(length).fill(fill)
    },
  }
}
