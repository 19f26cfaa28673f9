/**
 * Error hierarchy for keyloom.
 *
 * @packageDocumentation
 */

/**
 * Status classification carried by every keyloom error.
 *
 * @remarks
 * `invalid-argument` marks a caller or integration mistake and is never
 * transient. `failed-precondition` marks a static misconfiguration.
 * `internal` marks a fault inside a registered factory.
 * @public
 */
export type ErrorCode = 'invalid-argument' | 'failed-precondition' | 'internal'

/** Base error for all keyloom errors. */
export class KeyloomError extends Error {
  /** Machine-readable status classification. */
  readonly code: ErrorCode

  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(message, options)
    this.name = 'KeyloomError'
    this.code = code
  }
}

// --- Dispatch Failures ---

/**
 * Returned when a primitive is requested from a key manager that has no
 * factory registered for it.
 */
export class UnsupportedPrimitiveError extends KeyloomError {
  /** Name of the requested primitive interface. */
  readonly primitive: string

  /** Key type of the manager that was asked. */
  readonly keyType: string

  /** Names of the primitives the manager does support. */
  readonly supported: string[]

  constructor(message: string, primitive: string, keyType: string, supported: string[]) {
    super(message, 'invalid-argument')
    this.name = 'UnsupportedPrimitiveError'
    this.primitive = primitive
    this.keyType = keyType
    this.supported = supported
  }
}

/**
 * Returned by the key-manager registry when no manager is catalogued for a
 * key type.
 */
export class UnknownKeyTypeError extends KeyloomError {
  readonly keyType: string

  /** The key types the registry does know about. */
  readonly known: string[]

  constructor(message: string, keyType: string, known: string[]) {
    super(message, 'invalid-argument')
    this.name = 'UnknownKeyTypeError'
    this.keyType = keyType
    this.known = known
  }
}

// --- Validation Failures ---

/**
 * Returned when a key fails its manager's validation: a version newer than
 * the manager understands, malformed material, or another structural
 * violation.
 */
export class InvalidKeyError extends KeyloomError {
  readonly keyType: string

  /**
   * The violated constraint (e.g. `'version'`, `'key-size'`, `'shape'`).
   */
  readonly constraint: string

  constructor(message: string, keyType: string, constraint: string) {
    super(message, 'invalid-argument')
    this.name = 'InvalidKeyError'
    this.keyType = keyType
    this.constraint = constraint
  }
}

/**
 * Returned when key generation parameters are not supported.
 */
export class InvalidKeyFormatError extends KeyloomError {
  readonly keyType: string

  /** The violated constraint (e.g. `'key-size'`, `'shape'`). */
  readonly constraint: string

  constructor(message: string, keyType: string, constraint: string) {
    super(message, 'invalid-argument')
    this.name = 'InvalidKeyFormatError'
    this.keyType = keyType
    this.constraint = constraint
  }
}

/**
 * Returned when a ciphertext cannot be authenticated or decrypted.
 */
export class DecryptionError extends KeyloomError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'invalid-argument', options)
    this.name = 'DecryptionError'
  }
}

// --- Construction Failures ---

/**
 * Returned when a primitive factory fails for an algorithm-specific reason,
 * or produces a value that does not implement the requested primitive.
 */
export class FactoryConstructionError extends KeyloomError {
  /** Name of the primitive the factory was asked to build. */
  readonly primitive: string

  constructor(message: string, primitive: string, options?: ErrorOptions) {
    super(message, 'internal', options)
    this.name = 'FactoryConstructionError'
    this.primitive = primitive
  }
}

/**
 * Thrown at construction time when two registrations claim the same
 * identity (a primitive token on a manager, or a key type in a registry).
 */
export class DuplicateRegistrationError extends KeyloomError {
  /** The identity that was registered twice. */
  readonly identity: string

  constructor(message: string, identity: string) {
    super(message, 'failed-precondition')
    this.name = 'DuplicateRegistrationError'
    this.identity = identity
  }
}

/**
 * Returned when a registry is asked to generate a key for a key type whose
 * manager cannot, or is not allowed to, generate keys.
 */
export class KeyGenerationNotAllowedError extends KeyloomError {
  readonly keyType: string

  constructor(message: string, keyType: string) {
    super(message, 'failed-precondition')
    this.name = 'KeyGenerationNotAllowedError'
    this.keyType = keyType
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when a configuration file cannot be read as, or does not validate
 * as, a keyloom configuration.
 */
export class ConfigError extends KeyloomError {
  /**
   * Location of the problem: a file path, or a dotted path into the
   * configuration object (e.g. `keyTypes[0].enabled`).
   */
  readonly path: string

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'invalid-argument', options)
    this.name = 'ConfigError'
    this.path = path
  }
}
