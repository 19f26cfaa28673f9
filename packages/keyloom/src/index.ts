/**
 * keyloom: typed key managers that build several primitive interfaces from
 * one key type.
 *
 * @packageDocumentation
 */

export {
  KeyloomError,
  UnsupportedPrimitiveError,
  UnknownKeyTypeError,
  InvalidKeyError,
  InvalidKeyFormatError,
  DecryptionError,
  FactoryConstructionError,
  DuplicateRegistrationError,
  KeyGenerationNotAllowedError,
  ConfigError,
} from './errors.js'
export type { ErrorCode } from './errors.js'

export { success, failure, unwrap, OK } from './result.js'
export type { Result } from './result.js'

export { nodeRandomSource } from './util/random.js'
export type { RandomSource } from './util/random.js'

export { definePrimitive, PrimitiveRegistry, PrimitiveRegistryBuilder } from './primitive/index.js'
export type {
  PrimitiveType,
  PrimitiveFactory,
  PrimitiveRegistryDescription,
} from './primitive/index.js'

export {
  KeyTypeManager,
  GeneratingKeyTypeManager,
  canGenerateKeys,
  KEY_MATERIAL_TYPES,
  AES_KEY_SIZES,
  validateVersion,
  validateAesKeySize,
} from './keys/index.js'
export type {
  KeyManagerHandle,
  KeyMaterialType,
  KeyManagerOptions,
  KeyManagerDescription,
} from './keys/index.js'

export {
  AEAD,
  TOKEN_CIPHER,
  AesGcm,
  JweTokenCipher,
  AES_GCM_KEY_TYPE,
  AesGcmKeyManager,
  aesGcmAeadFactory,
  aesGcmTokenCipherFactory,
} from './aead/index.js'
export type {
  Aead,
  TokenCipher,
  JweTokenCipherOptions,
  AesGcmKey,
  AesGcmKeyFormat,
  AesGcmKeyManagerOptions,
} from './aead/index.js'

export {
  KeyManagerRegistry,
  KeyManagerRegistryBuilder,
  loadKeyManagerRegistry,
} from './registry/index.js'
export type {
  KeyManagerSource,
  KeyTypeEntryOptions,
  KeyTypeEntryDescription,
  LoadRegistryOptions,
} from './registry/index.js'

export { loadConfig, getDefaultConfigDir, validateConfig, defaultConfig } from './config.js'
export type { KeyloomConfig, KeyTypeConfig } from './config.js'
