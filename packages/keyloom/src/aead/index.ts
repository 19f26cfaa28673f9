/**
 * Authenticated-encryption barrel export.
 *
 * @packageDocumentation
 */

export { AEAD, TOKEN_CIPHER } from './types.js'
export type { Aead, TokenCipher } from './types.js'
export { AesGcm } from './aes-gcm.js'
export { JweTokenCipher } from './token-cipher.js'
export type { JweTokenCipherOptions } from './token-cipher.js'
export {
  AES_GCM_KEY_TYPE,
  AesGcmKeyManager,
  aesGcmAeadFactory,
  aesGcmTokenCipherFactory,
} from './aes-gcm-key-manager.js'
export type { AesGcmKey, AesGcmKeyFormat, AesGcmKeyManagerOptions } from './aes-gcm-key-manager.js'
