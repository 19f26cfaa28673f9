import { describe, it, expect } from 'vitest'
import {
  AES_GCM_KEY_TYPE,
  AesGcmKeyManager,
  aesGcmAeadFactory,
  aesGcmTokenCipherFactory,
} from '../../../src/aead/aes-gcm-key-manager.js'
import type { AesGcmKey } from '../../../src/aead/aes-gcm-key-manager.js'
import { AEAD, TOKEN_CIPHER } from '../../../src/aead/types.js'
import { definePrimitive } from '../../../src/primitive/types.js'
import { PrimitiveRegistry } from '../../../src/primitive/registry.js'
import {
  DuplicateRegistrationError,
  InvalidKeyError,
  InvalidKeyFormatError,
  UnsupportedPrimitiveError,
} from '../../../src/errors.js'
import { OK } from '../../../src/result.js'
import { expectErr, expectOk } from '../../helpers/result.js'
import { fixedRandomSource } from '../../helpers/primitives.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

interface Signer {
  sign(data: Uint8Array): Uint8Array
}

const SIGNER = definePrimitive<Signer>(
  'Signer',
  (v): v is Signer => typeof v === 'object' && v !== null && 'sign' in v,
)

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

describe('AesGcmKeyManager metadata', () => {
  it('describes an AES-GCM symmetric key manager', () => {
    expect(new AesGcmKeyManager().describe()).toEqual({
      keyType: 'keyloom.AesGcmKey',
      version: 0,
      keyMaterialType: 'SYMMETRIC',
      primitives: ['Aead', 'TokenCipher'],
      generatesKeys: true,
    })
    expect(AES_GCM_KEY_TYPE).toBe('keyloom.AesGcmKey')
  })

  it('serves a custom set of primitives', () => {
    const manager = new AesGcmKeyManager({ primitives: PrimitiveRegistry.of<AesGcmKey>(aesGcmAeadFactory) })
    expect(manager.supports(AEAD)).toBe(true)
    expect(manager.supports(TOKEN_CIPHER)).toBe(false)
  })

  it('fails at construction when two factories claim one primitive', () => {
    expect(
      () =>
        new AesGcmKeyManager({
          primitives: PrimitiveRegistry.of<AesGcmKey>(aesGcmTokenCipherFactory, aesGcmTokenCipherFactory),
        }),
    ).toThrow(DuplicateRegistrationError)
  })

  it('is frozen after construction', () => {
    const manager = new AesGcmKeyManager()
    expect(Object.isFrozen(manager)).toBe(true)
    expect(Reflect.set(manager, 'version', 5)).toBe(false)
    expect(Reflect.set(manager, 'keyType', 'keyloom.Other')).toBe(false)
    expect(manager.version).toBe(0)
    expect(manager.keyType).toBe('keyloom.AesGcmKey')
  })

  it('keeps rejecting newer key versions after an attempted version change', () => {
    const manager = new AesGcmKeyManager()
    const key: AesGcmKey = { version: 3, keyValue: new Uint8Array(16) }
    Reflect.set(manager, 'version', 5)
    const err = expectErr(manager.create(AEAD, key))
    expect(err).toBeInstanceOf(InvalidKeyError)
    expect(err.message).toBe('Key has version 3; only keys with version in range [0..0] are supported')
  })
})

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------

describe('AesGcmKeyManager.createKey', () => {
  it.each([16, 32])('creates a valid %i-byte key at the manager version', (keySize) => {
    const manager = new AesGcmKeyManager()
    const key = expectOk(manager.createKey({ keySize }))
    expect(key.keyValue.byteLength).toBe(keySize)
    expect(key.version).toBe(0)
    expect(manager.validateKey(key)).toEqual(OK)
  })

  it('draws key material from the injected random source', () => {
    const random = fixedRandomSource(0xab)
    const key = expectOk(new AesGcmKeyManager({ random }).createKey({ keySize: 16 }))
    expect(key.keyValue).toEqual(new Uint8Array(16).fill(0xab))
    expect(random.requests).toEqual([16])
  })

  it('rejects unsupported key sizes', () => {
    const manager = new AesGcmKeyManager()
    const err = expectErr(manager.createKey({ keySize: 24 }))
    expect(err).toBeInstanceOf(InvalidKeyFormatError)
    expect(err.message).toBe('Invalid AES key size 24 bytes; supported sizes: 16, 32')
    expect(err).toMatchObject({ keyType: 'keyloom.AesGcmKey', constraint: 'key-size' })
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('AesGcmKeyManager.validateKey', () => {
  it('rejects keys newer than the manager', () => {
    const manager = new AesGcmKeyManager()
    const err = expectErr(manager.validateKey({ version: 1, keyValue: new Uint8Array(16) }))
    expect(err).toBeInstanceOf(InvalidKeyError)
    expect(err.message).toBe('Key has version 1; only keys with version in range [0..0] are supported')
  })

  it('rejects keys of unsupported size', () => {
    const manager = new AesGcmKeyManager()
    const err = expectErr(manager.validateKey({ version: 0, keyValue: new Uint8Array(24) }))
    expect(err).toMatchObject({ constraint: 'key-size' })
  })

  it('recognises keys and key formats of unknown origin', () => {
    const manager = new AesGcmKeyManager()
    expect(manager.isKey({ version: 0, keyValue: new Uint8Array(16) })).toBe(true)
    expect(manager.isKey({ version: 0, keyValue: 'AAAA' })).toBe(false)
    expect(manager.isKey(null)).toBe(false)
    expect(manager.isKeyFormat({ keySize: 16 })).toBe(true)
    expect(manager.isKeyFormat({ keySize: '16' })).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Primitive creation
// ---------------------------------------------------------------------------

describe('AesGcmKeyManager.create', () => {
  it('builds an Aead that decrypts what it encrypts', () => {
    const manager = new AesGcmKeyManager()
    const key = expectOk(manager.createKey({ keySize: 16 }))
    const aead = expectOk(manager.create(AEAD, key))

    const ciphertext = aead.encrypt(encoder.encode('Hi'), encoder.encode('aad'))
    const plaintext = expectOk(aead.decrypt(ciphertext, encoder.encode('aad')))
    expect(decoder.decode(plaintext)).toBe('Hi')
  })

  it('builds independent primitives that agree on the key', () => {
    const manager = new AesGcmKeyManager()
    const key = expectOk(manager.createKey({ keySize: 32 }))
    const sender = expectOk(manager.create(AEAD, key))
    const receiver = expectOk(manager.create(AEAD, key))

    const ciphertext = sender.encrypt(encoder.encode('payload'), encoder.encode('ctx'))
    expect(decoder.decode(expectOk(receiver.decrypt(ciphertext, encoder.encode('ctx'))))).toBe('payload')
  })

  it('builds a token cipher from the same key', async () => {
    const manager = new AesGcmKeyManager()
    const key = expectOk(manager.createKey({ keySize: 16 }))
    const cipher = expectOk(manager.create(TOKEN_CIPHER, key))

    const token = await cipher.seal(encoder.encode('Hi'), encoder.encode('aad'))
    expect(decoder.decode(expectOk(await cipher.open(token, encoder.encode('aad'))))).toBe('Hi')
  })

  it('fails with an invalid-argument error for an unregistered primitive', () => {
    const manager = new AesGcmKeyManager()
    const valid = expectOk(manager.createKey({ keySize: 16 }))
    const invalid: AesGcmKey = { version: 7, keyValue: new Uint8Array(3) }

    for (const key of [valid, invalid]) {
      const err = expectErr(manager.create(SIGNER, key))
      expect(err).toBeInstanceOf(UnsupportedPrimitiveError)
      expect(err.code).toBe('invalid-argument')
    }
  })

  it('rejects an invalid key before building the primitive', () => {
    const manager = new AesGcmKeyManager()
    const err = expectErr(manager.create(AEAD, { version: 0, keyValue: new Uint8Array(24) }))
    expect(err).toBeInstanceOf(InvalidKeyError)
    expect(err.message).toBe('Invalid AES key size 24 bytes; supported sizes: 16, 32')
  })
})
