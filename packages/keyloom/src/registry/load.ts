/**
 * Registry construction from configuration on disk.
 */

import { AesGcmKeyManager } from '../aead/aes-gcm-key-manager.js'
import { loadConfig } from '../config.js'
import type { KeyloomConfig } from '../config.js'
import type { RandomSource } from '../util/random.js'
import { KeyManagerRegistry } from './key-manager-registry.js'
import type { KeyManagerSource } from './key-manager-registry.js'

/**
 * Options for {@link loadKeyManagerRegistry}.
 * @public
 */
export interface LoadRegistryOptions {
  /** Override the config directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: KeyloomConfig | undefined
  /**
   * Additional key managers. A manager here replaces the built-in manager
   * for the same key type.
   */
  managers?: readonly KeyManagerSource[] | undefined
  /** Randomness source for the built-in managers. */
  random?: RandomSource | undefined
}

/**
 * Load configuration and build a registry of the key types it enables,
 * served by the built-in managers plus any supplied ones.
 */
export async function loadKeyManagerRegistry(options?: LoadRegistryOptions): Promise<KeyManagerRegistry> {
  const config = options?.config ?? (await loadConfig(options?.configDir))
  const supplied = options?.managers ?? []
  const suppliedTypes = new Set(supplied.map((manager) => manager.keyType))

  const builtIn: KeyManagerSource[] = [new AesGcmKeyManager({ random: options?.random })]
  const managers = [
    ...builtIn.filter((manager) => !suppliedTypes.has(manager.keyType)),
    ...supplied,
  ]

  return KeyManagerRegistry.fromConfig(config, managers)
}
