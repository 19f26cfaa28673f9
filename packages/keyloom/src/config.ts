/**
 * Configuration loading, validation, and defaults for keyloom.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { AES_GCM_KEY_TYPE } from './aead/aes-gcm-key-manager.js'
import { ConfigError } from './errors.js'

/**
 * Catalogue entry for one key type.
 * @public
 */
export interface KeyTypeConfig {
  /** Key type identifier, e.g. `keyloom.AesGcmKey`. */
  keyType: string
  /** Disabled key types are left out of the registry. */
  enabled: boolean
  /** Whether new keys of this type may be generated. Defaults to `true`. */
  newKeyAllowed?: boolean | undefined
}

/**
 * Top-level keyloom configuration.
 * @public
 */
export interface KeyloomConfig {
  version: 1
  keyTypes: KeyTypeConfig[]
}

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'keyloom')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'keyloom')
  }
  return path.join(os.homedir(), '.config', 'keyloom')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): KeyloomConfig {
  return {
    version: 1,
    keyTypes: [{ keyType: AES_GCM_KEY_TYPE, enabled: true, newKeyAllowed: true }],
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates a key type config entry.
 */
function validateKeyTypeEntry(entry: unknown, index: number): KeyTypeConfig {
  const at = `keyTypes[${String(index)}]`
  if (!isObject(entry)) {
    throw new ConfigError(`${at} must be an object`, at)
  }
  if (typeof entry.keyType !== 'string' || entry.keyType.trim() === '') {
    throw new ConfigError(`${at}.keyType must be a non-empty string`, `${at}.keyType`)
  }
  if (typeof entry.enabled !== 'boolean') {
    throw new ConfigError(`${at}.enabled must be a boolean`, `${at}.enabled`)
  }

  const result: KeyTypeConfig = {
    keyType: entry.keyType,
    enabled: entry.enabled,
  }

  if (entry.newKeyAllowed !== undefined) {
    if (typeof entry.newKeyAllowed !== 'boolean') {
      throw new ConfigError(`${at}.newKeyAllowed must be a boolean`, `${at}.newKeyAllowed`)
    }
    result.newKeyAllowed = entry.newKeyAllowed
  }

  return result
}

/**
 * Validate an unknown value as a KeyloomConfig, throwing on invalid structure.
 *
 * @throws {@link ConfigError} naming the offending field
 */
export function validateConfig(config: unknown): KeyloomConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object', '')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1', 'version')
  }

  if (!Array.isArray(config.keyTypes)) {
    throw new ConfigError('Config keyTypes must be an array', 'keyTypes')
  }

  const keyTypes: KeyTypeConfig[] = config.keyTypes.map((entry: unknown, i: number) =>
    validateKeyTypeEntry(entry, i),
  )

  const seen = new Set<string>()
  for (const [i, { keyType }] of keyTypes.entries()) {
    if (seen.has(keyType)) {
      throw new ConfigError(
        `Config lists key type ${keyType} more than once`,
        `keyTypes[${String(i)}].keyType`,
      )
    }
    seen.add(keyType)
  }

  return { version: 1, keyTypes }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load the keyloom config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 * @throws {@link ConfigError} if the file cannot be read, parsed or validated
 */
export async function loadConfig(configDir?: string): Promise<KeyloomConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) {
      return defaultConfig()
    }
    throw new ConfigError(`Failed to read config file at ${configPath}`, configPath, { cause: err })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath, { cause: err })
  }

  return validateConfig(parsed)
}
