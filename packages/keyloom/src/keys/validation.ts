/**
 * Validation predicates shared by key managers.
 */

import { InvalidKeyError } from '../errors.js'
import { OK, failure } from '../result.js'
import type { Result } from '../result.js'

/** AES key sizes accepted by the AES-based key managers, in bytes. */
export const AES_KEY_SIZES: readonly number[] = [16, 32]

/**
 * Check that a key's declared version is one the manager understands.
 *
 * @remarks
 * A manager accepts every version from 0 up to its own. Rejecting newer
 * versions keeps a downgraded manager from accepting keys in a format it
 * does not know.
 *
 * @param keyType - Key type reported in the error
 * @param candidate - The key's declared version
 * @param maxExpected - The manager's own version
 */
export function validateVersion(
  keyType: string,
  candidate: number,
  maxExpected: number,
): Result<void, InvalidKeyError> {
  if (!Number.isInteger(candidate) || candidate < 0 || candidate > maxExpected) {
    return failure(
      new InvalidKeyError(
        `Key has version ${String(candidate)}; only keys with version in range [0..${String(maxExpected)}] are supported`,
        keyType,
        'version',
      ),
    )
  }
  return OK
}

/**
 * Check that `size` is an accepted AES key size.
 *
 * @param keyType - Key type reported in the error
 * @param size - Key size in bytes
 */
export function validateAesKeySize(keyType: string, size: number): Result<void, InvalidKeyError> {
  if (!AES_KEY_SIZES.includes(size)) {
    return failure(
      new InvalidKeyError(
        `Invalid AES key size ${String(size)} bytes; supported sizes: ${AES_KEY_SIZES.join(', ')}`,
        keyType,
        'key-size',
      ),
    )
  }
  return OK
}
