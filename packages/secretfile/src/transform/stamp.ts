/**
 * Encrypt one value and stamp it with provenance metadata.
 */

import type { SecretCipher } from '../cipher/adapter.js'
import { CryptoError } from '../errors.js'
import { encryptedLine } from '../line/classifier.js'
import { formatTimestamp } from '../line/metadata.js'
import type { SecretEncryptedLine } from '../line/types.js'
import { sign } from '../signature/engine.js'

/** What is needed to encrypt under one key. */
export interface StampContext {
  cipher: SecretCipher
  /** Key material, already resolved. */
  key: string
  /** Name of the environment variable the key came from. */
  keyEnvName: string
  /** Clock used for the metadata timestamp. */
  now: () => Date
}

/**
 * Produce the `NAME_ENCRYPTED` line for `value`.
 *
 * @throws CryptoError naming the secret if encryption fails
 */
export async function stampSecret(
  name: string,
  value: string,
  context: StampContext,
): Promise<SecretEncryptedLine> {
  let ciphertext: string
  try {
    ciphertext = await context.cipher.encrypt(value, context.key)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new CryptoError(
      `Error encrypting ${name}. Ensure you are providing a valid key: ${message}`,
      name,
    )
  }
  const timestamp = formatTimestamp(context.now())
  const signature = sign(ciphertext, timestamp, context.keyEnvName)
  return encryptedLine(name, ciphertext, {
    keyEnvName: context.keyEnvName,
    signature,
    timestamp,
  })
}

/**
 * Decrypt one encrypted line. Signatures are checked by the caller.
 *
 * @throws CryptoError naming the secret if decryption fails
 */
export async function openSecret(
  line: SecretEncryptedLine,
  cipher: SecretCipher,
  key: string,
): Promise<string> {
  try {
    return await cipher.decrypt(line.ciphertext, key)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    const origin =
      line.metadata !== undefined ? ` (encrypted with ${line.metadata.keyEnvName})` : ''
    throw new CryptoError(`Could not decrypt ${line.name}${origin}: ${message}`, line.name)
  }
}
