/**
 * Cipher adapter: symmetric encryption of secret values using `jose` with
 * `dir` + `A256GCM`. All cryptographic calls made on secret values go
 * through here.
 */

import * as crypto from 'node:crypto'
import { CompactEncrypt, compactDecrypt } from 'jose'
import { CryptoError } from '../errors.js'

const ALGORITHM = 'dir'
const ENCRYPTION = 'A256GCM'
const KEY_BYTES = 32

/** 32 bytes as unpadded base64url is 43 characters; a trailing `=` is tolerated. */
const KEY_FORMAT = /^[A-Za-z0-9_-]{43}=?$/

/**
 * Contract for the symmetric primitive behind encrypt/decrypt passes.
 * @public
 */
export interface SecretCipher {
  /**
   * Encrypt a non-empty plaintext.
   * @throws CryptoError if the key is malformed or the plaintext is empty
   */
  encrypt(plaintext: string, key: string): Promise<string>

  /**
   * Decrypt a ciphertext produced by {@link SecretCipher.encrypt}.
   * @throws CryptoError on a malformed key, a wrong key or corrupted input
   */
  decrypt(ciphertext: string, key: string): Promise<string>
}

/**
 * Generate a fresh key: 32 random bytes, base64url encoded.
 * @public
 */
export function generateKey(): string {
  return crypto.randomBytes(KEY_BYTES).toString('base64url')
}

/**
 * Decode a base64url key string into raw key bytes. The key is used as-is;
 * there is no derivation.
 *
 * @throws CryptoError if the string does not encode exactly 32 bytes
 * @internal
 */
export function decodeKey(key: string): Uint8Array {
  if (!KEY_FORMAT.test(key)) {
    throw new CryptoError(
      'Key must be 32 bytes encoded as base64url (43 characters); generate one with `secretfile keygen`',
    )
  }
  const bytes = Buffer.from(key.replace(/=$/, ''), 'base64url')
  if (bytes.length !== KEY_BYTES) {
    throw new CryptoError(`Key must decode to ${String(KEY_BYTES)} bytes`)
  }
  return new Uint8Array(bytes)
}

/**
 * {@link SecretCipher} producing compact JWE strings. The output holds only
 * base64url characters and dots, so it can sit between double quotes
 * unescaped.
 * @public
 */
export class JweCipher implements SecretCipher {
  async encrypt(plaintext: string, key: string): Promise<string> {
    if (plaintext === '') {
      throw new CryptoError('Refusing to encrypt an empty value')
    }
    const keyBytes = decodeKey(key)
    const jwe = await new CompactEncrypt(new TextEncoder().encode(plaintext))
      .setProtectedHeader({ alg: ALGORITHM, enc: ENCRYPTION })
      .encrypt(keyBytes)
    return jwe
  }

  async decrypt(ciphertext: string, key: string): Promise<string> {
    const keyBytes = decodeKey(key)
    let plaintext: Uint8Array
    try {
      const result = await compactDecrypt(ciphertext, keyBytes, {
        keyManagementAlgorithms: [ALGORITHM],
        contentEncryptionAlgorithms: [ENCRYPTION],
      })
      plaintext = result.plaintext
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new CryptoError(`Decryption failed: ${message}`)
    }
    return new TextDecoder().decode(plaintext)
  }
}
