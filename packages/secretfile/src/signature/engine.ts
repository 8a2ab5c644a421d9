/**
 * Provenance signatures for encrypted secrets.
 *
 * @remarks
 * The signature is computed as:
 *   1. Concatenate the ciphertext, the timestamp and the key env name
 *   2. Hash the result with SHA-256
 *   3. Base64-encode the digest
 *   4. Keep the last 8 characters
 *
 * Changing any of the three inputs changes the signature, so a hand-edited
 * ciphertext, timestamp or key env name is caught before decryption.
 */

import * as crypto from 'node:crypto'
import { SignatureMismatchError } from '../errors.js'
import { ENCRYPTED_SUFFIX } from '../line/classifier.js'
import { SIGNATURE_LENGTH } from '../line/metadata.js'
import type { SecretEncryptedLine } from '../line/types.js'

/**
 * Compute the stored signature for an encrypted value.
 * @public
 */
export function sign(ciphertext: string, timestamp: string, keyEnvName: string): string {
  const digest = crypto
    .createHash('sha256')
    .update(ciphertext + timestamp + keyEnvName, 'utf8')
    .digest('base64')
  return digest.slice(-SIGNATURE_LENGTH)
}

/**
 * Recompute the signature and compare it with `signature` in constant time.
 * @public
 */
export function verify(
  signature: string,
  ciphertext: string,
  timestamp: string,
  keyEnvName: string,
): boolean {
  const expected = Buffer.from(sign(ciphertext, timestamp, keyEnvName), 'utf8')
  const actual = Buffer.from(signature, 'utf8')
  if (expected.length !== actual.length) {
    return false
  }
  return crypto.timingSafeEqual(expected, actual)
}

/**
 * Verify the metadata of an encrypted line. A line without metadata never
 * verifies.
 * @public
 */
export function verifyRecord(line: SecretEncryptedLine): boolean {
  if (line.metadata === undefined) {
    return false
  }
  const { signature, timestamp, keyEnvName } = line.metadata
  return verify(signature, line.ciphertext, timestamp, keyEnvName)
}

/**
 * Throw unless the encrypted line carries a valid signature.
 *
 * @throws SignatureMismatchError naming the secret when verification fails
 * @public
 */
export function assertSignature(line: SecretEncryptedLine): void {
  if (verifyRecord(line)) {
    return
  }
  const label = `${line.name}${ENCRYPTED_SUFFIX}`
  if (line.metadata === undefined) {
    throw new SignatureMismatchError(
      `${label} has no provenance metadata; refusing to decrypt an unsigned entry`,
      line.name,
      '',
      undefined,
    )
  }
  const { signature, timestamp, keyEnvName } = line.metadata
  const expected = sign(line.ciphertext, timestamp, keyEnvName)
  throw new SignatureMismatchError(
    `${label} signature mismatch (stored ${signature}, computed ${expected}); ` +
      'the entry was edited or corrupted',
    line.name,
    expected,
    signature,
  )
}
