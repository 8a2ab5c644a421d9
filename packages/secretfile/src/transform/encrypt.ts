/**
 * Encrypt-all: move every non-empty plaintext value into an encrypted,
 * signed companion line.
 */

import { plainLine } from '../line/classifier.js'
import { indexSecrets } from '../line/document.js'
import type { FileLine } from '../line/types.js'
import { ensureHeader } from './header.js'
import { stampSecret } from './stamp.js'
import type { StampContext } from './stamp.js'

/** @public */
export type EncryptContext = StampContext

/** @public */
export interface EncryptResult {
  lines: FileLine[]
  /** Number of newly encrypted secrets. */
  count: number
  /** Names encrypted in this pass, in file order. */
  encrypted: string[]
  /**
   * Names that held a plaintext value although already encrypted. Their
   * plaintext is cleared and the existing ciphertext kept.
   */
  skipped: string[]
  /**
   * Names left in plaintext because their `NAME_ENCRYPTED` line has
   * malformed metadata. Encrypting them again would declare the secret twice.
   */
  damaged: string[]
}

/**
 * Encrypt every plain secret with a non-empty value that has no encrypted
 * counterpart yet. Each becomes `NAME = ""` followed by its `NAME_ENCRYPTED`
 * line. Empty values are never encrypted.
 *
 * @throws DuplicateSecretError if a secret is declared twice
 * @throws CryptoError if any value fails to encrypt; nothing is returned
 */
export async function encryptAll(
  lines: readonly FileLine[],
  context: EncryptContext,
): Promise<EncryptResult> {
  const index = indexSecrets(lines)
  const output: FileLine[] = []
  const encrypted: string[] = []
  const skipped: string[] = []
  const damaged: string[] = []

  for (const line of lines) {
    if (line.kind !== 'secret-plain' || line.value === '') {
      output.push(line)
      continue
    }
    if (index.damaged.has(line.name)) {
      damaged.push(line.name)
      output.push(line)
      continue
    }
    if (index.encrypted.has(line.name)) {
      skipped.push(line.name)
      output.push(plainLine(line.name, '', line.comment))
      continue
    }
    const stamped = await stampSecret(line.name, line.value, context)
    output.push(plainLine(line.name, '', line.comment), stamped)
    encrypted.push(line.name)
  }

  const changed = encrypted.length > 0 || skipped.length > 0
  return {
    lines: changed ? ensureHeader(output) : output,
    count: encrypted.length,
    encrypted,
    skipped,
    damaged,
  }
}
