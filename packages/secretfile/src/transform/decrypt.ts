/**
 * Decrypt-all: restore plaintext values and drop the encrypted lines.
 */

import type { SecretCipher } from '../cipher/adapter.js'
import { plainLine } from '../line/classifier.js'
import { indexSecrets } from '../line/document.js'
import type { FileLine } from '../line/types.js'
import { assertSignature } from '../signature/engine.js'
import { ensureHeader } from './header.js'
import { openSecret } from './stamp.js'

/** @public */
export interface DecryptContext {
  cipher: SecretCipher
  /** Key material, already resolved. */
  key: string
  /** Decrypt entries even when their signature does not verify. */
  skipVerify?: boolean | undefined
}

/** @public */
export interface DecryptResult {
  lines: FileLine[]
  count: number
  /** Names decrypted, in file order. */
  decrypted: string[]
}

/**
 * Decrypt every `NAME_ENCRYPTED` line. The recovered value is written into
 * the `NAME` line and the encrypted line is dropped; an encrypted line with
 * no `NAME` companion is replaced by `NAME = "<value>"` in place. All other
 * lines pass through.
 *
 * Every entry is verified and decrypted before any output is built, so a
 * single failure leaves nothing half-decrypted.
 *
 * @throws DuplicateSecretError if a secret is declared twice
 * @throws SignatureMismatchError if an entry's signature does not verify
 * @throws CryptoError if an entry cannot be decrypted with the key
 */
export async function decryptAll(
  lines: readonly FileLine[],
  context: DecryptContext,
): Promise<DecryptResult> {
  const index = indexSecrets(lines)
  const recovered = new Map<string, string>()

  for (const line of lines) {
    if (line.kind !== 'secret-encrypted') {
      continue
    }
    if (context.skipVerify !== true) {
      assertSignature(line)
    }
    recovered.set(line.name, await openSecret(line, context.cipher, context.key))
  }

  if (recovered.size === 0) {
    return { lines: [...lines], count: 0, decrypted: [] }
  }

  const output: FileLine[] = []
  for (const line of lines) {
    if (line.kind === 'secret-plain') {
      const value = recovered.get(line.name)
      output.push(value !== undefined ? plainLine(line.name, value, line.comment) : line)
    } else if (line.kind === 'secret-encrypted') {
      if (!index.plain.has(line.name)) {
        output.push(plainLine(line.name, recovered.get(line.name) ?? ''))
      }
    } else {
      output.push(line)
    }
  }

  return {
    lines: ensureHeader(output),
    count: recovered.size,
    decrypted: [...recovered.keys()],
  }
}
