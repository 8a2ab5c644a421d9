/**
 * Convert-key: re-encrypt every secret under a new key.
 */

import type { SecretCipher } from '../cipher/adapter.js'
import { indexSecrets } from '../line/document.js'
import type { FileLine, SecretEncryptedLine } from '../line/types.js'
import { assertSignature } from '../signature/engine.js'
import { ensureHeader } from './header.js'
import { setKeyDeclaration } from './set-key.js'
import { openSecret, stampSecret } from './stamp.js'

/** @public */
export interface ConvertContext {
  cipher: SecretCipher
  /** Key the secrets are currently encrypted with. */
  oldKey: string
  /** Key to re-encrypt with. */
  newKey: string
  /** Environment variable holding `newKey`; stamped into metadata and the declaration. */
  newKeyEnvName: string
  now: () => Date
}

/** @public */
export interface ConvertResult {
  lines: FileLine[]
  count: number
  /** Names re-encrypted, in file order. */
  converted: string[]
}

/**
 * For each encrypted secret: verify its signature, decrypt it under the old
 * key, encrypt it under the new key and re-stamp its metadata. The key
 * declaration is pointed at `newKeyEnvName`.
 *
 * All entries are converted before any output is built; one failure aborts
 * the whole conversion.
 *
 * @throws DuplicateSecretError if a secret is declared twice
 * @throws SignatureMismatchError if an entry's signature does not verify
 * @throws CryptoError if an entry does not decrypt under the old key
 */
export async function convertKey(
  lines: readonly FileLine[],
  context: ConvertContext,
): Promise<ConvertResult> {
  indexSecrets(lines)
  const stampContext = {
    cipher: context.cipher,
    key: context.newKey,
    keyEnvName: context.newKeyEnvName,
    now: context.now,
  }

  const replacements = new Map<SecretEncryptedLine, SecretEncryptedLine>()
  for (const line of lines) {
    if (line.kind !== 'secret-encrypted') {
      continue
    }
    assertSignature(line)
    const value = await openSecret(line, context.cipher, context.oldKey)
    replacements.set(line, await stampSecret(line.name, value, stampContext))
  }

  const converted = lines.map((line) =>
    line.kind === 'secret-encrypted' ? (replacements.get(line) ?? line) : line,
  )
  const { lines: declared, updated } = setKeyDeclaration(converted, context.newKeyEnvName)
  const changed = replacements.size > 0 || updated

  return {
    lines: changed ? ensureHeader(declared) : declared,
    count: replacements.size,
    converted: [...replacements.keys()].map((line) => line.name),
  }
}
