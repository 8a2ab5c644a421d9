/**
 * Set-secret: add a secret or replace its value.
 */

import { ConfigError } from '../errors.js'
import { ENCRYPTED_SUFFIX, plainLine } from '../line/classifier.js'
import { indexSecrets } from '../line/document.js'
import { isIdentifier } from '../line/metadata.js'
import type { FileLine } from '../line/types.js'
import { ensureHeader } from './header.js'

/** @public */
export interface SetSecretResult {
  lines: FileLine[]
  /** Whether the secret was not declared before. */
  created: boolean
}

/**
 * Write `name = "<value>"`, replacing an existing declaration in place or
 * appending a new one. A stale `name_ENCRYPTED` line is dropped so that the
 * next encrypt pass encrypts the new value.
 *
 * @throws ConfigError if `name` is not a usable secret name
 * @throws DuplicateSecretError if a secret is declared twice
 */
export function setSecret(
  lines: readonly FileLine[],
  name: string,
  value: string,
  keyDeclarationName: string,
): SetSecretResult {
  if (!isIdentifier(name)) {
    throw new ConfigError(`"${name}" is not a valid secret name`)
  }
  if (name === keyDeclarationName) {
    throw new ConfigError(`"${name}" is the key declaration; use set-key to change it`)
  }
  if (name.endsWith(ENCRYPTED_SUFFIX)) {
    throw new ConfigError(`Secret names cannot end with ${ENCRYPTED_SUFFIX}`)
  }

  const index = indexSecrets(lines)
  const hasPlain = index.plain.has(name)
  const hasEncrypted = index.encrypted.has(name)

  const output: FileLine[] = []
  for (const line of lines) {
    if (line.kind === 'secret-plain' && line.name === name) {
      output.push(plainLine(name, value, line.comment))
    } else if (line.kind === 'secret-encrypted' && line.name === name) {
      if (!hasPlain) {
        output.push(plainLine(name, value))
      }
    } else {
      output.push(line)
    }
  }
  if (!hasPlain && !hasEncrypted) {
    output.push(plainLine(name, value))
  }

  return { lines: ensureHeader(output), created: !hasPlain && !hasEncrypted }
}
