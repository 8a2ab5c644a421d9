/**
 * Set-key-declaration: point the file at a different key environment variable.
 */

import { ConfigError } from '../errors.js'
import { keyDeclarationLine } from '../line/classifier.js'
import { indexSecrets } from '../line/document.js'
import { isIdentifier } from '../line/metadata.js'
import type { FileLine } from '../line/types.js'

/** @public */
export interface SetKeyResult {
  lines: FileLine[]
  /**
   * `false` when the file has no key declaration; the lines are then
   * returned unchanged and the caller decides how to report it.
   */
  updated: boolean
}

/**
 * Rewrite the value of the key declaration to `envName`.
 *
 * @throws ConfigError if `envName` is not a valid environment variable name
 * @throws DuplicateSecretError if a secret is declared twice
 */
export function setKeyDeclaration(lines: readonly FileLine[], envName: string): SetKeyResult {
  if (!isIdentifier(envName)) {
    throw new ConfigError(`"${envName}" is not a valid environment variable name`)
  }
  indexSecrets(lines)
  let updated = false
  const output = lines.map((line) => {
    if (line.kind !== 'key-declaration') {
      return line
    }
    updated = true
    return line.envName === envName ? line : keyDeclarationLine(line.name, envName)
  })
  return { lines: output, updated }
}
