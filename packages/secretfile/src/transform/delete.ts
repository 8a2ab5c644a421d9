/**
 * Delete-one: remove a secret and its encrypted counterpart.
 */

import { indexSecrets } from '../line/document.js'
import type { FileLine } from '../line/types.js'
import { ensureHeader } from './header.js'

/** @public */
export interface DeleteResult {
  lines: FileLine[]
  /** Number of lines removed: 0, 1 or 2 for a well-formed file. */
  removed: number
}

/**
 * Remove the `name` and `name_ENCRYPTED` lines, including an encrypted line
 * whose metadata is malformed. The key declaration is never removed, and
 * every other line passes through.
 *
 * @throws DuplicateSecretError if a secret is declared twice
 */
export function deleteSecret(lines: readonly FileLine[], name: string): DeleteResult {
  indexSecrets(lines)
  const output = lines.filter((line) => !declares(line, name))
  const removed = lines.length - output.length
  return { lines: removed > 0 ? ensureHeader(output) : output, removed }
}

function declares(line: FileLine, name: string): boolean {
  if (line.kind === 'secret-plain' || line.kind === 'secret-encrypted') {
    return line.name === name
  }
  return line.kind === 'unrecognized' && line.encryptedName === name
}
