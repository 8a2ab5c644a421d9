/**
 * Read-only listing of declared names.
 */

import { ENCRYPTED_SUFFIX } from '../line/classifier.js'
import type { FileLine, SecretState } from '../line/types.js'

/** One declared name, in file order. @public */
export interface ListEntry {
  /** The name as written, `NAME_ENCRYPTED` for encrypted lines. */
  name: string
  state: SecretState | 'key-declaration'
}

/**
 * Names of the key declaration and every secret line. Comments, blanks and
 * unrecognized lines are skipped.
 */
export function listSecrets(lines: readonly FileLine[]): ListEntry[] {
  const encryptedNames = new Set<string>()
  for (const line of lines) {
    if (line.kind === 'secret-encrypted') {
      encryptedNames.add(line.name)
    }
  }

  const entries: ListEntry[] = []
  for (const line of lines) {
    switch (line.kind) {
      case 'key-declaration':
        entries.push({ name: line.name, state: 'key-declaration' })
        break
      case 'secret-plain':
        entries.push({
          name: line.name,
          state: encryptedNames.has(line.name) ? 'encrypted-placeholder' : 'plain',
        })
        break
      case 'secret-encrypted':
        entries.push({ name: `${line.name}${ENCRYPTED_SUFFIX}`, state: 'encrypted' })
        break
      default:
        break
    }
  }
  return entries
}
