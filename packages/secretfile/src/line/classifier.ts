/**
 * Line classifier: maps one raw line of a secrets file to its {@link FileLine}
 * variant, and builds the lines written back by transformations.
 *
 * @remarks
 * Rules apply in order: blank, comment, encrypted secret, key declaration,
 * plain secret, and finally unrecognized. Classification is total; a line is
 * never rejected, only labelled.
 */

import { FormatError } from '../errors.js'
import { formatMetadata, parseMetadata } from './metadata.js'
import { quote, unescapeValue } from './quote.js'
import type {
  ClassifyOptions,
  CommentLine,
  FileLine,
  KeyDeclarationLine,
  SecretEncryptedLine,
  SecretMetadata,
  SecretPlainLine,
} from './types.js'

/** Reserved name of the key declaration line unless configured otherwise. */
export const DEFAULT_KEY_DECLARATION_NAME = 'MASTER_KEY_ENV'

/** Suffix naming the encrypted counterpart of a secret. */
export const ENCRYPTED_SUFFIX = '_ENCRYPTED'

const IDENT = '[A-Za-z_][A-Za-z0-9_]*'
const QUOTED = '"((?:[^"\\\\]|\\\\.)*)"'
const TRAILING_COMMENT = '(?:#(.*))?'

const ENCRYPTED_LINE = new RegExp(
  `^\\s*(${IDENT})${ENCRYPTED_SUFFIX}\\s*=\\s*${QUOTED}\\s*${TRAILING_COMMENT}$`,
)
const ASSIGNMENT_LINE = new RegExp(`^\\s*(${IDENT})\\s*=\\s*${QUOTED}\\s*${TRAILING_COMMENT}$`)

/**
 * Classify a single line (without its terminator).
 */
export function classifyLine(raw: string, options?: ClassifyOptions): FileLine {
  const keyDeclarationName = options?.keyDeclarationName ?? DEFAULT_KEY_DECLARATION_NAME

  if (raw.trim() === '') {
    return { kind: 'blank', raw }
  }
  if (raw.trimStart().startsWith('#')) {
    return { kind: 'comment', raw }
  }

  const encrypted = ENCRYPTED_LINE.exec(raw)
  if (encrypted !== null) {
    const [, name, value, comment] = encrypted
    if (name === undefined || value === undefined) {
      return { kind: 'unrecognized', raw }
    }
    let metadata: SecretMetadata | undefined
    if (comment !== undefined) {
      try {
        metadata = parseMetadata(comment)
      } catch (err) {
        if (err instanceof FormatError) {
          return {
            kind: 'unrecognized',
            raw,
            issue: `${name}${ENCRYPTED_SUFFIX}: ${err.message}`,
            encryptedName: name,
          }
        }
        throw err
      }
    }
    return { kind: 'secret-encrypted', raw, name, ciphertext: unescapeValue(value), metadata }
  }

  const assignment = ASSIGNMENT_LINE.exec(raw)
  if (assignment !== null) {
    const [, name, value, comment] = assignment
    if (name === undefined || value === undefined) {
      return { kind: 'unrecognized', raw }
    }
    if (name === keyDeclarationName) {
      return { kind: 'key-declaration', raw, name, envName: unescapeValue(value) }
    }
    if (name.endsWith(ENCRYPTED_SUFFIX)) {
      return { kind: 'unrecognized', raw, issue: `${name}: reserved suffix ${ENCRYPTED_SUFFIX}` }
    }
    return { kind: 'secret-plain', raw, name, value: unescapeValue(value), comment }
  }

  return { kind: 'unrecognized', raw }
}

// ---------------------------------------------------------------------------
// Line builders
// ---------------------------------------------------------------------------

/** Build a comment line. `text` must start with `#`. */
export function commentLine(text: string): CommentLine {
  return { kind: 'comment', raw: text }
}

/** Build a `NAME = "value"` line. */
export function plainLine(name: string, value: string, comment?: string): SecretPlainLine {
  const raw = `${name} = ${quote(value)}` + (comment !== undefined ? `  #${comment}` : '')
  return { kind: 'secret-plain', raw, name, value, comment }
}

/** Build a `NAME_ENCRYPTED = "<ciphertext>"    #<metadata>` line. */
export function encryptedLine(
  name: string,
  ciphertext: string,
  metadata: SecretMetadata,
): SecretEncryptedLine {
  const raw = `${name}${ENCRYPTED_SUFFIX} = ${quote(ciphertext)}    #${formatMetadata(metadata)}`
  return { kind: 'secret-encrypted', raw, name, ciphertext, metadata }
}

/** Build the key declaration line. */
export function keyDeclarationLine(name: string, envName: string): KeyDeclarationLine {
  return { kind: 'key-declaration', raw: `${name} = ${quote(envName)}`, name, envName }
}
