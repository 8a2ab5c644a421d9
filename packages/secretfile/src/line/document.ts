/**
 * Whole-file parsing and rendering, plus lookups over a classified line
 * sequence.
 */

import { DuplicateSecretError } from '../errors.js'
import { classifyLine } from './classifier.js'
import type {
  ClassifyOptions,
  FileLine,
  KeyDeclarationLine,
  LineEnding,
  SecretRecord,
  SecretsDocument,
} from './types.js'

/**
 * Split file content into classified lines, remembering each line's
 * terminator and whether the content ended with one. `\n` and `\r\n` may be
 * mixed within one file.
 */
export function parseDocument(text: string, options?: ClassifyOptions): SecretsDocument {
  if (text === '') {
    return { lines: [], eol: '\n', finalNewline: false }
  }
  const parts = text.split(/(\r?\n)/)
  const eol = lineEnding(parts[1]) ?? '\n'
  const lines: FileLine[] = []
  for (let i = 0; i < parts.length; i += 2) {
    const raw = parts[i] ?? ''
    const ending = lineEnding(parts[i + 1])
    if (ending === undefined && raw === '' && i > 0) {
      break
    }
    const line = classifyLine(raw, options)
    lines.push(ending === undefined || ending === eol ? line : { ...line, eol: ending })
  }
  return { lines, eol, finalNewline: parts[parts.length - 1] === '' }
}

function lineEnding(separator: string | undefined): LineEnding | undefined {
  if (separator === '\n' || separator === '\r\n') {
    return separator
  }
  return undefined
}

/**
 * Render a document back to text. Lines that were not rebuilt render exactly
 * as they were read; rebuilt lines take the document's terminator.
 */
export function renderDocument(document: SecretsDocument): string {
  const last = document.lines.length - 1
  return document.lines
    .map((line, i) =>
      i < last || document.finalNewline ? line.raw + (line.eol ?? document.eol) : line.raw,
    )
    .join('')
}

/**
 * Positions of each secret's lines, keyed by base name.
 */
export interface SecretIndex {
  plain: Map<string, number>
  encrypted: Map<string, number>
  /** `NAME_ENCRYPTED` lines kept as unrecognized because their metadata is malformed. */
  damaged: Map<string, number>
}

/** Base name of a plain, encrypted or damaged encrypted line. */
function secretName(line: FileLine): { name: string; encrypted: boolean } | undefined {
  switch (line.kind) {
    case 'secret-plain':
      return { name: line.name, encrypted: false }
    case 'secret-encrypted':
      return { name: line.name, encrypted: true }
    case 'unrecognized':
      return line.encryptedName !== undefined
        ? { name: line.encryptedName, encrypted: true }
        : undefined
    default:
      return undefined
  }
}

/**
 * Names declared more than once, as a plain line or as an encrypted line.
 * An encrypted line with malformed metadata still counts. Each name is
 * reported once, in order of its second occurrence.
 */
export function findDuplicates(lines: readonly FileLine[]): string[] {
  const seenPlain = new Set<string>()
  const seenEncrypted = new Set<string>()
  const duplicates: string[] = []
  for (const line of lines) {
    const secret = secretName(line)
    if (secret === undefined) {
      continue
    }
    const seen = secret.encrypted ? seenEncrypted : seenPlain
    if (seen.has(secret.name)) {
      if (!duplicates.includes(secret.name)) {
        duplicates.push(secret.name)
      }
    } else {
      seen.add(secret.name)
    }
  }
  return duplicates
}

/**
 * Index the secret lines of a file.
 *
 * @throws DuplicateSecretError if a secret is declared more than once
 */
export function indexSecrets(lines: readonly FileLine[]): SecretIndex {
  const [duplicate] = findDuplicates(lines)
  if (duplicate !== undefined) {
    throw new DuplicateSecretError(`Secret "${duplicate}" is declared more than once`, duplicate)
  }
  const index: SecretIndex = { plain: new Map(), encrypted: new Map(), damaged: new Map() }
  lines.forEach((line, i) => {
    if (line.kind === 'secret-plain') {
      index.plain.set(line.name, i)
    } else if (line.kind === 'secret-encrypted') {
      index.encrypted.set(line.name, i)
    } else if (line.kind === 'unrecognized' && line.encryptedName !== undefined) {
      index.damaged.set(line.encryptedName, i)
    }
  })
  return index
}

/** The first key declaration line, if any. */
export function findKeyDeclaration(lines: readonly FileLine[]): KeyDeclarationLine | undefined {
  for (const line of lines) {
    if (line.kind === 'key-declaration') {
      return line
    }
  }
  return undefined
}

/**
 * One record per secret name, in order of first appearance. A plain line
 * with an encrypted counterpart folds into the encrypted record.
 */
export function collectRecords(lines: readonly FileLine[]): SecretRecord[] {
  const encryptedNames = new Set<string>()
  for (const line of lines) {
    if (line.kind === 'secret-encrypted') {
      encryptedNames.add(line.name)
    }
  }

  const records = new Map<string, SecretRecord>()
  const placeholders = new Set<string>()
  for (const line of lines) {
    if (line.kind === 'secret-plain') {
      if (encryptedNames.has(line.name)) {
        placeholders.add(line.name)
        const existing = records.get(line.name)
        if (existing?.state === 'encrypted') {
          existing.placeholder = true
        } else if (existing === undefined) {
          // Reserve the position; filled in when the encrypted line is reached.
          records.set(line.name, {
            state: 'encrypted',
            name: line.name,
            ciphertext: '',
            metadata: undefined,
            placeholder: true,
          })
        }
      } else if (!records.has(line.name)) {
        records.set(line.name, { state: 'plain', name: line.name, value: line.value })
      }
    } else if (line.kind === 'secret-encrypted') {
      const existing = records.get(line.name)
      if (existing?.state === 'encrypted' && existing.ciphertext !== '') {
        continue
      }
      records.set(line.name, {
        state: 'encrypted',
        name: line.name,
        ciphertext: line.ciphertext,
        metadata: line.metadata,
        placeholder: placeholders.has(line.name),
      })
    }
  }
  return [...records.values()]
}
