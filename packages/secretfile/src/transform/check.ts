/**
 * Read-only integrity report over a secrets file.
 */

import { ENCRYPTED_SUFFIX } from '../line/classifier.js'
import { findKeyDeclaration } from '../line/document.js'
import type { FileLine } from '../line/types.js'
import { verifyRecord } from '../signature/engine.js'

/** Signature status of one encrypted entry. @public */
export interface SignatureCheck {
  name: string
  valid: boolean
  /** Key env name recorded in the metadata, if any. */
  keyEnvName: string | undefined
}

/** A line-level problem. @public */
export interface LineIssue {
  /** 1-based line number. */
  line: number
  message: string
}

/** @public */
export interface CheckReport {
  /** `true` when every signature verifies and no line has an issue. */
  ok: boolean
  /** Value of the key declaration, if the file has one. */
  keyEnvName: string | undefined
  signatures: SignatureCheck[]
  issues: LineIssue[]
  /** Secrets still holding a plaintext value. */
  plaintext: string[]
}

/**
 * Verify every encrypted entry and collect format issues without decrypting
 * anything.
 */
export function checkSecrets(lines: readonly FileLine[]): CheckReport {
  const signatures: SignatureCheck[] = []
  const issues: LineIssue[] = []
  const plaintext: string[] = []
  const seen = new Set<string>()

  lines.forEach((line, i) => {
    if (line.kind === 'secret-plain' || line.kind === 'secret-encrypted') {
      const label = line.kind === 'secret-encrypted' ? `${line.name}${ENCRYPTED_SUFFIX}` : line.name
      if (seen.has(label)) {
        issues.push({ line: i + 1, message: `${label} is declared more than once` })
      }
      seen.add(label)
    }

    if (line.kind === 'secret-encrypted') {
      signatures.push({
        name: line.name,
        valid: verifyRecord(line),
        keyEnvName: line.metadata?.keyEnvName,
      })
    } else if (line.kind === 'secret-plain' && line.value !== '') {
      plaintext.push(line.name)
    } else if (line.kind === 'unrecognized' && line.issue !== undefined) {
      issues.push({ line: i + 1, message: line.issue })
    }
  })

  const declaration = findKeyDeclaration(lines)
  const ok = issues.length === 0 && signatures.every((check) => check.valid)
  return { ok, keyEnvName: declaration?.envName, signatures, issues, plaintext }
}
