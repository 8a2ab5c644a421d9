/**
 * The provenance comment written after each encrypted secret.
 */

import { FormatError } from '../errors.js'
import type { SecretMetadata } from './types.js'

/** Length of the stored signature suffix. */
export const SIGNATURE_LENGTH = 8

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/
const SIGNATURE = /^[A-Za-z0-9+/=]+$/
const TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/

/** Whether `name` is a valid secret or environment variable name. */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name)
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/**
 * Parse the text after `#` into metadata.
 *
 * @throws FormatError if the comment is not `<env>,<signature>,<timestamp>`
 */
export function parseMetadata(comment: string): SecretMetadata {
  const parts = comment.split(',').map((part) => part.trim())
  if (parts.length !== 3) {
    throw new FormatError(
      `Metadata must have 3 comma-separated fields, found ${String(parts.length)}`,
    )
  }
  const [keyEnvName, signature, timestamp] = parts
  if (keyEnvName === undefined || !isIdentifier(keyEnvName)) {
    throw new FormatError(`Metadata key env name is not a valid identifier: "${keyEnvName ?? ''}"`)
  }
  if (
    signature === undefined ||
    signature.length !== SIGNATURE_LENGTH ||
    !SIGNATURE.test(signature)
  ) {
    throw new FormatError(
      `Metadata signature must be ${String(SIGNATURE_LENGTH)} base64 characters: "${signature ?? ''}"`,
    )
  }
  if (timestamp === undefined || !TIMESTAMP.test(timestamp)) {
    throw new FormatError(
      `Metadata timestamp must be YYYY-MM-DD HH:MM:SS: "${timestamp ?? ''}"`,
    )
  }
  return { keyEnvName, signature, timestamp }
}

/** Format metadata as the text following `#`. */
export function formatMetadata(metadata: SecretMetadata): string {
  return `${metadata.keyEnvName},${metadata.signature},${metadata.timestamp}`
}
