/**
 * The disclaimer kept at the top of any file whose secrets were rewritten.
 */

import { commentLine } from '../line/classifier.js'
import type { FileLine } from '../line/types.js'

/** First line of every file whose secrets have been rewritten. */
export const HEADER_DISCLAIMER =
  '# Generated by secretfile. Do not edit manually, unless you know what you are doing'

/**
 * Prepend {@link HEADER_DISCLAIMER} unless the first line already is it.
 */
export function ensureHeader(lines: FileLine[]): FileLine[] {
  const [first] = lines
  if (first?.raw.trim() === HEADER_DISCLAIMER) {
    return lines
  }
  return [commentLine(HEADER_DISCLAIMER), ...lines]
}

/**
 * Lines of a freshly initialized secrets file.
 */
export function initialContent(keyDeclarationName: string, keyEnvName: string): string[] {
  return [
    HEADER_DISCLAIMER,
    '#',
    '#  SECRETS file',
    '#',
    '#  Keep copies of your secrets in a safe place.',
    '#  Lines starting with "#" and empty lines are left untouched.',
    '#  Add secrets as NAME = "value", then run `secretfile encrypt`.',
    '#',
    '',
    `${keyDeclarationName} = "${keyEnvName}"`,
    '',
  ]
}
