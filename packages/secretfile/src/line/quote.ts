/**
 * Escaping for double-quoted values, so any value fits on a single line.
 *
 * @remarks
 * A backslash is only escaped where it would otherwise read as the start of
 * an escape or close the quotes, so hand-written values such as Windows
 * paths keep their text across a rewrite.
 */

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
}

const UNESCAPES: Record<string, string> = {
  '\\': '\\',
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
}

/** Escape a value for writing between double quotes. */
export function escapeValue(value: string): string {
  return value.replace(/\\(?=[\\"nrt\n\r\t]|$)|["\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch)
}

/**
 * Reverse {@link escapeValue}. An unknown escape is kept as written, so
 * `"C:\data"` reads as `C:\data`.
 */
export function unescapeValue(value: string): string {
  return value.replace(/\\(.)/g, (match, ch: string) => UNESCAPES[ch] ?? match)
}

/** Wrap a value in double quotes, escaping as needed. */
export function quote(value: string): string {
  return `"${escapeValue(value)}"`
}
