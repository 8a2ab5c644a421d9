/**
 * Terminal output helpers for the secretfile CLI.
 *
 * @internal
 */

const ESC = '\x1b['

/** Apply an SGR style when stdout is a TTY, checked at call time. */
function styled(open: number, close: number, text: string): string {
  if (process.stdout.isTTY !== true) {
    return text
  }
  return `${ESC}${String(open)}m${text}${ESC}${String(close)}m`
}

export function bold(text: string): string {
  return styled(1, 22, text)
}

export function dim(text: string): string {
  return styled(2, 22, text)
}

/** `<ErrorName>: <message>` for stderr. */
export function formatError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err)
}
