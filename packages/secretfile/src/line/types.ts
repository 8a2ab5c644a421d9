/**
 * Line and record types for the secrets file format.
 */

/**
 * Provenance stamped on every encrypted secret, stored in the trailing
 * comment as `#<keyEnvName>,<signature>,<timestamp>`.
 * @public
 */
export interface SecretMetadata {
  /** Name of the environment variable holding the key that encrypted the value. */
  keyEnvName: string
  /** 8-character signature over ciphertext, timestamp and key env name. */
  signature: string
  /** Encryption time, `YYYY-MM-DD HH:MM:SS`. */
  timestamp: string
}

/** @public */
export type LineEnding = '\n' | '\r\n'

interface LineBase {
  /** The line as it is written to disk, without its terminator. */
  raw: string
  /**
   * Terminator read with this line when it differs from the document's.
   * Unset lines take {@link SecretsDocument.eol}.
   */
  eol?: LineEnding | undefined
}

/** A line starting with `#`. Never parsed further. @public */
export interface CommentLine extends LineBase {
  kind: 'comment'
}

/** A line holding only whitespace. @public */
export interface BlankLine extends LineBase {
  kind: 'blank'
}

/**
 * The line naming the environment variable that holds the master key,
 * e.g. `MASTER_KEY_ENV = "APP_KEY"`.
 * @public
 */
export interface KeyDeclarationLine extends LineBase {
  kind: 'key-declaration'
  name: string
  envName: string
}

/** `NAME = "value"`, the value possibly empty. @public */
export interface SecretPlainLine extends LineBase {
  kind: 'secret-plain'
  name: string
  value: string
  /** Text of a trailing `#` comment, without the `#`. */
  comment?: string | undefined
}

/**
 * `NAME_ENCRYPTED = "<ciphertext>"    #<metadata>`. `name` is the base name,
 * without the `_ENCRYPTED` suffix.
 * @public
 */
export interface SecretEncryptedLine extends LineBase {
  kind: 'secret-encrypted'
  name: string
  ciphertext: string
  metadata?: SecretMetadata | undefined
}

/**
 * Anything the classifier could not place. Kept verbatim; `issue` is set when
 * the line looked like a secret but failed validation.
 * @public
 */
export interface UnrecognizedLine extends LineBase {
  kind: 'unrecognized'
  issue?: string | undefined
  /**
   * Base name of a `NAME_ENCRYPTED` line whose metadata could not be read.
   * The secret still counts as encrypted.
   */
  encryptedName?: string | undefined
}

/** @public */
export type FileLine =
  | CommentLine
  | BlankLine
  | KeyDeclarationLine
  | SecretPlainLine
  | SecretEncryptedLine
  | UnrecognizedLine

/** @public */
export type FileLineKind = FileLine['kind']

/**
 * Role of a secret line within its record:
 * - `plain`: `NAME = "value"` with no encrypted counterpart
 * - `encrypted-placeholder`: `NAME = ""` kept beside an encrypted counterpart
 * - `encrypted`: the `NAME_ENCRYPTED` line itself
 * @public
 */
export type SecretState = 'plain' | 'encrypted-placeholder' | 'encrypted'

/**
 * One secret, seen across its pair of lines.
 * @public
 */
export type SecretRecord =
  | {
      state: 'plain'
      name: string
      value: string
    }
  | {
      state: 'encrypted'
      name: string
      ciphertext: string
      metadata: SecretMetadata | undefined
      /** Whether the `NAME = ""` companion line is present. */
      placeholder: boolean
    }

/** Options shared by everything that classifies lines. @public */
export interface ClassifyOptions {
  /** Reserved name of the key declaration. Defaults to `MASTER_KEY_ENV`. */
  keyDeclarationName?: string | undefined
}

/**
 * A parsed secrets file: its lines plus what is needed to write it back
 * byte-for-byte.
 * @public
 */
export interface SecretsDocument {
  lines: FileLine[]
  /** Terminator of the first line (`\n` for a single unterminated line). */
  eol: LineEnding
  /** Whether the source ended with a terminator. */
  finalNewline: boolean
}
