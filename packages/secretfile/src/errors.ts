/**
 * Error hierarchy for secretfile.
 *
 * @packageDocumentation
 */

/** Base error for all secretfile errors. */
export class SecretfileError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SecretfileError'
  }
}

// --- Configuration Failures ---

/**
 * Thrown when configuration is missing or invalid: the config record fails
 * validation, the secrets file has no key declaration, or the secrets file
 * cannot be found or read.
 */
export class ConfigError extends SecretfileError {
  /**
   * The file the problem was found in, when there is one.
   */
  readonly path: string | undefined

  constructor(message: string, filePath?: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = filePath
  }
}

/**
 * Thrown when the environment variable named by the key declaration is unset
 * or empty, so no master key is available.
 */
export class KeyResolutionError extends SecretfileError {
  /**
   * Name of the environment variable that was looked up.
   */
  readonly envName: string

  constructor(message: string, envName: string) {
    super(message)
    this.name = 'KeyResolutionError'
    this.envName = envName
  }
}

// --- Cryptographic Failures ---

/**
 * Thrown when a key is not a validly-formed 256-bit key, or when a ciphertext
 * cannot be decrypted (wrong key, corrupted or malformed input).
 */
export class CryptoError extends SecretfileError {
  /**
   * The secret being processed when the failure happened, if known.
   */
  readonly secret: string | undefined

  constructor(message: string, secret?: string) {
    super(message)
    this.name = 'CryptoError'
    this.secret = secret
  }
}

/**
 * Thrown when the signature stored next to an encrypted secret does not match
 * the one recomputed from its ciphertext, timestamp and key env name. The
 * entry was edited by hand or corrupted and is not decrypted.
 */
export class SignatureMismatchError extends SecretfileError {
  /** The secret whose signature failed. */
  readonly secret: string

  /** Signature recomputed from the stored fields. */
  readonly expected: string

  /**
   * Signature found in the file, or `undefined` when the entry carries no
   * metadata at all.
   */
  readonly actual: string | undefined

  constructor(message: string, secret: string, expected: string, actual: string | undefined) {
    super(message)
    this.name = 'SignatureMismatchError'
    this.secret = secret
    this.expected = expected
    this.actual = actual
  }
}

// --- Format Failures ---

/**
 * Raised while classifying a line that looks like a secret but fails deeper
 * validation, such as a malformed metadata comment. The classifier catches it
 * and keeps the line verbatim as unrecognized.
 */
export class FormatError extends SecretfileError {
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

/**
 * Thrown when the same secret is declared more than once in a file.
 */
export class DuplicateSecretError extends SecretfileError {
  /** The name declared more than once. */
  readonly secret: string

  constructor(message: string, secret: string) {
    super(message)
    this.name = 'DuplicateSecretError'
    this.secret = secret
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when the rewritten secrets file cannot be persisted.
 */
export class FilesystemError extends SecretfileError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The permission level that was required but not available
   * (e.g. `'read'`, `'write'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string) {
    super(message)
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}
