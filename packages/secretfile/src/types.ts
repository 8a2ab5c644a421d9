/**
 * Shared configuration types for secretfile.
 *
 * @packageDocumentation
 */

/**
 * Project configuration, read from `secretfile.json`.
 * @public
 */
export interface SecretfileConfig {
  /** Config schema version. Must be 1. */
  version: 1
  /** Secrets file to manage, relative to the config directory. */
  file: string
  /** Reserved name of the key declaration line inside the secrets file. */
  keyDeclarationName: string
}
