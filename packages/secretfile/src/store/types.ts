/**
 * Storage abstraction for the secrets file content.
 */

/**
 * Whole-content access to one secrets file.
 *
 * @remarks
 * Implementations read and write the complete content in one call; there is
 * no partial or streaming access. Concurrent writers are not coordinated.
 *
 * @public
 */
export interface SecretsStore {
  /** Human-readable location, used in messages. */
  readonly location: string

  /**
   * Read the full content.
   * @throws ConfigError if the content does not exist or cannot be read
   */
  read(): Promise<string>

  /**
   * Replace the full content.
   * @throws FilesystemError if the content cannot be persisted
   */
  write(content: string): Promise<void>

  /** Whether there is content to read. */
  exists(): Promise<boolean>
}
