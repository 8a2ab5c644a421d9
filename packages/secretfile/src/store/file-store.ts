/**
 * Filesystem-backed secrets store.
 *
 * @remarks
 * Writes go to a temp file beside the target, which is then renamed over it.
 * rename() is atomic on POSIX filesystems, so a crash mid-write leaves the
 * previous content in place rather than a truncated file.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ConfigError, FilesystemError } from '../errors.js'
import type { SecretsStore } from './types.js'

const DEFAULT_MODE = 0o600

function errorCode(err: unknown): unknown {
  return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined
}

/**
 * A {@link SecretsStore} over a single file on disk.
 * @public
 */
export class FileSecretsStore implements SecretsStore {
  readonly location: string

  constructor(filePath: string) {
    this.location = path.resolve(filePath)
  }

  async read(): Promise<string> {
    try {
      return await fs.readFile(this.location, 'utf8')
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new ConfigError(`Secrets file not found: ${this.location}`, this.location)
      }
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Cannot read secrets file ${this.location}: ${message}`, this.location)
    }
  }

  async write(content: string): Promise<void> {
    const mode = await this.#currentMode()
    const tmpPath = path.join(
      path.dirname(this.location),
      `.${path.basename(this.location)}.${crypto.randomUUID()}.tmp`,
    )
    try {
      await fs.writeFile(tmpPath, content, { encoding: 'utf8', mode })
      await fs.rename(tmpPath, this.location)
    } catch (err) {
      await fs.rm(tmpPath, { force: true })
      const message = err instanceof Error ? err.message : String(err)
      throw new FilesystemError(
        `Failed to write secrets file ${this.location}: ${message}`,
        this.location,
        'write',
      )
    }
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.location)
      return true
    } catch {
      return false
    }
  }

  /** Keep the permissions of an existing file; new files are owner-only. */
  async #currentMode(): Promise<number> {
    try {
      const stat = await fs.stat(this.location)
      return stat.mode & 0o777
    } catch {
      return DEFAULT_MODE
    }
  }
}
