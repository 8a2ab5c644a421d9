/**
 * In-memory secrets store for testing.
 */

import { ConfigError } from 'secretfile'
import type { SecretsStore } from 'secretfile'

/**
 * A `SecretsStore` over a string held in memory.
 *
 * @remarks
 * An unset store behaves like a missing file: `read` rejects with the same
 * `ConfigError` the file store throws. Every write is counted so tests can
 * assert that an operation left the file alone.
 *
 * @public
 */
export class InMemoryStore implements SecretsStore {
  readonly location: string
  #content: string | undefined
  #writes = 0

  constructor(content?: string, location = 'memory://secrets') {
    this.#content = content
    this.location = location
  }

  /** @public */
  read(): Promise<string> {
    if (this.#content === undefined) {
      return Promise.reject(
        new ConfigError(`Secrets file not found: ${this.location}`, this.location),
      )
    }
    return Promise.resolve(this.#content)
  }

  /** @public */
  write(content: string): Promise<void> {
    this.#content = content
    this.#writes++
    return Promise.resolve()
  }

  /** @public */
  exists(): Promise<boolean> {
    return Promise.resolve(this.#content !== undefined)
  }

  /**
   * Current content, or `undefined` when nothing was ever written.
   * @public
   */
  get content(): string | undefined {
    return this.#content
  }

  /**
   * Replace the content without counting a write, e.g. to simulate a hand edit.
   * @public
   */
  set content(next: string | undefined) {
    this.#content = next
  }

  /**
   * Number of writes since creation.
   * @public
   */
  get writes(): number {
    return this.#writes
  }
}
