/**
 * Environment lookup backed by a Map.
 */

import type { EnvLookup } from 'secretfile'

/**
 * An `EnvLookup` that never touches `process.env`.
 * @public
 */
export class InMemoryEnv implements EnvLookup {
  readonly #values: Map<string, string>

  constructor(values: Record<string, string> = {}) {
    this.#values = new Map(Object.entries(values))
  }

  /** @public */
  get(name: string): string | undefined {
    return this.#values.get(name)
  }

  /** @public */
  set(name: string, value: string): void {
    this.#values.set(name, value)
  }

  /** @public */
  unset(name: string): void {
    this.#values.delete(name)
  }
}
