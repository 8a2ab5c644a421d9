/**
 * Pre-configured SecretsFile for consumer tests.
 */

import { SecretsFile, defaultConfig, generateKey } from 'secretfile'
import { InMemoryEnv } from './in-memory-env.js'
import { InMemoryStore } from './in-memory-store.js'

/**
 * Options for creating a {@link TestSecretsFile}.
 * @public
 */
export interface TestSecretsFileOptions {
  /** Initial file content. Defaults to a fresh file declaring `keyEnvName`. */
  content?: string | undefined
  /** Name of the key variable. Defaults to `TEST_MASTER_KEY`. */
  keyEnvName?: string | undefined
  /** Clock for metadata timestamps. */
  now?: (() => Date) | undefined
}

const DEFAULT_KEY_ENV_NAME = 'TEST_MASTER_KEY'

/**
 * A secrets file held entirely in memory.
 *
 * @remarks
 * `TestSecretsFile` wraps a real `SecretsFile` over an {@link InMemoryStore},
 * with a freshly generated key placed in an {@link InMemoryEnv} under
 * `keyEnvName`. It uses the real cipher, so what round-trips here
 * round-trips on disk.
 *
 * @example
 * ```ts
 * const test = await TestSecretsFile.create()
 * await test.secrets.set('DB_PASSWORD', 'test-password')
 * await test.secrets.encryptAll()
 * ```
 *
 * @public
 */
export class TestSecretsFile {
  /** The underlying SecretsFile instance. */
  readonly secrets: SecretsFile

  /** The in-memory store holding the file content. */
  readonly store: InMemoryStore

  /** The in-memory environment holding the key. */
  readonly env: InMemoryEnv

  /** Name of the variable holding the key. */
  readonly keyEnvName: string

  private constructor(
    secrets: SecretsFile,
    store: InMemoryStore,
    env: InMemoryEnv,
    keyEnvName: string,
  ) {
    this.secrets = secrets
    this.store = store
    this.env = env
    this.keyEnvName = keyEnvName
  }

  /**
   * Create a new TestSecretsFile, ready for use.
   * @public
   */
  static async create(options?: TestSecretsFileOptions): Promise<TestSecretsFile> {
    const keyEnvName = options?.keyEnvName ?? DEFAULT_KEY_ENV_NAME
    const env = new InMemoryEnv({ [keyEnvName]: generateKey() })
    const store = new InMemoryStore(options?.content)
    const fileOptions = {
      store,
      env,
      config: defaultConfig(),
      now: options?.now,
    }

    const secrets =
      options?.content === undefined
        ? await SecretsFile.create(keyEnvName, fileOptions)
        : await SecretsFile.open(fileOptions)

    return new TestSecretsFile(secrets, store, env, keyEnvName)
  }

  /**
   * Replace the key with a freshly generated one, e.g. to simulate a wrong key.
   * @public
   */
  rotateKey(): void {
    this.env.set(this.keyEnvName, generateKey())
  }
}
