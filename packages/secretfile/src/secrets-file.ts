/**
 * SecretsFile wires the store, the classifier, the cipher and the
 * transformations into one read-transform-write cycle per operation.
 */

import * as path from 'node:path'
import { JweCipher } from './cipher/adapter.js'
import type { SecretCipher } from './cipher/adapter.js'
import { loadConfig } from './config.js'
import { processEnv, resolveKey } from './env.js'
import type { EnvLookup } from './env.js'
import { ConfigError } from './errors.js'
import { collectRecords, findKeyDeclaration, parseDocument, renderDocument } from './line/document.js'
import { isIdentifier } from './line/metadata.js'
import type { FileLine, SecretRecord, SecretsDocument } from './line/types.js'
import { FileSecretsStore } from './store/file-store.js'
import type { SecretsStore } from './store/types.js'
import { checkSecrets } from './transform/check.js'
import type { CheckReport } from './transform/check.js'
import { convertKey } from './transform/convert.js'
import { decryptAll } from './transform/decrypt.js'
import { deleteSecret } from './transform/delete.js'
import { encryptAll } from './transform/encrypt.js'
import { initialContent } from './transform/header.js'
import { listSecrets } from './transform/list.js'
import type { ListEntry } from './transform/list.js'
import { setKeyDeclaration } from './transform/set-key.js'
import { setSecret } from './transform/set-secret.js'
import type { SecretfileConfig } from './types.js'

/** Options for opening a secrets file. */
export interface SecretsFileOptions {
  /** Path of the secrets file. Defaults to the config's `file`, relative to `configDir`. */
  file?: string | undefined
  /** Directory holding secretfile.json. Defaults to the working directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: SecretfileConfig | undefined
  /** Supply the store directly, ignoring `file`. */
  store?: SecretsStore | undefined
  /** Where master keys are looked up. Defaults to `process.env`. */
  env?: EnvLookup | undefined
  cipher?: SecretCipher | undefined
  /** Clock for metadata timestamps. */
  now?: (() => Date) | undefined
}

/** Result of {@link SecretsFile.encryptAll}. */
export interface EncryptOutcome {
  count: number
  encrypted: string[]
  skipped: string[]
  /** Names left in plaintext because their encrypted line is damaged. */
  damaged: string[]
}

/** Options for {@link SecretsFile.decryptAll}. */
export interface DecryptOptions {
  /** Decrypt entries even when their signature does not verify. */
  skipVerify?: boolean | undefined
}

/** Result of {@link SecretsFile.decryptAll}. */
export interface DecryptOutcome {
  count: number
  decrypted: string[]
}

/** Options for {@link SecretsFile.convertKey}. */
export interface ConvertOptions {
  /** Variable holding the current key. Defaults to the file's key declaration. */
  fromEnvName?: string | undefined
}

/** Result of {@link SecretsFile.convertKey}. */
export interface ConvertOutcome {
  count: number
  converted: string[]
}

interface Loaded {
  text: string
  document: SecretsDocument
}

/**
 * One secrets file on disk (or behind any {@link SecretsStore}).
 *
 * @remarks
 * Each operation reads the whole file, computes the new line sequence and
 * writes it back only when the content changed. Every failure is thrown
 * before the write, so the file is either fully rewritten or untouched.
 * Nothing is cached between operations.
 */
export class SecretsFile {
  readonly #config: SecretfileConfig
  readonly #store: SecretsStore
  readonly #env: EnvLookup
  readonly #cipher: SecretCipher
  readonly #now: () => Date

  private constructor(
    config: SecretfileConfig,
    store: SecretsStore,
    env: EnvLookup,
    cipher: SecretCipher,
    now: () => Date,
  ) {
    this.#config = config
    this.#store = store
    this.#env = env
    this.#cipher = cipher
    this.#now = now
  }

  /**
   * Resolve config and collaborators. The secrets file itself is not read
   * until an operation runs.
   */
  static async open(options?: SecretsFileOptions): Promise<SecretsFile> {
    const configDir = options?.configDir ?? process.cwd()
    const config = options?.config ?? (await loadConfig(configDir))
    const store =
      options?.store ??
      new FileSecretsStore(options?.file ?? path.resolve(configDir, config.file))
    return new SecretsFile(
      config,
      store,
      options?.env ?? processEnv(),
      options?.cipher ?? new JweCipher(),
      options?.now ?? (() => new Date()),
    )
  }

  /**
   * Create a new secrets file with the standard header and a key
   * declaration naming `keyEnvName`.
   *
   * @throws ConfigError if the file already exists or the name is invalid
   */
  static async create(keyEnvName: string, options?: SecretsFileOptions): Promise<SecretsFile> {
    if (!isIdentifier(keyEnvName)) {
      throw new ConfigError(`"${keyEnvName}" is not a valid environment variable name`)
    }
    const secretsFile = await SecretsFile.open(options)
    const store = secretsFile.#store
    if (await store.exists()) {
      throw new ConfigError(`Secrets file already exists: ${store.location}`, store.location)
    }
    await store.write(
      initialContent(secretsFile.#config.keyDeclarationName, keyEnvName).join('\n'),
    )
    return secretsFile
  }

  /** Where the secrets file lives. */
  get location(): string {
    return this.#store.location
  }

  /** Effective configuration. */
  get config(): SecretfileConfig {
    return this.#config
  }

  /** Names of the key declaration and every secret line, in file order. */
  async list(): Promise<ListEntry[]> {
    const { document } = await this.#load()
    return listSecrets(document.lines)
  }

  /** One record per secret. */
  async records(): Promise<SecretRecord[]> {
    const { document } = await this.#load()
    return collectRecords(document.lines)
  }

  /**
   * The environment variable named by the key declaration.
   *
   * @throws ConfigError if the file has no key declaration
   */
  async keyEnvName(): Promise<string> {
    const { document } = await this.#load()
    return this.#declaredKeyEnvName(document.lines)
  }

  /**
   * Encrypt every unencrypted, non-empty secret under the declared key.
   *
   * @throws ConfigError if the file has no key declaration
   * @throws KeyResolutionError if the key variable is unset or empty
   * @throws CryptoError if the key is malformed
   */
  async encryptAll(): Promise<EncryptOutcome> {
    const loaded = await this.#load()
    const keyEnvName = this.#declaredKeyEnvName(loaded.document.lines)
    const key = resolveKey(this.#env, keyEnvName)
    const result = await encryptAll(loaded.document.lines, {
      cipher: this.#cipher,
      key,
      keyEnvName,
      now: this.#now,
    })
    await this.#commit(loaded, result.lines)
    return {
      count: result.count,
      encrypted: result.encrypted,
      skipped: result.skipped,
      damaged: result.damaged,
    }
  }

  /**
   * Decrypt every encrypted secret under the declared key.
   *
   * @throws ConfigError if the file has no key declaration
   * @throws KeyResolutionError if the key variable is unset or empty
   * @throws SignatureMismatchError if an entry fails verification
   * @throws CryptoError if an entry cannot be decrypted
   */
  async decryptAll(options?: DecryptOptions): Promise<DecryptOutcome> {
    const loaded = await this.#load()
    const keyEnvName = this.#declaredKeyEnvName(loaded.document.lines)
    const key = resolveKey(this.#env, keyEnvName)
    const result = await decryptAll(loaded.document.lines, {
      cipher: this.#cipher,
      key,
      skipVerify: options?.skipVerify,
    })
    await this.#commit(loaded, result.lines)
    return { count: result.count, decrypted: result.decrypted }
  }

  /**
   * Remove a secret and its encrypted counterpart.
   * @returns the number of lines removed
   */
  async delete(name: string): Promise<number> {
    const loaded = await this.#load()
    const result = deleteSecret(loaded.document.lines, name)
    await this.#commit(loaded, result.lines)
    return result.removed
  }

  /**
   * Point the key declaration at `envName`.
   * @returns `false` if the file has no key declaration; nothing is written then
   */
  async setKeyDeclaration(envName: string): Promise<boolean> {
    const loaded = await this.#load()
    const result = setKeyDeclaration(loaded.document.lines, envName)
    await this.#commit(loaded, result.lines)
    return result.updated
  }

  /**
   * Add a secret or replace its value. The value is stored as plaintext
   * until the next {@link SecretsFile.encryptAll}.
   * @returns `true` if the secret is new
   */
  async set(name: string, value: string): Promise<boolean> {
    const loaded = await this.#load()
    const result = setSecret(loaded.document.lines, name, value, this.#config.keyDeclarationName)
    await this.#commit(loaded, result.lines)
    return result.created
  }

  /**
   * Re-encrypt every encrypted secret under the key held in `toEnvName`, and
   * point the key declaration at it.
   *
   * @throws KeyResolutionError if either key variable is unset or empty
   * @throws SignatureMismatchError if an entry fails verification
   * @throws CryptoError if an entry does not decrypt under the current key
   */
  async convertKey(toEnvName: string, options?: ConvertOptions): Promise<ConvertOutcome> {
    if (!isIdentifier(toEnvName)) {
      throw new ConfigError(`"${toEnvName}" is not a valid environment variable name`)
    }
    const loaded = await this.#load()
    const fromEnvName =
      options?.fromEnvName ?? this.#declaredKeyEnvName(loaded.document.lines)
    const oldKey = resolveKey(this.#env, fromEnvName)
    const newKey = resolveKey(this.#env, toEnvName)
    const result = await convertKey(loaded.document.lines, {
      cipher: this.#cipher,
      oldKey,
      newKey,
      newKeyEnvName: toEnvName,
      now: this.#now,
    })
    await this.#commit(loaded, result.lines)
    return { count: result.count, converted: result.converted }
  }

  /** Verify signatures and report format issues without decrypting. */
  async check(): Promise<CheckReport> {
    const { document } = await this.#load()
    return checkSecrets(document.lines)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #load(): Promise<Loaded> {
    const text = await this.#store.read()
    const document = parseDocument(text, {
      keyDeclarationName: this.#config.keyDeclarationName,
    })
    return { text, document }
  }

  async #commit(loaded: Loaded, lines: FileLine[]): Promise<void> {
    const next = renderDocument({ ...loaded.document, lines })
    if (next !== loaded.text) {
      await this.#store.write(next)
    }
  }

  #declaredKeyEnvName(lines: readonly FileLine[]): string {
    const declaration = findKeyDeclaration(lines)
    if (declaration === undefined) {
      throw new ConfigError(
        `No ${this.#config.keyDeclarationName} declaration found in ${this.#store.location}`,
        this.#store.location,
      )
    }
    return declaration.envName
  }
}
