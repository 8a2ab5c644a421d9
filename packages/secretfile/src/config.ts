/**
 * Configuration loading, validation, and defaults for secretfile.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ConfigError } from './errors.js'
import { DEFAULT_KEY_DECLARATION_NAME } from './line/classifier.js'
import { isIdentifier } from './line/metadata.js'
import type { SecretfileConfig } from './types.js'

/** Name of the config file looked up in the config directory. */
export const CONFIG_FILENAME = 'secretfile.json'

/** Secrets file managed when neither the config nor the caller names one. */
export const DEFAULT_SECRETS_FILE = 'project_secrets.py'

/** Default configuration when no config file exists. */
export function defaultConfig(): SecretfileConfig {
  return {
    version: 1,
    file: DEFAULT_SECRETS_FILE,
    keyDeclarationName: DEFAULT_KEY_DECLARATION_NAME,
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate an unknown value as a SecretfileConfig, throwing on invalid
 * structure. Missing optional fields take their defaults.
 */
export function validateConfig(config: unknown, configPath?: string): SecretfileConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object', configPath)
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1', configPath)
  }

  const result = defaultConfig()

  if (config.file !== undefined) {
    if (typeof config.file !== 'string' || config.file.trim() === '') {
      throw new ConfigError('Config file must be a non-empty string', configPath)
    }
    result.file = config.file
  }

  if (config.keyDeclarationName !== undefined) {
    if (
      typeof config.keyDeclarationName !== 'string' ||
      !isIdentifier(config.keyDeclarationName)
    ) {
      throw new ConfigError('Config keyDeclarationName must be a valid identifier', configPath)
    }
    result.keyDeclarationName = config.keyDeclarationName
  }

  return result
}

/**
 * Load the secretfile config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing secretfile.json. Defaults to the working directory.
 */
export async function loadConfig(configDir?: string): Promise<SecretfileConfig> {
  const dir = configDir ?? process.cwd()
  const configPath = path.join(dir, CONFIG_FILENAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return defaultConfig()
    }
    throw new ConfigError(`Failed to read config file at ${configPath}`, configPath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath)
  }

  return validateConfig(parsed, configPath)
}
