/**
 * Environment-style key lookup.
 */

import { KeyResolutionError } from './errors.js'

/**
 * Read-only lookup of named values, e.g. environment variables.
 * @public
 */
export interface EnvLookup {
  get(name: string): string | undefined
}

/**
 * {@link EnvLookup} over `process.env`, read at call time.
 * @public
 */
export function processEnv(): EnvLookup {
  return {
    get: (name) => process.env[name],
  }
}

/**
 * Resolve the master key held in the environment variable `envName`.
 *
 * @throws KeyResolutionError if the name is empty or the variable is unset or empty
 * @public
 */
export function resolveKey(env: EnvLookup, envName: string): string {
  if (envName === '') {
    throw new KeyResolutionError(
      'No key environment variable is declared; set one with `secretfile set-key --env <NAME>`',
      envName,
    )
  }
  const key = env.get(envName)
  if (key === undefined || key === '') {
    throw new KeyResolutionError(
      `${envName} is not set. Set the key value in the variable first`,
      envName,
    )
  }
  return key
}
