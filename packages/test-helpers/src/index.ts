/**
 * @secretfile/test-helpers: test utilities for secretfile consumers.
 *
 * @packageDocumentation
 */

export { InMemoryStore } from './in-memory-store.js'
export { InMemoryEnv } from './in-memory-env.js'
export { TestSecretsFile } from './test-secrets-file.js'
export type { TestSecretsFileOptions } from './test-secrets-file.js'
