/**
 * Store barrel export.
 */

export { FileSecretsStore } from './file-store.js'
export type { SecretsStore } from './types.js'
