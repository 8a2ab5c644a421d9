/**
 * Cipher adapter barrel export.
 */

export { JweCipher, generateKey, decodeKey } from './adapter.js'
export type { SecretCipher } from './adapter.js'
