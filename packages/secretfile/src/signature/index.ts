/**
 * Signature engine barrel export.
 */

export { sign, verify, verifyRecord, assertSignature } from './engine.js'
