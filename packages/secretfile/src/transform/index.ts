/**
 * File transformer barrel export. Every transformation is a function from
 * the current lines to the next; none of them touches the filesystem.
 */

export { listSecrets } from './list.js'
export type { ListEntry } from './list.js'
export { encryptAll } from './encrypt.js'
export type { EncryptContext, EncryptResult } from './encrypt.js'
export { decryptAll } from './decrypt.js'
export type { DecryptContext, DecryptResult } from './decrypt.js'
export { deleteSecret } from './delete.js'
export type { DeleteResult } from './delete.js'
export { setKeyDeclaration } from './set-key.js'
export type { SetKeyResult } from './set-key.js'
export { convertKey } from './convert.js'
export type { ConvertContext, ConvertResult } from './convert.js'
export { setSecret } from './set-secret.js'
export type { SetSecretResult } from './set-secret.js'
export { checkSecrets } from './check.js'
export type { CheckReport, SignatureCheck, LineIssue } from './check.js'
export { HEADER_DISCLAIMER, ensureHeader, initialContent } from './header.js'
export { stampSecret } from './stamp.js'
export type { StampContext } from './stamp.js'
