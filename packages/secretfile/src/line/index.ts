/**
 * Line classification barrel export.
 */

export {
  classifyLine,
  commentLine,
  plainLine,
  encryptedLine,
  keyDeclarationLine,
  DEFAULT_KEY_DECLARATION_NAME,
  ENCRYPTED_SUFFIX,
} from './classifier.js'
export {
  parseDocument,
  renderDocument,
  indexSecrets,
  findDuplicates,
  findKeyDeclaration,
  collectRecords,
} from './document.js'
export type { SecretIndex } from './document.js'
export {
  parseMetadata,
  formatMetadata,
  formatTimestamp,
  isIdentifier,
  SIGNATURE_LENGTH,
} from './metadata.js'
export { escapeValue, unescapeValue, quote } from './quote.js'
export type {
  SecretMetadata,
  CommentLine,
  BlankLine,
  KeyDeclarationLine,
  SecretPlainLine,
  SecretEncryptedLine,
  UnrecognizedLine,
  FileLine,
  FileLineKind,
  SecretState,
  SecretRecord,
  ClassifyOptions,
  SecretsDocument,
  LineEnding,
} from './types.js'
