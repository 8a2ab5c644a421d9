/**
 * secretfile: named configuration values kept in a human-editable text
 * file, each encrypted under a master key and signed for provenance.
 *
 * @packageDocumentation
 */

export {
  SecretfileError,
  ConfigError,
  KeyResolutionError,
  CryptoError,
  SignatureMismatchError,
  FormatError,
  DuplicateSecretError,
  FilesystemError,
} from './errors.js'

export type { SecretfileConfig } from './types.js'
export {
  loadConfig,
  validateConfig,
  defaultConfig,
  CONFIG_FILENAME,
  DEFAULT_SECRETS_FILE,
} from './config.js'

export { processEnv, resolveKey } from './env.js'
export type { EnvLookup } from './env.js'

export {
  classifyLine,
  commentLine,
  plainLine,
  encryptedLine,
  keyDeclarationLine,
  parseDocument,
  renderDocument,
  indexSecrets,
  findDuplicates,
  findKeyDeclaration,
  collectRecords,
  parseMetadata,
  formatMetadata,
  formatTimestamp,
  isIdentifier,
  escapeValue,
  unescapeValue,
  DEFAULT_KEY_DECLARATION_NAME,
  ENCRYPTED_SUFFIX,
  SIGNATURE_LENGTH,
} from './line/index.js'
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
  SecretIndex,
} from './line/index.js'

export { JweCipher, generateKey } from './cipher/index.js'
export type { SecretCipher } from './cipher/index.js'

export { sign, verify, verifyRecord, assertSignature } from './signature/index.js'

export {
  listSecrets,
  encryptAll,
  decryptAll,
  deleteSecret,
  setKeyDeclaration,
  convertKey,
  setSecret,
  checkSecrets,
  HEADER_DISCLAIMER,
} from './transform/index.js'
export type {
  ListEntry,
  EncryptContext,
  EncryptResult,
  DecryptContext,
  DecryptResult,
  DeleteResult,
  SetKeyResult,
  ConvertContext,
  ConvertResult,
  SetSecretResult,
  CheckReport,
  SignatureCheck,
  LineIssue,
} from './transform/index.js'

export { FileSecretsStore } from './store/index.js'
export type { SecretsStore } from './store/index.js'

export { SecretsFile } from './secrets-file.js'
export type {
  SecretsFileOptions,
  EncryptOutcome,
  DecryptOptions,
  DecryptOutcome,
  ConvertOptions,
  ConvertOutcome,
} from './secrets-file.js'
