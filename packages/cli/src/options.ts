/**
 * Options shared by every command that works on a secrets file.
 *
 * @internal
 */

import { SecretsFile } from 'secretfile'

/** `parseArgs` option config for `--file` and `--config`. */
export const FILE_OPTIONS = {
  file: { type: 'string', short: 'f' },
  config: { type: 'string', short: 'c' },
} as const

/** Parsed values of {@link FILE_OPTIONS}. */
export interface FileOptionValues {
  file?: string | undefined
  config?: string | undefined
}

/** Open the secrets file selected by `--file` and `--config`. */
export function openSecretsFile(values: FileOptionValues): Promise<SecretsFile> {
  return SecretsFile.open({ file: values.file, configDir: values.config })
}
