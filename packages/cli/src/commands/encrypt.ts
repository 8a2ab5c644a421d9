import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function encryptCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: FILE_OPTIONS, strict: true })

  try {
    const secrets = await openSecretsFile(values)
    process.stdout.write('Encrypting secrets ...\n')
    process.stdout.write('NOTE: Empty values are not encrypted.\n')
    const outcome = await secrets.encryptAll()

    for (const name of outcome.encrypted) {
      process.stdout.write(
        `Encrypted ${name}. Original unencrypted value has been removed from the file.\n`,
      )
    }
    for (const name of outcome.skipped) {
      process.stdout.write(
        `Skipping ${name}: already encrypted in the file. ` +
          'To re-encrypt it, delete its _ENCRYPTED line and run encrypt again.\n',
      )
    }
    for (const name of outcome.damaged) {
      process.stdout.write(
        `Skipping ${name}: its _ENCRYPTED line has malformed metadata. ` +
          'Run check, then fix or delete that line.\n',
      )
    }
    process.stdout.write(`Done. ${String(outcome.count)} secrets encrypted.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
