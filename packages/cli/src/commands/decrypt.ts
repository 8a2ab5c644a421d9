import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function decryptCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...FILE_OPTIONS,
      'skip-verify': { type: 'boolean', default: false },
    },
    strict: true,
  })

  try {
    const secrets = await openSecretsFile(values)
    const outcome = await secrets.decryptAll({ skipVerify: values['skip-verify'] })
    for (const name of outcome.decrypted) {
      process.stdout.write(`Decrypted ${name}.\n`)
    }
    process.stdout.write(`Done. ${String(outcome.count)} secrets decrypted.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
