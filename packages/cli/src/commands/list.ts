import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: FILE_OPTIONS, strict: true })

  try {
    const secrets = await openSecretsFile(values)
    for (const entry of await secrets.list()) {
      process.stdout.write(`${entry.name}\n`)
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
