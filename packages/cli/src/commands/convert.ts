import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function convertCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...FILE_OPTIONS,
      to: { type: 'string' },
      from: { type: 'string' },
    },
    strict: true,
  })

  if (values.to === undefined) {
    process.stderr.write('Error: --to is required\n')
    process.stderr.write('Usage: secretfile convert --to <ENV> [--from <ENV>]\n')
    return 1
  }

  try {
    const secrets = await openSecretsFile(values)
    const outcome = await secrets.convertKey(values.to, { fromEnvName: values.from })
    for (const name of outcome.converted) {
      process.stdout.write(`Re-encrypted ${name}.\n`)
    }
    process.stdout.write(
      `Done. ${String(outcome.count)} secrets converted to the key in ${values.to}.\n`,
    )
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
