import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function setKeyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...FILE_OPTIONS,
      env: { type: 'string' },
    },
    strict: true,
  })

  if (values.env === undefined) {
    process.stderr.write('Error: --env is required\n')
    process.stderr.write('Usage: secretfile set-key --env <ENV>\n')
    return 1
  }

  try {
    const secrets = await openSecretsFile(values)
    const updated = await secrets.setKeyDeclaration(values.env)
    if (!updated) {
      process.stderr.write(
        `No ${secrets.config.keyDeclarationName} declaration found in ${secrets.location}\n`,
      )
      return 1
    }
    process.stdout.write(`Key declaration now reads ${values.env}.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
