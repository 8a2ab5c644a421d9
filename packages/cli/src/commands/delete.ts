import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function deleteCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...FILE_OPTIONS,
      name: { type: 'string' },
    },
    strict: true,
  })

  if (values.name === undefined) {
    process.stderr.write('Error: --name is required\n')
    process.stderr.write('Usage: secretfile delete --name <name>\n')
    return 1
  }

  try {
    const secrets = await openSecretsFile(values)
    const removed = await secrets.delete(values.name)
    if (removed === 0) {
      process.stderr.write(`Secret "${values.name}" not found in ${secrets.location}\n`)
      return 1
    }
    process.stdout.write(`Secret "${values.name}" deleted.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
