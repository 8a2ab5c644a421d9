import { parseArgs } from 'node:util'
import { SecretsFile } from 'secretfile'
import { formatError } from '../output.js'
import { FILE_OPTIONS } from '../options.js'

export async function initCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...FILE_OPTIONS,
      'key-env': { type: 'string' },
    },
    strict: true,
  })

  const keyEnv = values['key-env']
  if (keyEnv === undefined) {
    process.stderr.write('Error: --key-env is required\n')
    process.stderr.write('Usage: secretfile init --key-env <ENV> [--file <path>]\n')
    return 1
  }

  try {
    const secrets = await SecretsFile.create(keyEnv, {
      file: values.file,
      configDir: values.config,
    })
    process.stdout.write(`Created ${secrets.location} with the key read from ${keyEnv}.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
