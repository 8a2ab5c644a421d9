import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

async function readInput(input: AsyncIterable<unknown>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of input) {
    if (chunk instanceof Buffer) {
      chunks.push(chunk)
    } else if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk))
    } else {
      chunks.push(Buffer.from(String(chunk)))
    }
  }
  return Buffer.concat(chunks).toString('utf8').trimEnd()
}

/**
 * @param input - where the value is read from; stdin unless a test supplies one
 */
export async function setCommand(
  args: string[],
  input: AsyncIterable<unknown> = process.stdin,
): Promise<number> {
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
    process.stderr.write('Usage: echo "secret" | secretfile set --name <name>\n')
    return 1
  }

  try {
    const value = await readInput(input)
    if (value.length === 0) {
      process.stderr.write('Error: No secret provided on stdin\n')
      return 1
    }

    const secrets = await openSecretsFile(values)
    const created = await secrets.set(values.name, value)
    process.stdout.write(`Secret "${values.name}" ${created ? 'added' : 'updated'}.\n`)
    process.stdout.write('Run `secretfile encrypt` to encrypt it.\n')
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
