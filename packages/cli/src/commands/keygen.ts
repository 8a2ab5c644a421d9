import { parseArgs } from 'node:util'
import { generateKey } from 'secretfile'

export function keygenCommand(args: string[]): Promise<number> {
  parseArgs({ args, options: {}, strict: true })
  process.stdout.write(`${generateKey()}\n`)
  return Promise.resolve(0)
}
