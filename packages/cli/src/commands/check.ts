import { parseArgs } from 'node:util'
import { bold, dim, formatError } from '../output.js'
import { FILE_OPTIONS, openSecretsFile } from '../options.js'

export async function checkCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: FILE_OPTIONS, strict: true })

  try {
    const secrets = await openSecretsFile(values)
    const report = await secrets.check()

    process.stdout.write(`${bold('Key variable:')} ${report.keyEnvName ?? '(not declared)'}\n`)
    for (const signature of report.signatures) {
      const status = signature.valid ? 'ok  ' : 'FAIL'
      const origin = signature.keyEnvName !== undefined ? ` ${dim(signature.keyEnvName)}` : ''
      process.stdout.write(`  ${status} ${signature.name}_ENCRYPTED${origin}\n`)
    }
    for (const issue of report.issues) {
      process.stdout.write(`  line ${String(issue.line)}: ${issue.message}\n`)
    }
    for (const name of report.plaintext) {
      process.stdout.write(`  ${name} holds a plaintext value\n`)
    }
    process.stdout.write(report.ok ? 'All checks passed.\n' : 'Check failed.\n')
    return report.ok ? 0 : 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
