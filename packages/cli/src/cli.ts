/**
 * Subcommand dispatch for the secretfile CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import(), so only the requested
 * command's module is loaded.
 *
 * argv layout: [subcommand, ...commandArgs], i.e. process.argv without the
 * node binary and script path.
 */

const HELP =
  'Usage: secretfile <command> [options]\n\n' +
  'Commands:\n' +
  '  init       Create a secrets file (--key-env <ENV>)\n' +
  '  list       List declared names\n' +
  '  encrypt    Encrypt every plaintext secret\n' +
  '  decrypt    Decrypt every encrypted secret (--skip-verify to ignore signatures)\n' +
  '  delete     Delete a secret (--name <NAME>)\n' +
  '  set        Set a secret read from stdin (--name <NAME>)\n' +
  '  set-key    Change the key environment variable (--env <ENV>)\n' +
  '  convert    Re-encrypt under another key (--to <ENV> [--from <ENV>])\n' +
  '  check      Verify signatures and report malformed lines\n' +
  '  keygen     Print a new random key\n\n' +
  'Options for file commands:\n' +
  '  -f, --file <path>    Secrets file (default: from secretfile.json, else project_secrets.py)\n' +
  '  -c, --config <dir>   Directory holding secretfile.json (default: working directory)\n'

function printHelp(): void {
  process.stdout.write(HELP)
}

/**
 * Run one CLI invocation.
 * @returns the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const [subcommand, ...commandArgs] = argv

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'init': {
      const { initCommand } = await import('./commands/init.js')
      return initCommand(commandArgs)
    }
    case 'list': {
      const { listCommand } = await import('./commands/list.js')
      return listCommand(commandArgs)
    }
    case 'encrypt': {
      const { encryptCommand } = await import('./commands/encrypt.js')
      return encryptCommand(commandArgs)
    }
    case 'decrypt': {
      const { decryptCommand } = await import('./commands/decrypt.js')
      return decryptCommand(commandArgs)
    }
    case 'delete': {
      const { deleteCommand } = await import('./commands/delete.js')
      return deleteCommand(commandArgs)
    }
    case 'set': {
      const { setCommand } = await import('./commands/set.js')
      return setCommand(commandArgs)
    }
    case 'set-key': {
      const { setKeyCommand } = await import('./commands/set-key.js')
      return setKeyCommand(commandArgs)
    }
    case 'convert': {
      const { convertCommand } = await import('./commands/convert.js')
      return convertCommand(commandArgs)
    }
    case 'check': {
      const { checkCommand } = await import('./commands/check.js')
      return checkCommand(commandArgs)
    }
    case 'keygen': {
      const { keygenCommand } = await import('./commands/keygen.js')
      return keygenCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}
