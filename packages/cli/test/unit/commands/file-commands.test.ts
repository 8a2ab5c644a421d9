import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { Readable } from 'node:stream'
import { generateKey, HEADER_DISCLAIMER } from 'secretfile'
import { initCommand } from '../../../src/commands/init.js'
import { listCommand } from '../../../src/commands/list.js'
import { deleteCommand } from '../../../src/commands/delete.js'
import { setCommand } from '../../../src/commands/set.js'
import { setKeyCommand } from '../../../src/commands/set-key.js'
import { convertCommand } from '../../../src/commands/convert.js'
import { encryptCommand } from '../../../src/commands/encrypt.js'
import { decryptCommand } from '../../../src/commands/decrypt.js'
import { checkCommand } from '../../../src/commands/check.js'

const OLD_KEY_ENV = 'SECRETFILE_CLI_OLD_KEY'
const NEW_KEY_ENV = 'SECRETFILE_CLI_NEW_KEY'

describe('file commands', () => {
  let tmpDir: string
  let filePath: string
  let fileArgs: string[]
  let stdoutOutput: string
  let stderrOutput: string

  function resetOutput(): void {
    stdoutOutput = ''
    stderrOutput = ''
  }

  async function writeSecrets(...rows: string[]): Promise<void> {
    await fs.writeFile(filePath, rows.map((row) => `${row}\n`).join(''))
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'secretfile-cli-test-'))
    filePath = path.join(tmpDir, 'secrets.py')
    fileArgs = ['--file', filePath, '--config', tmpDir]

    resetOutput()
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
    Object.defineProperty(process.stdout, 'isTTY', { value: false, configurable: true })
  })

  afterEach(async () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true })
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    await fs.rm(tmpDir, { recursive: true, force: true })
  })

  describe('init', () => {
    it('should require --key-env', async () => {
      expect(await initCommand(fileArgs)).toBe(1)
      expect(stderrOutput).toContain('--key-env is required')
      expect(stderrOutput).toContain('Usage:')
    })

    it('should create the file with a key declaration', async () => {
      const code = await initCommand([...fileArgs, '--key-env', OLD_KEY_ENV])
      expect(code).toBe(0)
      expect(stdoutOutput).toBe(`Created ${filePath} with the key read from ${OLD_KEY_ENV}.\n`)
      const content = await fs.readFile(filePath, 'utf8')
      expect(content.startsWith(`${HEADER_DISCLAIMER}\n`)).toBe(true)
      expect(content.endsWith(`\nMASTER_KEY_ENV = "${OLD_KEY_ENV}"\n`)).toBe(true)
    })

    it('should refuse to overwrite an existing file', async () => {
      await writeSecrets('FOO = "bar"')
      expect(await initCommand([...fileArgs, '--key-env', OLD_KEY_ENV])).toBe(1)
      expect(stderrOutput).toBe(`ConfigError: Secrets file already exists: ${filePath}\n`)
    })

    it('should use the file named in secretfile.json', async () => {
      await fs.writeFile(
        path.join(tmpDir, 'secretfile.json'),
        JSON.stringify({ version: 1, file: 'configured.py' }),
      )
      expect(await initCommand(['--config', tmpDir, '--key-env', OLD_KEY_ENV])).toBe(0)
      await expect(fs.access(path.join(tmpDir, 'configured.py'))).resolves.toBeUndefined()
    })
  })

  describe('list', () => {
    it('should print every declared name', async () => {
      await writeSecrets(
        '# comment',
        `MASTER_KEY_ENV = "${OLD_KEY_ENV}"`,
        'FOO = ""',
        'FOO_ENCRYPTED = "abc"',
        'BAR = "plain"',
      )
      expect(await listCommand(fileArgs)).toBe(0)
      expect(stdoutOutput).toBe('MASTER_KEY_ENV\nFOO\nFOO_ENCRYPTED\nBAR\n')
    })
  })

  describe('delete', () => {
    it('should require --name', async () => {
      expect(await deleteCommand(fileArgs)).toBe(1)
      expect(stderrOutput).toContain('--name is required')
    })

    it('should delete a secret', async () => {
      await writeSecrets(`MASTER_KEY_ENV = "${OLD_KEY_ENV}"`, 'FOO = "bar"', 'BAR = "baz"')
      expect(await deleteCommand([...fileArgs, '--name', 'FOO'])).toBe(0)
      expect(stdoutOutput).toBe('Secret "FOO" deleted.\n')
      await expect(fs.readFile(filePath, 'utf8')).resolves.toBe(
        `${HEADER_DISCLAIMER}\nMASTER_KEY_ENV = "${OLD_KEY_ENV}"\nBAR = "baz"\n`,
      )
    })

    it('should return 1 for an unknown name', async () => {
      await writeSecrets('FOO = "bar"')
      expect(await deleteCommand([...fileArgs, '--name', 'NOPE'])).toBe(1)
      expect(stderrOutput).toBe(`Secret "NOPE" not found in ${filePath}\n`)
    })
  })

  describe('set', () => {
    it('should require --name', async () => {
      expect(await setCommand(fileArgs, Readable.from(['value']))).toBe(1)
      expect(stderrOutput).toContain('--name is required')
    })

    it('should reject empty input', async () => {
      await writeSecrets('FOO = "bar"')
      expect(await setCommand([...fileArgs, '--name', 'FOO'], Readable.from(['\n']))).toBe(1)
      expect(stderrOutput).toBe('Error: No secret provided on stdin\n')
    })

    it('should add a secret read from the input', async () => {
      await writeSecrets(`MASTER_KEY_ENV = "${OLD_KEY_ENV}"`)
      const code = await setCommand(
        [...fileArgs, '--name', 'API_TOKEN'],
        Readable.from(['test-token\n']),
      )
      expect(code).toBe(0)
      expect(stdoutOutput).toBe(
        'Secret "API_TOKEN" added.\nRun `secretfile encrypt` to encrypt it.\n',
      )
      await expect(fs.readFile(filePath, 'utf8')).resolves.toBe(
        `${HEADER_DISCLAIMER}\nMASTER_KEY_ENV = "${OLD_KEY_ENV}"\nAPI_TOKEN = "test-token"\n`,
      )
    })

    it('should report an existing secret as updated', async () => {
      await writeSecrets('API_TOKEN = "old"')
      await setCommand([...fileArgs, '--name', 'API_TOKEN'], Readable.from(['new']))
      expect(stdoutOutput).toContain('Secret "API_TOKEN" updated.')
    })

    it('should reject an invalid name', async () => {
      await writeSecrets('FOO = "bar"')
      expect(await setCommand([...fileArgs, '--name', 'BAD-NAME'], Readable.from(['v']))).toBe(1)
      expect(stderrOutput).toBe('ConfigError: "BAD-NAME" is not a valid secret name\n')
    })
  })

  describe('set-key', () => {
    it('should rewrite the key declaration', async () => {
      await writeSecrets(`MASTER_KEY_ENV = "${OLD_KEY_ENV}"`)
      expect(await setKeyCommand([...fileArgs, '--env', NEW_KEY_ENV])).toBe(0)
      expect(stdoutOutput).toBe(`Key declaration now reads ${NEW_KEY_ENV}.\n`)
      await expect(fs.readFile(filePath, 'utf8')).resolves.toBe(
        `MASTER_KEY_ENV = "${NEW_KEY_ENV}"\n`,
      )
    })

    it('should return 1 when the file has no declaration', async () => {
      await writeSecrets('FOO = "bar"')
      expect(await setKeyCommand([...fileArgs, '--env', NEW_KEY_ENV])).toBe(1)
      expect(stderrOutput).toBe(`No MASTER_KEY_ENV declaration found in ${filePath}\n`)
    })
  })

  describe('convert', () => {
    it('should require --to', async () => {
      expect(await convertCommand(fileArgs)).toBe(1)
      expect(stderrOutput).toContain('--to is required')
    })

    it('should re-encrypt so that only the new key decrypts', async () => {
      vi.stubEnv(OLD_KEY_ENV, generateKey())
      vi.stubEnv(NEW_KEY_ENV, generateKey())
      await writeSecrets(`MASTER_KEY_ENV = "${OLD_KEY_ENV}"`, 'FOO = "bar"')
      await encryptCommand(fileArgs)
      resetOutput()

      expect(await convertCommand([...fileArgs, '--to', NEW_KEY_ENV])).toBe(0)
      expect(stdoutOutput).toBe(
        `Re-encrypted FOO.\nDone. 1 secrets converted to the key in ${NEW_KEY_ENV}.\n`,
      )

      vi.stubEnv(OLD_KEY_ENV, generateKey())
      expect(await decryptCommand(fileArgs)).toBe(0)
      await expect(fs.readFile(filePath, 'utf8')).resolves.toBe(
        `${HEADER_DISCLAIMER}\nMASTER_KEY_ENV = "${NEW_KEY_ENV}"\nFOO = "bar"\n`,
      )
    })
  })

  describe('check', () => {
    it('should pass a freshly encrypted file', async () => {
      vi.stubEnv(OLD_KEY_ENV, generateKey())
      await writeSecrets(`MASTER_KEY_ENV = "${OLD_KEY_ENV}"`, 'FOO = "bar"')
      await encryptCommand(fileArgs)
      resetOutput()

      expect(await checkCommand(fileArgs)).toBe(0)
      expect(stdoutOutput).toBe(
        `Key variable: ${OLD_KEY_ENV}\n` +
          `  ok   FOO_ENCRYPTED ${OLD_KEY_ENV}\n` +
          'All checks passed.\n',
      )
    })

    it('should fail on unsigned entries and report line issues', async () => {
      await writeSecrets(
        'FOO_ENCRYPTED = "abc"',
        'BAR_ENCRYPTED = "abc"    #not metadata',
        'PLAIN = "visible"',
      )
      expect(await checkCommand(fileArgs)).toBe(1)
      expect(stdoutOutput).toBe(
        'Key variable: (not declared)\n' +
          '  FAIL FOO_ENCRYPTED\n' +
          '  line 2: BAR_ENCRYPTED: Metadata must have 3 comma-separated fields, found 1\n' +
          '  PLAIN holds a plaintext value\n' +
          'Check failed.\n',
      )
    })
  })
})
