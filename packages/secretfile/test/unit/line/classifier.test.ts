import { describe, it, expect } from 'vitest'
import {
  classifyLine,
  plainLine,
  encryptedLine,
  keyDeclarationLine,
} from '../../../src/line/classifier.js'
import { escapeValue, unescapeValue } from '../../../src/line/quote.js'

describe('classifyLine', () => {
  describe('blank and comment lines', () => {
    it('classifies an empty line as blank', () => {
      expect(classifyLine('')).toEqual({ kind: 'blank', raw: '' })
    })

    it('classifies a whitespace-only line as blank', () => {
      expect(classifyLine('   \t')).toEqual({ kind: 'blank', raw: '   \t' })
    })

    it('classifies a line starting with # as a comment', () => {
      expect(classifyLine('# FOO = "bar"')).toEqual({ kind: 'comment', raw: '# FOO = "bar"' })
    })

    it('classifies an indented # line as a comment', () => {
      expect(classifyLine('  # note').kind).toBe('comment')
    })
  })

  describe('encrypted secrets', () => {
    it('parses name, ciphertext and metadata', () => {
      const raw = 'API_TOKEN_ENCRYPTED = "abc.def"    #APP_KEY,GvNKAaA=,2024-06-18 10:30:00'
      expect(classifyLine(raw)).toEqual({
        kind: 'secret-encrypted',
        raw,
        name: 'API_TOKEN',
        ciphertext: 'abc.def',
        metadata: {
          keyEnvName: 'APP_KEY',
          signature: 'GvNKAaA=',
          timestamp: '2024-06-18 10:30:00',
        },
      })
    })

    it('tolerates spaces around metadata fields', () => {
      const line = classifyLine('X_ENCRYPTED = "c" # APP_KEY , GvNKAaA= , 2024-06-18 10:30:00')
      expect(line.kind).toBe('secret-encrypted')
      if (line.kind === 'secret-encrypted') {
        expect(line.metadata?.keyEnvName).toBe('APP_KEY')
        expect(line.metadata?.signature).toBe('GvNKAaA=')
      }
    })

    it('accepts an encrypted line without metadata', () => {
      const line = classifyLine('X_ENCRYPTED = "c"')
      expect(line).toEqual({
        kind: 'secret-encrypted',
        raw: 'X_ENCRYPTED = "c"',
        name: 'X',
        ciphertext: 'c',
        metadata: undefined,
      })
    })

    it('marks malformed metadata as unrecognized with an issue', () => {
      const raw = 'X_ENCRYPTED = "c"    #APP_KEY,short,2024-06-18 10:30:00'
      const line = classifyLine(raw)
      expect(line.kind).toBe('unrecognized')
      expect(line.raw).toBe(raw)
      if (line.kind === 'unrecognized') {
        expect(line.issue).toBe(
          'X_ENCRYPTED: Metadata signature must be 8 base64 characters: "short"',
        )
      }
    })

    it('marks metadata with the wrong field count as unrecognized', () => {
      const line = classifyLine('X_ENCRYPTED = "c"    #APP_KEY,GvNKAaA=')
      expect(line.kind).toBe('unrecognized')
      if (line.kind === 'unrecognized') {
        expect(line.issue).toBe('X_ENCRYPTED: Metadata must have 3 comma-separated fields, found 2')
      }
    })

    it('marks a bad timestamp as unrecognized', () => {
      const line = classifyLine('X_ENCRYPTED = "c"    #APP_KEY,GvNKAaA=,yesterday')
      expect(line.kind).toBe('unrecognized')
    })
  })

  describe('key declaration', () => {
    it('recognizes MASTER_KEY_ENV by default', () => {
      expect(classifyLine('MASTER_KEY_ENV = "APP_KEY"')).toEqual({
        kind: 'key-declaration',
        raw: 'MASTER_KEY_ENV = "APP_KEY"',
        name: 'MASTER_KEY_ENV',
        envName: 'APP_KEY',
      })
    })

    it('uses a configured declaration name', () => {
      expect(classifyLine('KEY_VAR = "K"', { keyDeclarationName: 'KEY_VAR' }).kind).toBe(
        'key-declaration',
      )
      expect(classifyLine('MASTER_KEY_ENV = "K"', { keyDeclarationName: 'KEY_VAR' }).kind).toBe(
        'secret-plain',
      )
    })
  })

  describe('plain secrets', () => {
    it('parses name and value', () => {
      expect(classifyLine('FOO = "bar"')).toEqual({
        kind: 'secret-plain',
        raw: 'FOO = "bar"',
        name: 'FOO',
        value: 'bar',
        comment: undefined,
      })
    })

    it('accepts an empty value', () => {
      const line = classifyLine('FOO = ""')
      expect(line.kind).toBe('secret-plain')
      if (line.kind === 'secret-plain') {
        expect(line.value).toBe('')
      }
    })

    it('accepts missing spaces around =', () => {
      expect(classifyLine('FOO="bar"').kind).toBe('secret-plain')
    })

    it('keeps a trailing comment', () => {
      const line = classifyLine('FOO = "bar"  # staging only')
      if (line.kind !== 'secret-plain') {
        throw new Error('expected secret-plain')
      }
      expect(line.comment).toBe(' staging only')
    })

    it('unescapes quoted characters', () => {
      const line = classifyLine('FOO = "say \\"hi\\"\\nbye"')
      if (line.kind !== 'secret-plain') {
        throw new Error('expected secret-plain')
      }
      expect(line.value).toBe('say "hi"\nbye')
    })

    it('rejects a bare _ENCRYPTED name', () => {
      expect(classifyLine('_ENCRYPTED = "c"')).toEqual({
        kind: 'unrecognized',
        raw: '_ENCRYPTED = "c"',
        issue: '_ENCRYPTED: reserved suffix _ENCRYPTED',
      })
    })

    it('leaves an encrypted line with trailing text unrecognized', () => {
      expect(classifyLine('X_ENCRYPTED = "c" trailing')).toEqual({
        kind: 'unrecognized',
        raw: 'X_ENCRYPTED = "c" trailing',
      })
    })
  })

  describe('unrecognized lines', () => {
    it.each([
      ['FOO = bar'],
      ["FOO = 'bar'"],
      ['9FOO = "bar"'],
      ['import os'],
      ['FOO = "unterminated'],
    ])('keeps %s verbatim', (raw) => {
      expect(classifyLine(raw)).toEqual({ kind: 'unrecognized', raw })
    })
  })
})

describe('line builders', () => {
  it('plainLine renders NAME = "value"', () => {
    expect(plainLine('FOO', 'bar').raw).toBe('FOO = "bar"')
  })

  it('plainLine re-attaches a comment', () => {
    expect(plainLine('FOO', '', ' staging only').raw).toBe('FOO = ""  # staging only')
  })

  it('plainLine escapes quotes and newlines', () => {
    expect(plainLine('FOO', 'a"b\nc').raw).toBe('FOO = "a\\"b\\nc"')
  })

  it('encryptedLine renders ciphertext and metadata', () => {
    const line = encryptedLine('FOO', 'abc.def', {
      keyEnvName: 'APP_KEY',
      signature: 'GvNKAaA=',
      timestamp: '2024-06-18 10:30:00',
    })
    expect(line.raw).toBe(
      'FOO_ENCRYPTED = "abc.def"    #APP_KEY,GvNKAaA=,2024-06-18 10:30:00',
    )
  })

  it('keyDeclarationLine renders the declaration', () => {
    expect(keyDeclarationLine('MASTER_KEY_ENV', 'NEW_KEY').raw).toBe('MASTER_KEY_ENV = "NEW_KEY"')
  })

  it('builders produce lines that classify back to themselves', () => {
    const built = [
      plainLine('FOO', 'multi\nline "quoted" \\ value\t!'),
      encryptedLine('FOO', 'abc.def', {
        keyEnvName: 'APP_KEY',
        signature: 'GvNKAaA=',
        timestamp: '2024-06-18 10:30:00',
      }),
      keyDeclarationLine('MASTER_KEY_ENV', 'APP_KEY'),
    ]
    for (const line of built) {
      expect(classifyLine(line.raw)).toEqual(line)
    }
  })
})

describe('escapeValue / unescapeValue', () => {
  it('escapes backslashes before quotes', () => {
    expect(escapeValue('\\"')).toBe('\\\\\\"')
  })

  it('keeps unknown escapes as written', () => {
    expect(unescapeValue("\\'")).toBe("\\'")
    expect(unescapeValue('C:\\data\\app')).toBe('C:\\data\\app')
  })

  it('leaves a backslash alone unless it would start an escape', () => {
    expect(escapeValue('C:\\data\\app')).toBe('C:\\data\\app')
    expect(escapeValue('C:\\new')).toBe('C:\\\\new')
    expect(escapeValue('trailing\\')).toBe('trailing\\\\')
  })

  it.each(['C:\\data\\app', 'a\\\\b', 'C:\\new', 'x\\\ny', 'end\\'])(
    'reads back %j after escaping',
    (value) => {
      expect(unescapeValue(escapeValue(value))).toBe(value)
    },
  )
})
