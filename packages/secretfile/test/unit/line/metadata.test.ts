import { describe, it, expect } from 'vitest'
import {
  parseMetadata,
  formatMetadata,
  formatTimestamp,
  isIdentifier,
} from '../../../src/line/metadata.js'
import { FormatError } from '../../../src/errors.js'

describe('formatTimestamp', () => {
  it('formats local time as YYYY-MM-DD HH:MM:SS', () => {
    expect(formatTimestamp(new Date(2024, 5, 18, 10, 30, 0))).toBe('2024-06-18 10:30:00')
  })

  it('zero-pads single-digit fields', () => {
    expect(formatTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('2025-01-02 03:04:05')
  })
})

describe('parseMetadata', () => {
  it('parses the three fields', () => {
    expect(parseMetadata('APP_KEY,GvNKAaA=,2024-06-18 10:30:00')).toEqual({
      keyEnvName: 'APP_KEY',
      signature: 'GvNKAaA=',
      timestamp: '2024-06-18 10:30:00',
    })
  })

  it('rejects a non-identifier env name', () => {
    expect(() => parseMetadata('APP-KEY,GvNKAaA=,2024-06-18 10:30:00')).toThrow(FormatError)
  })

  it('rejects a signature of the wrong length', () => {
    expect(() => parseMetadata('APP_KEY,GvNKAaA,2024-06-18 10:30:00')).toThrow(
      'Metadata signature must be 8 base64 characters: "GvNKAaA"',
    )
  })

  it('rejects extra fields', () => {
    expect(() => parseMetadata('APP_KEY,GvNKAaA=,2024-06-18 10:30:00,extra')).toThrow(
      'Metadata must have 3 comma-separated fields, found 4',
    )
  })
})

describe('formatMetadata', () => {
  it('joins fields with commas and no spaces', () => {
    expect(
      formatMetadata({
        keyEnvName: 'APP_KEY',
        signature: 'GvNKAaA=',
        timestamp: '2024-06-18 10:30:00',
      }),
    ).toBe('APP_KEY,GvNKAaA=,2024-06-18 10:30:00')
  })
})

describe('isIdentifier', () => {
  it.each(['FOO', '_private', 'a1_b2'])('accepts %s', (name) => {
    expect(isIdentifier(name)).toBe(true)
  })

  it.each(['', '1ABC', 'with-dash', 'with space'])('rejects "%s"', (name) => {
    expect(isIdentifier(name)).toBe(false)
  })
})
