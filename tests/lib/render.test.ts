/**
 * Tests for the secret renderer
 */

import { describe, it, expect } from 'vitest'
import {
  renderSecret,
  decodeUtf8,
  plainFormatter,
  UNDECODABLE_PLACEHOLDER
} from '../../src/lib/render.js'
import type { SecretFormatter, SecretRecord } from '../../src/types.js'

const encoder = new TextEncoder()

function secret(name: string, data: Record<string, Uint8Array | string>): SecretRecord {
  const bytes: Record<string, Uint8Array> = {}
  for (const [key, value] of Object.entries(data)) {
    bytes[key] = typeof value === 'string' ? encoder.encode(value) : value
  }
  return { name, type: 'Opaque', data: bytes }
}

const INVALID_UTF8 = new Uint8Array([0xff, 0xfe, 0x41])

describe('decodeUtf8', () => {
  it('should decode valid UTF-8', () => {
    expect(decodeUtf8(encoder.encode('abc123'))).toBe('abc123')
    expect(decodeUtf8(encoder.encode('senha-çãé-🔑'))).toBe('senha-çãé-🔑')
  })

  it('should decode an empty value', () => {
    expect(decodeUtf8(new Uint8Array())).toBe('')
  })

  it('should return undefined for invalid UTF-8', () => {
    expect(decodeUtf8(INVALID_UTF8)).toBeUndefined()
  })

  it('should return undefined for a truncated multi-byte sequence', () => {
    expect(decodeUtf8(new Uint8Array([0x61, 0xe2, 0x82]))).toBeUndefined()
  })

  it('should keep a leading byte order mark', () => {
    expect(decodeUtf8(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]))).toBe('\uFEFFa')
  })
})

describe('renderSecret', () => {
  it('should render header, one line per key and a blank separator', () => {
    const rendered = renderSecret(secret('api-token', { value: 'abc123' }))
    expect(rendered.lines).toEqual(['api-token:', '  value: abc123', ''])
    expect(rendered.entries).toBe(1)
  })

  it('should print the data keys in sorted order', () => {
    const rendered = renderSecret(secret('db', { username: 'admin', password: 'test-secret', host: 'db.local' }))
    expect(rendered.lines).toEqual([
      'db:',
      '  host: db.local',
      '  password: test-secret',
      '  username: admin',
      ''
    ])
    expect(rendered.entries).toBe(3)
  })

  it('should sort integer-like keys as text', () => {
    const rendered = renderSecret(secret('s', { a: 'z', '9': 'y', '10': 'x' }))
    expect(rendered.lines).toEqual(['s:', '  10: x', '  9: y', '  a: z', ''])
  })

  it('should sort uppercase keys before lowercase ones', () => {
    const rendered = renderSecret(secret('s', { b: '2', B: '1', a: '3' }))
    expect(rendered.lines).toEqual(['s:', '  B: 1', '  a: 3', '  b: 2', ''])
  })

  it('should render the header and separator for a secret without data', () => {
    const rendered = renderSecret(secret('empty', {}))
    expect(rendered.lines).toEqual(['empty:', ''])
    expect(rendered.entries).toBe(0)
  })

  it('should put the placeholder on the undecodable key only', () => {
    const rendered = renderSecret(secret('mixed', { first: 'ok', binary: INVALID_UTF8, last: 'also-ok' }))
    expect(rendered.lines).toEqual([
      'mixed:',
      `  binary: ${UNDECODABLE_PLACEHOLDER}`,
      '  first: ok',
      '  last: also-ok',
      ''
    ])
    expect(rendered.entries).toBe(3)
  })

  it('should use the literal placeholder text', () => {
    expect(UNDECODABLE_PLACEHOLDER).toBe('<unable to decode UTF-8>')
  })

  it('should print multi-line values as they are', () => {
    const rendered = renderSecret(secret('config', { 'app.conf': 'a=1\nb=2' }))
    expect(rendered.lines[1]).toBe('  app.conf: a=1\nb=2')
  })

  it('should style the name and keys but never the value', () => {
    const brackets: SecretFormatter = {
      name: text => `[${text}]`,
      key: text => `<${text}>`
    }
    const rendered = renderSecret(secret('api-token', { value: 'abc123' }), brackets)
    expect(rendered.lines).toEqual(['[api-token]:', '  <value>: abc123', ''])
  })

  it('should leave text untouched with the plain formatter', () => {
    expect(plainFormatter.name('api-token')).toBe('api-token')
    expect(plainFormatter.key('value')).toBe('value')
  })

  it('should not modify the secret', () => {
    const record = secret('api-token', { value: 'abc123' })
    const before = Object.keys(record.data)
    renderSecret(record)
    expect(Object.keys(record.data)).toEqual(before)
    expect(decodeUtf8(record.data.value)).toBe('abc123')
  })
})
