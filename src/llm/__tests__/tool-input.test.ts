import { describe, it, expect } from 'vitest'
import { parseToolInput } from '../tool-input.js'

describe('parseToolInput', () => {
  it('parses JSON arguments', () => {
    expect(parseToolInput('{"query":"leave","limit":3}')).toStrictEqual({ query: 'leave', limit: 3 })
  })

  it('treats empty arguments as an empty object', () => {
    expect(parseToolInput('  ')).toStrictEqual({})
  })

  it('passes malformed arguments through as text', () => {
    expect(parseToolInput('{"query": ')).toBe('{"query": ')
  })
})
