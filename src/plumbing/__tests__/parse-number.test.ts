import { describe, expect, it } from 'vitest'
import { parseNumber } from '../parse-number.ts'

describe('parseNumber', () => {
  it('should parse numeric strings', () => {
    expect(parseNumber('600', 1)).toBe(600)
    expect(parseNumber('1.5', 1)).toBe(1.5)
    expect(parseNumber(' 120 ', 1)).toBe(120)
  })

  it('should fall back for missing or invalid values', () => {
    expect(parseNumber(undefined, 600)).toBe(600)
    expect(parseNumber('', 600)).toBe(600)
    expect(parseNumber('   ', 600)).toBe(600)
    expect(parseNumber('soon', 600)).toBe(600)
    expect(parseNumber('Infinity', 600)).toBe(600)
  })
})
