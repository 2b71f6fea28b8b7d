import { describe, it, expect } from 'vitest'
import { isEmptyRaw, normalizeKey, parseDecimal, parseInteger } from './valueParse'

describe('valueParse', () => {
  describe('parseInteger', () => {
    it('accepts signed digit strings with surrounding whitespace', () => {
      expect(parseInteger('42')).toBe(42)
      expect(parseInteger(' -7 ')).toBe(-7)
      expect(parseInteger('+3')).toBe(3)
    })

    it('rejects decimal and non-numeric strings', () => {
      expect(parseInteger('15.5')).toBeUndefined()
      expect(parseInteger('1e3')).toBeUndefined()
      expect(parseInteger('abc')).toBeUndefined()
      expect(parseInteger('')).toBeUndefined()
    })

    it('truncates finite numbers toward zero', () => {
      expect(parseInteger(15.5)).toBe(15)
      expect(parseInteger(-15.5)).toBe(-15)
      expect(Object.is(parseInteger(-0.5), 0)).toBe(true)
    })

    it('rejects non-finite numbers and other types', () => {
      expect(parseInteger(Number.NaN)).toBeUndefined()
      expect(parseInteger(Number.POSITIVE_INFINITY)).toBeUndefined()
      expect(parseInteger(null)).toBeUndefined()
      expect(parseInteger(true)).toBeUndefined()
    })

    it('rejects values outside the safe integer range', () => {
      expect(parseInteger('9007199254740991')).toBe(9007199254740991)
      expect(parseInteger('9007199254740993')).toBeUndefined()
      expect(parseInteger('-9007199254740993')).toBeUndefined()
      expect(parseInteger(2 ** 53)).toBeUndefined()
      expect(parseInteger(1e300)).toBeUndefined()
    })

    it('returns 0 for negative zero strings', () => {
      expect(Object.is(parseInteger('-0'), 0)).toBe(true)
      expect(Object.is(parseInteger(' -00 '), 0)).toBe(true)
    })
  })

  describe('parseDecimal', () => {
    it('accepts plain, fractional and exponent forms', () => {
      expect(parseDecimal('2.5')).toBe(2.5)
      expect(parseDecimal('.5')).toBe(0.5)
      expect(parseDecimal('-1e3')).toBe(-1000)
      expect(parseDecimal(' 10 ')).toBe(10)
    })

    it('rejects words, NaN and overflow', () => {
      expect(parseDecimal('abc')).toBeUndefined()
      expect(parseDecimal('NaN')).toBeUndefined()
      expect(parseDecimal('Infinity')).toBeUndefined()
      expect(parseDecimal('1e400')).toBeUndefined()
      expect(parseDecimal(Number.NaN)).toBeUndefined()
    })
  })

  it('treats the empty string, null and undefined as empty', () => {
    expect(isEmptyRaw('')).toBe(true)
    expect(isEmptyRaw('   ')).toBe(false)
    expect(isEmptyRaw(null)).toBe(true)
    expect(isEmptyRaw(undefined)).toBe(true)
    expect(isEmptyRaw(0)).toBe(false)
    expect(isEmptyRaw('x')).toBe(false)
  })

  it('normalizes keys by trimming and lower-casing', () => {
    expect(normalizeKey('  Q1 ')).toBe('q1')
  })
})
