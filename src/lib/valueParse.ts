/**
 * Strict numeric parsing shared by numeric fields, category codes and bound configuration.
 * Parsers return undefined when the input is not a number of the requested kind; callers decide
 * whether that is an absent answer or an error.
 */

const INTEGER_TOKEN = /^[+-]?\d+$/
const DECIMAL_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** '', null and undefined count as "no answer"; a blank string is a value */
export function isEmptyRaw(value: unknown): boolean {
  return value === null || value === undefined || value === ''
}

/**
 * Integer strings must be a plain signed digit run ("15.5" is rejected),
 * while finite numbers are truncated toward zero (15.5 -> 15).
 * Results outside the safe integer range are rejected.
 */
export function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined
    return toSafeInteger(Math.trunc(value))
  }
  if (typeof value !== 'string') return undefined
  const s = value.trim()
  if (!INTEGER_TOKEN.test(s)) return undefined
  return toSafeInteger(Number.parseInt(s, 10))
}

function toSafeInteger(n: number): number | undefined {
  if (!Number.isSafeInteger(n)) return undefined
  // -0 from "-0" or Math.trunc(-0.5)
  return n || 0
}

export function parseDecimal(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (typeof value !== 'string') return undefined
  const s = value.trim()
  if (!DECIMAL_TOKEN.test(s)) return undefined
  const n = Number(s)
  return Number.isFinite(n) ? n : undefined
}

/** Lower-cased, trimmed form used for case-insensitive name and label comparisons */
export function normalizeKey(value: string): string {
  return value.trim().toLowerCase()
}
