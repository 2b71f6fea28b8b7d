/**
 * Category store for categorical fields: integer code -> label, with sorted codes.
 * A store is immutable; categorical fields swap the whole store when categories are replaced.
 */

import type { Category, CategoryInput, LabelMatch, ValueLabel } from '../types'
import { CategoryCodeError, DuplicateCategoryError } from './errors'
import { normalizeKey, parseInteger } from './valueParse'

type CategoryPair = readonly [string | number, string]

function isPairIterable(input: CategoryInput): input is Iterable<CategoryPair> | readonly ValueLabel[] {
  return typeof input === 'object' && input !== null && Symbol.iterator in input
}

function isValueLabel(entry: ValueLabel | CategoryPair): entry is ValueLabel {
  return !Array.isArray(entry)
}

function toPairs(input: CategoryInput): CategoryPair[] {
  if (!isPairIterable(input)) return Object.entries(input)
  const pairs: CategoryPair[] = []
  for (const entry of input) {
    pairs.push(isValueLabel(entry) ? [entry.code, entry.label] : entry)
  }
  return pairs
}

function toCode(raw: string | number, owner: string): number {
  const code = parseInteger(raw)
  if (code === undefined) throw new CategoryCodeError(`Invalid value for category code: ${String(raw)} (${owner})`)
  return code
}

export class CategoryStore {
  readonly codes: readonly number[]
  private readonly byCode: ReadonlyMap<number, string>

  private constructor(byCode: Map<number, string>) {
    this.byCode = byCode
    this.codes = [...byCode.keys()].sort((a, b) => a - b)
  }

  /**
   * Validate and build a store. Codes must parse as integers and be distinct;
   * labels must be distinct once trimmed and lower-cased.
   */
  static from(input: CategoryInput, owner = 'categories'): CategoryStore {
    const byCode = new Map<number, string>()
    const codeByLabel = new Map<string, number>()
    for (const [rawCode, rawLabel] of toPairs(input)) {
      const code = toCode(rawCode, owner)
      if (byCode.has(code)) throw new CategoryCodeError(`Category code ${code} is given more than once (${owner})`)
      const label = rawLabel.trim()
      const key = normalizeKey(label)
      const clash = codeByLabel.get(key)
      if (clash !== undefined) {
        throw new DuplicateCategoryError(`Category "${label}" (code ${code}) duplicates label of code ${clash} (${owner})`)
      }
      byCode.set(code, label)
      codeByLabel.set(key, code)
    }
    return new CategoryStore(byCode)
  }

  get size(): number {
    return this.byCode.size
  }

  has(code: number): boolean {
    return this.byCode.has(code)
  }

  labelOf(code: number): string | undefined {
    return this.byCode.get(code)
  }

  toMap(): Map<number, string> {
    return new Map(this.byCode)
  }

  /** Categories in ascending code order */
  entries(): Category[] {
    return this.codes.map((code) => ({ code, label: this.byCode.get(code) ?? '' }))
  }

  /**
   * Categories of `other` that share a label with this store, as [ownCode, otherCode, label]
   * in ascending own-code order. When `other` repeats a label the last code wins.
   */
  intersect(other: CategoryInput): LabelMatch[] {
    const otherCodeByLabel = new Map<string, number>()
    for (const [rawCode, label] of toPairs(other)) {
      otherCodeByLabel.set(normalizeKey(label), toCode(rawCode, 'other categories'))
    }
    const matches: LabelMatch[] = []
    for (const { code, label } of this.entries()) {
      const otherCode = otherCodeByLabel.get(normalizeKey(label))
      if (otherCode !== undefined) matches.push([code, otherCode, label])
    }
    return matches
  }
}
