/**
 * Survey fields: typed variable definitions that coerce raw answers into canonical values,
 * reject invalid input and render values for display.
 * Types: IntegerField, FloatField, StringField, SingleField, MultipleField.
 */

import type { Category, CategoryInput, FieldKind, LabelMatch, NumericBounds, RawValue } from '../types'
import { CategoryStore } from './categories'
import { CategoryCodeError, DuplicateCategoryError, FieldConfigurationError, ValidationError } from './errors'
import { isEmptyRaw, normalizeKey, parseDecimal, parseInteger } from './valueParse'

export type ReplaceCategoriesResult = { ok: true } | { ok: false; error: CategoryCodeError | DuplicateCategoryError }

export abstract class Field<TInput, TValue, TDisplay = TValue> {
  abstract readonly kind: FieldKind
  readonly name: string
  /** Lookup key: trimmed, lower-cased name */
  readonly key: string
  readonly title: string

  constructor(name: string, title = '') {
    this.name = name.trim()
    if (!this.name) throw new FieldConfigurationError('Field name must not be empty')
    this.key = normalizeKey(name)
    this.title = title.trim()
  }

  /**
   * Convert a raw input into the field's canonical value, or null when no answer was given.
   * Throws ValidationError when the input can't be converted or breaks a constraint.
   */
  abstract coerce(raw: TInput): TValue | null

  /** Readable form of a value. Plain fields show values as they are. */
  format(raw: TInput): TInput | TDisplay | null {
    return raw
  }

  toString(): string {
    return `${this.name}. ${this.title}`
  }

  describe(): string {
    return `${this.name}. ${this.title} of type ${this.kind}`
  }
}

type NumberParser = (value: unknown) => number | undefined

abstract class NumericField extends Field<RawValue, number> {
  abstract readonly kind: 'integer' | 'float'
  readonly min: number | null
  readonly max: number | null
  private readonly parse: NumberParser

  protected constructor(name: string, title: string, bounds: NumericBounds, parse: NumberParser) {
    super(name, title)
    this.parse = parse
    this.min = this.toBound('min', bounds.min)
    this.max = this.toBound('max', bounds.max)
    if (this.min !== null && this.max !== null && this.min > this.max) {
      throw new FieldConfigurationError(`Field ${this.name}: min ${this.min} is greater than max ${this.max}`)
    }
  }

  private toBound(which: 'min' | 'max', raw: number | string | null | undefined): number | null {
    if (raw === null || raw === undefined) return null
    const bound = this.parse(raw)
    if (bound === undefined) throw new FieldConfigurationError(`Field ${this.name}: invalid ${which} bound ${String(raw)}`)
    return bound
  }

  coerce(raw: RawValue): number | null {
    const value = this.parse(raw)
    if (value === undefined) {
      if (isEmptyRaw(raw)) return null
      throw new ValidationError(`Invalid input ${String(raw)} for field ${this.describe()}`)
    }
    if (this.min !== null && value < this.min) {
      throw new ValidationError(`Provided value ${value} is less than allowed minimum ${this.min} for field ${this.describe()}`)
    }
    if (this.max !== null && value > this.max) {
      throw new ValidationError(`Provided value ${value} is bigger than allowed maximum ${this.max} for field ${this.describe()}`)
    }
    return value
  }
}

export class IntegerField extends NumericField {
  readonly kind = 'integer'

  constructor(name: string, title = '', bounds: NumericBounds = {}) {
    super(name, title, bounds, parseInteger)
  }
}

export class FloatField extends NumericField {
  readonly kind = 'float'

  constructor(name: string, title = '', bounds: NumericBounds = {}) {
    super(name, title, bounds, parseDecimal)
  }
}

export class StringField extends Field<RawValue, string> {
  readonly kind = 'string'

  coerce(raw: RawValue): string {
    // 0 is falsy input too
    if (isEmptyRaw(raw) || raw === 0) return ''
    return String(raw)
  }
}

/** Shared category handling for Single and Multiple fields */
abstract class CategoricalField<TInput, TValue, TDisplay> extends Field<TInput, TValue, TDisplay> {
  private store: CategoryStore

  constructor(name: string, title: string, categories: CategoryInput) {
    super(name, title)
    // kind is not initialised yet, so messages name the field only
    this.store = CategoryStore.from(categories, `field ${this.name}`)
  }

  /** Valid codes in ascending order */
  get codes(): readonly number[] {
    return this.store.codes
  }

  getCategories(): Map<number, string> {
    return this.store.toMap()
  }

  /** Categories sorted by code, for display */
  printCategories(): Category[] {
    return this.store.entries()
  }

  labelOf(code: number): string | undefined {
    return this.store.labelOf(code)
  }

  /** Swap in a new set of categories; on failure the current ones stay untouched */
  replaceCategories(categories: CategoryInput): ReplaceCategoriesResult {
    try {
      this.store = CategoryStore.from(categories, this.describe())
      return { ok: true }
    } catch (error) {
      if (error instanceof CategoryCodeError || error instanceof DuplicateCategoryError) return { ok: false, error }
      throw error
    }
  }

  intersectLabels(other: CategoryInput | CategoricalField<unknown, unknown, unknown>): LabelMatch[] {
    return this.store.intersect(other instanceof CategoricalField ? other.getCategories() : other)
  }

  /** Single-value coercion: bound-free integer parse plus category membership */
  protected coerceCode(raw: RawValue): number | null {
    const code = parseInteger(raw)
    if (code === undefined) {
      if (isEmptyRaw(raw)) return null
      throw new ValidationError(`Invalid input ${String(raw)} for field ${this.describe()}`)
    }
    if (!this.store.has(code)) {
      throw new ValidationError(`Provided value ${code} not in category codes of field ${this.describe()}`)
    }
    return code
  }

  protected labelFor(code: number): string {
    return this.store.labelOf(code) ?? String(code)
  }
}

export class SingleField extends CategoricalField<RawValue, number, string> {
  readonly kind = 'single'

  coerce(raw: RawValue): number | null {
    return this.coerceCode(raw)
  }

  format(raw: RawValue): string | null {
    const code = this.coerce(raw)
    return code === null ? null : this.labelFor(code)
  }
}

export class MultipleField extends CategoricalField<readonly RawValue[], number[], string[]> {
  readonly kind = 'multiple'

  /** Codes in input order; empty entries are skipped, the first invalid entry fails the call */
  coerce(raws: readonly RawValue[]): number[] | null {
    const codes: number[] = []
    for (const raw of raws) {
      const code = this.coerceCode(raw)
      if (code !== null) codes.push(code)
    }
    return codes.length ? codes : null
  }

  format(raws: readonly RawValue[]): string[] | null {
    const codes = this.coerce(raws)
    return codes === null ? null : codes.map((code) => this.labelFor(code))
  }
}

export type AnyField = IntegerField | FloatField | StringField | SingleField | MultipleField
