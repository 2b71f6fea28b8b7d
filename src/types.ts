/** One raw answer cell as supplied by a data-ingestion caller */
export type RawValue = string | number | null | undefined

/** Discriminant of the concrete field classes */
export type FieldKind = 'integer' | 'float' | 'string' | 'single' | 'multiple'

export type ValueLabel = { code: number | string; label: string }

/** Validated category: integer code and its trimmed label */
export interface Category {
  code: number
  label: string
}

/** Accepted shapes for a set of categories (record, [code, label] pairs or value labels) */
export type CategoryInput =
  | Readonly<Record<string | number, string>>
  | Iterable<readonly [string | number, string]>
  | readonly ValueLabel[]

/** [ownCode, otherCode, label] */
export type LabelMatch = [number, number, string]

export interface NumericBounds {
  min?: number | string | null
  max?: number | string | null
}

/** Canonical value of any field; null means the answer is absent */
export type CanonicalValue = number | string | number[] | null

export type DisplayValue = number | string | string[] | null

/** Record of raw answers keyed by field name */
export type AnswerRow = Record<string, RawValue | readonly RawValue[]>

export type AnswerIssueCode = 'invalid_value' | 'unknown_field'

export interface AnswerIssue {
  field: string
  code: AnswerIssueCode
  message: string
}

export interface AnswerValidation {
  valid: boolean
  values: Record<string, CanonicalValue>
  issues: AnswerIssue[]
}
