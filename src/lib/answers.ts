/**
 * Answer rows: coerce a record of raw answers keyed by field name against a survey.
 * Single values dispatch on field kind; whole rows collect issues instead of throwing.
 */

import type { AnswerIssue, AnswerRow, AnswerValidation, CanonicalValue, DisplayValue, RawValue } from '../types'
import { ValidationError } from './errors'
import type { AnyField } from './fields'
import type { Survey } from './survey'

function isList(raw: RawValue | readonly RawValue[]): raw is readonly RawValue[] {
  return Array.isArray(raw)
}

function asScalar(field: AnyField, raw: RawValue | readonly RawValue[]): RawValue {
  if (isList(raw)) throw new ValidationError(`Field ${field.describe()} takes a single value, got a list`)
  return raw
}

/** A multiple field wraps a scalar into a one-item list; scalar fields reject lists */
export function coerceAnswer(field: AnyField, raw: RawValue | readonly RawValue[]): CanonicalValue {
  switch (field.kind) {
    case 'multiple':
      return field.coerce(isList(raw) ? raw : [raw])
    default:
      return field.coerce(asScalar(field, raw))
  }
}

export function formatAnswer(field: AnyField, raw: RawValue | readonly RawValue[]): DisplayValue {
  switch (field.kind) {
    case 'multiple':
      return field.format(isList(raw) ? raw : [raw])
    case 'single':
      return field.format(asScalar(field, raw))
    default:
      return field.format(asScalar(field, raw)) ?? null
  }
}

/**
 * Validate one row of answers. Every survey field gets a value (null when absent or invalid);
 * names in the row that match no field are reported as unknown.
 */
export function validateAnswers(survey: Survey, row: AnswerRow): AnswerValidation {
  // Map, then fromEntries: field names like __proto__ must end up as own keys
  const values = new Map<string, CanonicalValue>()
  const issues: AnswerIssue[] = []

  for (const field of survey) values.set(field.name, null)

  for (const [name, raw] of Object.entries(row)) {
    if (!survey.has(name)) {
      issues.push({ field: name, code: 'unknown_field', message: `Field ${name} doesn't exist in survey ${survey.name}` })
      continue
    }
    const field = survey.lookup(name)
    try {
      values.set(field.name, coerceAnswer(field, raw))
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error
      issues.push({ field: field.name, code: 'invalid_value', message: error.message })
    }
  }

  return { valid: issues.length === 0, values: Object.fromEntries(values), issues }
}

/** Display values for canonical answers, keyed by field name; unknown names are skipped */
export function formatAnswers(survey: Survey, values: Record<string, CanonicalValue>): Record<string, DisplayValue> {
  const out = new Map<string, DisplayValue>()
  for (const [name, value] of Object.entries(values)) {
    if (!survey.has(name)) continue
    const field = survey.lookup(name)
    out.set(field.name, value === null ? null : formatAnswer(field, value))
  }
  return Object.fromEntries(out)
}
