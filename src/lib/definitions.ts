/**
 * Plain-object field and survey definitions (e.g. loaded from a JSON config) and the
 * builders that turn them into Field / Survey instances.
 */

import { z } from 'zod'
import { DefinitionError } from './errors'
import { FloatField, IntegerField, MultipleField, SingleField, StringField, type AnyField } from './fields'
import { Survey } from './survey'

const BoundSchema = z.union([z.number(), z.string()]).nullable().optional()

const CategoriesSchema = z.union([
  z.array(z.object({ code: z.union([z.number(), z.string()]), label: z.string() })),
  z.record(z.string()),
])

const baseField = {
  name: z.string().trim().min(1),
  title: z.string().default(''),
}

export const FieldDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ ...baseField, type: z.literal('integer'), min: BoundSchema, max: BoundSchema }),
  z.object({ ...baseField, type: z.literal('float'), min: BoundSchema, max: BoundSchema }),
  z.object({ ...baseField, type: z.literal('string') }),
  z.object({ ...baseField, type: z.literal('single'), categories: CategoriesSchema }),
  z.object({ ...baseField, type: z.literal('multiple'), categories: CategoriesSchema }),
])

export const SurveyDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  title: z.string().default(''),
  fields: z.array(FieldDefinitionSchema),
})

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>
export type SurveyDefinition = z.infer<typeof SurveyDefinitionSchema>

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
}

export function parseSurveyDefinition(input: unknown): SurveyDefinition {
  const parsed = SurveyDefinitionSchema.safeParse(input)
  if (!parsed.success) throw new DefinitionError('Invalid survey definition', toIssues(parsed.error))
  return parsed.data
}

export function parseFieldDefinition(input: unknown): FieldDefinition {
  const parsed = FieldDefinitionSchema.safeParse(input)
  if (!parsed.success) throw new DefinitionError('Invalid field definition', toIssues(parsed.error))
  return parsed.data
}

export function buildField(definition: FieldDefinition): AnyField {
  const { name, title } = definition
  switch (definition.type) {
    case 'integer':
      return new IntegerField(name, title, { min: definition.min, max: definition.max })
    case 'float':
      return new FloatField(name, title, { min: definition.min, max: definition.max })
    case 'string':
      return new StringField(name, title)
    case 'single':
      return new SingleField(name, title, definition.categories)
    case 'multiple':
      return new MultipleField(name, title, definition.categories)
  }
}

/** Check a raw definition and build the survey; field and duplicate-name errors propagate */
export function buildSurvey(input: unknown): Survey {
  const definition = parseSurveyDefinition(input)
  return new Survey(definition.name, definition.title, definition.fields.map(buildField))
}
