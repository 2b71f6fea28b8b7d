export * from './types'
export * from './lib/errors'
export { isEmptyRaw, parseInteger, parseDecimal } from './lib/valueParse'
export { CategoryStore } from './lib/categories'
export {
  Field,
  IntegerField,
  FloatField,
  StringField,
  SingleField,
  MultipleField,
  type AnyField,
  type ReplaceCategoriesResult,
} from './lib/fields'
export { Survey } from './lib/survey'
export { coerceAnswer, formatAnswer, validateAnswers, formatAnswers } from './lib/answers'
export {
  FieldDefinitionSchema,
  SurveyDefinitionSchema,
  parseSurveyDefinition,
  parseFieldDefinition,
  buildField,
  buildSurvey,
  type FieldDefinition,
  type SurveyDefinition,
} from './lib/definitions'
