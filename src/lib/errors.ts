/**
 * Error kinds raised by fields, category stores and surveys.
 * All of them extend SchemaError so callers can catch the whole family at once.
 */

export class SchemaError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A field with the same (case-insensitive) name already exists in the survey */
export class DuplicateFieldNameError extends SchemaError {}

/** The requested field can't be found in the survey */
export class FieldDoesNotExist extends SchemaError {}

/** A raw value failed type coercion or a constraint check */
export class ValidationError extends SchemaError {}

/** A category code can't be converted into an integer, or repeats another code */
export class CategoryCodeError extends SchemaError {}

/** Two category labels collide once trimmed and lower-cased */
export class DuplicateCategoryError extends SchemaError {}

/**
 * Deleting the categories of a field.
 * Categorical fields expose no delete operation, so nothing in this package throws it;
 * it stays exported for callers that map their own "remove categories" action onto it.
 */
export class CategoriesDeletionError extends SchemaError {}

/** Invalid field construction arguments (bad bounds, empty name) */
export class FieldConfigurationError extends SchemaError {}

/** A field or survey definition object failed schema checks */
export class DefinitionError extends SchemaError {
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message)
    this.issues = issues
  }
}
