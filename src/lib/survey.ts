/**
 * Survey schema: ordered collection of fields addressed by position or by name.
 * Names are matched trimmed and case-insensitive and must be unique within a survey.
 */

import { DuplicateFieldNameError, FieldDoesNotExist } from './errors'
import type { AnyField } from './fields'
import { normalizeKey } from './valueParse'

export class Survey implements Iterable<AnyField> {
  readonly name: string
  readonly title: string
  private readonly sequence: AnyField[] = []
  private readonly index = new Map<string, AnyField>()

  constructor(name: string, title = '', fields: Iterable<AnyField> = []) {
    this.name = name.trim()
    this.title = title.trim()
    for (const field of fields) this.append(field)
  }

  get length(): number {
    return this.sequence.length
  }

  private claim(field: AnyField): void {
    if (this.index.has(field.key)) {
      throw new DuplicateFieldNameError(
        `Error while adding field ${field.toString()}: field with given name already exists in survey ${this.name}`
      )
    }
  }

  append(field: AnyField): void {
    this.claim(field)
    this.sequence.push(field)
    this.index.set(field.key, field)
  }

  /** Insert before `position`; negative positions count from the end, positions past the end append */
  insert(position: number, field: AnyField): void {
    if (!Number.isInteger(position)) throw new RangeError(`Invalid insert position ${position}`)
    this.claim(field)
    this.sequence.splice(position, 0, field)
    this.index.set(field.key, field)
  }

  /** Remove a field by name and hand it back to the caller */
  remove(name: string): AnyField {
    const field = this.lookup(name)
    this.index.delete(field.key)
    this.sequence.splice(this.sequence.indexOf(field), 1)
    return field
  }

  has(name: string): boolean {
    return this.index.has(normalizeKey(name))
  }

  lookup(name: string): AnyField {
    const field = this.index.get(normalizeKey(name))
    if (!field) throw new FieldDoesNotExist(`Field with name ${name} doesn't exist in survey ${this.name}`)
    return field
  }

  at(position: number): AnyField | undefined {
    return this.sequence.at(position)
  }

  names(): string[] {
    return this.sequence.map((f) => f.name)
  }

  fields(): AnyField[] {
    return [...this.sequence]
  }

  /** Same names bound to the same field objects, regardless of order */
  equals(other: Survey): boolean {
    if (other.index.size !== this.index.size) return false
    for (const [key, field] of this.index) {
      if (other.index.get(key) !== field) return false
    }
    return true
  }

  [Symbol.iterator](): Iterator<AnyField> {
    return this.sequence[Symbol.iterator]()
  }
}
