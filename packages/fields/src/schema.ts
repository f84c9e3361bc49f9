import { contentHash } from '@modelforge/shared'

import { assertFieldName, type Field, type FieldTemplate } from './field-template.js'

export type SchemaFieldMetadata = Readonly<Record<string, unknown>>

export class SchemaField {
  readonly metadata: SchemaFieldMetadata

  constructor(
    readonly name: string,
    readonly template: FieldTemplate,
    metadata: Record<string, unknown> = {}
  ) {
    assertFieldName(name)
    this.metadata = Object.freeze({ ...metadata })
  }

  get fingerprint(): string {
    return contentHash({ name: this.name, template: this.template.fingerprint, metadata: this.metadata })
  }
}

/**
 * Immutable, content-addressable set of named field templates.
 *
 * Field order is preserved for iteration, but equality and `hash` only look at
 * content: two schemas with the same name, fields and metadata are equal however
 * they were produced.
 */
export class Schema {
  readonly fields: ReadonlyMap<string, SchemaField>
  readonly metadata: Readonly<Record<string, unknown>>

  private cachedHash: string | undefined
  private cachedFieldNames: readonly string[] | undefined
  private cachedRequired: readonly string[] | undefined
  private cachedOptional: readonly string[] | undefined

  constructor(
    readonly name: string,
    fields: Iterable<SchemaField> = [],
    metadata: Record<string, unknown> = {}
  ) {
    const entries = new Map<string, SchemaField>()
    for (const field of fields) {
      entries.set(field.name, field)
    }
    this.fields = entries
    this.metadata = Object.freeze({ ...metadata })
  }

  get hash(): string {
    if (this.cachedHash === undefined) {
      const fields = Array.from(this.fields.values())
        .map((field) => [field.name, field.fingerprint] as const)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      this.cachedHash = contentHash({ name: this.name, fields, metadata: this.metadata })
    }
    return this.cachedHash
  }

  get fingerprint(): string {
    return this.hash
  }

  get size(): number {
    return this.fields.size
  }

  get fieldNames(): readonly string[] {
    if (!this.cachedFieldNames) {
      this.cachedFieldNames = Object.freeze(Array.from(this.fields.keys()))
    }
    return this.cachedFieldNames
  }

  get requiredFields(): readonly string[] {
    if (!this.cachedRequired) {
      this.cachedRequired = Object.freeze(this.fieldNames.filter((name) => this.isRequired(name)))
    }
    return this.cachedRequired
  }

  get optionalFields(): readonly string[] {
    if (!this.cachedOptional) {
      this.cachedOptional = Object.freeze(this.fieldNames.filter((name) => !this.isRequired(name)))
    }
    return this.cachedOptional
  }

  has(name: string): boolean {
    return this.fields.has(name)
  }

  get(name: string): SchemaField | undefined {
    return this.fields.get(name)
  }

  equals(other: Schema): boolean {
    return this === other || this.hash === other.hash
  }

  createFields(): Record<string, Field> {
    const result: Record<string, Field> = {}
    for (const [name, field] of this.fields) {
      result[name] = field.template.createField(name)
    }
    return result
  }

  /** Fields and metadata of `other` win on collision. */
  merge(other: Schema, name?: string): Schema {
    const fields = new Map(this.fields)
    for (const [fieldName, field] of other.fields) {
      fields.set(fieldName, field)
    }
    return new Schema(name ?? `${this.name}_${other.name}`, fields.values(), {
      ...this.metadata,
      ...other.metadata
    })
  }

  /** Keeps requested fields in their original order; unknown names are dropped. */
  select(names: Iterable<string>, name?: string): Schema {
    const wanted = new Set(names)
    const selected = Array.from(this.fields.values()).filter((field) => wanted.has(field.name))
    return new Schema(name ?? `${this.name}_subset`, selected, { ...this.metadata })
  }

  extend(fields: Record<string, FieldTemplate>): Schema {
    const extended = new Map(this.fields)
    for (const [fieldName, template] of Object.entries(fields)) {
      extended.set(fieldName, new SchemaField(fieldName, template))
    }
    return new Schema(this.name, extended.values(), { ...this.metadata })
  }

  toString(): string {
    return `Schema(${this.name}: ${this.fieldNames.join(', ')})`
  }

  private isRequired(name: string): boolean {
    const field = this.fields.get(name)
    return field ? field.template.required : false
  }
}

export class SchemaBuilder {
  private readonly fields = new Map<string, SchemaField>()
  private metadata: Record<string, unknown> = {}

  constructor(private readonly name: string) {}

  addField(name: string, template: FieldTemplate, metadata: Record<string, unknown> = {}): this {
    this.fields.set(name, new SchemaField(name, template, metadata))
    return this
  }

  addFields(fields: Record<string, FieldTemplate>): this {
    for (const [name, template] of Object.entries(fields)) {
      this.addField(name, template)
    }
    return this
  }

  withMetadata(metadata: Record<string, unknown>): this {
    this.metadata = { ...this.metadata, ...metadata }
    return this
  }

  extend(schema: Schema): this {
    for (const [name, field] of schema.fields) {
      this.fields.set(name, field)
    }
    return this
  }

  has(name: string): boolean {
    return this.fields.has(name)
  }

  build(): Schema {
    return new Schema(this.name, Array.from(this.fields.values()), { ...this.metadata })
  }
}

export function createSchema(name: string, fields: Record<string, FieldTemplate>, metadata?: Record<string, unknown>): Schema {
  const builder = new SchemaBuilder(name).addFields(fields)
  if (metadata) builder.withMetadata(metadata)
  return builder.build()
}
