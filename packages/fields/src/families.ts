import { randomUUID } from 'node:crypto'
import { z } from 'zod'

import { FieldValidationError } from './errors.js'
import { FieldTemplate, type FieldTemplateOptions, type FieldValidator } from './field-template.js'
import type { ScalarTypeTag } from './field-type.js'

const UuidSchema = z.string().uuid()
const IsoDatetimeSchema = z.string().datetime({ offset: true })
const EmbeddingSchema = z.array(z.coerce.number().finite())

export function validateUuid(value: unknown, nullable = false): string | null {
  if ((value === null || value === undefined || value === '') && nullable) {
    return null
  }
  const parsed = UuidSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value)
  if (!parsed.success) {
    throw new FieldValidationError('TYPE_MISMATCH', 'id must be a valid UUID string')
  }
  return parsed.data
}

export function validateDatetime(value: unknown, nullable = false): Date | null {
  if ((value === null || value === undefined || value === '') && nullable) {
    return null
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value
  }
  const parsed = IsoDatetimeSchema.safeParse(value)
  if (parsed.success) {
    return new Date(parsed.data)
  }
  throw new FieldValidationError('TYPE_MISMATCH', 'Invalid datetime format, must be ISO 8601 or a Date')
}

/** Accepts a numeric array or its JSON encoding. Absence maps to an empty vector. */
export function validateEmbedding(value: unknown): number[] {
  if (value === null || value === undefined) {
    return []
  }
  let candidate: unknown = value
  if (typeof value === 'string') {
    try {
      candidate = JSON.parse(value)
    } catch (error) {
      throw new FieldValidationError('TYPE_MISMATCH', 'Invalid embedding string.', {}, undefined, { cause: error })
    }
  }
  const parsed = EmbeddingSchema.safeParse(candidate)
  if (!parsed.success) {
    throw new FieldValidationError('TYPE_MISMATCH', 'Invalid embedding; must be a list of numbers or its JSON encoding.')
  }
  return parsed.data
}

function schemaValidator(name: string, schema: z.ZodTypeAny): FieldValidator {
  const validator = (value: unknown) => schema.safeParse(value).success
  Object.defineProperty(validator, 'name', { value: name })
  return validator
}

export const ID_FROZEN = new FieldTemplate('uuid', {
  defaultFactory: randomUUID,
  frozen: true,
  description: 'Frozen unique identifier'
})

export const ID_MUTABLE = new FieldTemplate('uuid', {
  defaultFactory: randomUUID,
  description: 'Mutable unique identifier'
})

export const ID_NULLABLE = new FieldTemplate('uuid', {
  nullable: true,
  description: 'Nullable unique identifier'
})

export const DATETIME = new FieldTemplate('date', {
  defaultFactory: () => new Date(),
  description: 'Datetime field'
})

export const DATETIME_NULLABLE = new FieldTemplate('date', {
  nullable: true,
  description: 'Nullable datetime field'
})

export const EMBEDDING = new FieldTemplate('number')
  .asListable(true)
  .withDefaultFactory(() => [])
  .withDescription('List of floats representing the embedding vector')
  .withMetadata({ jsonSchemaExtra: { vectorDim: 1536 } })

type StringFieldOptions = Omit<FieldTemplateOptions, 'validator'> & {
  minLength?: number
  maxLength?: number
  pattern?: RegExp
}

export function stringField(options: StringFieldOptions = {}): FieldTemplate {
  const { minLength, maxLength, pattern, ...rest } = options
  let schema = z.string()
  if (minLength !== undefined) schema = schema.min(minLength)
  if (maxLength !== undefined) schema = schema.max(maxLength)
  if (pattern) schema = schema.regex(pattern)
  const constrained = minLength !== undefined || maxLength !== undefined || pattern !== undefined
  return new FieldTemplate('string', {
    ...rest,
    ...(constrained ? { validator: schemaValidator('stringConstraints', schema) } : {})
  })
}

type NumericFieldOptions = Omit<FieldTemplateOptions, 'validator'> & {
  min?: number
  max?: number
}

function numericField(tag: Extract<ScalarTypeTag, 'number' | 'integer'>, options: NumericFieldOptions): FieldTemplate {
  const { min, max, ...rest } = options
  let schema = z.number()
  if (min !== undefined) schema = schema.min(min)
  if (max !== undefined) schema = schema.max(max)
  const constrained = min !== undefined || max !== undefined
  return new FieldTemplate(tag, {
    ...rest,
    ...(constrained ? { validator: schemaValidator(`${tag}Bounds`, schema) } : {})
  })
}

export function integerField(options: NumericFieldOptions = {}): FieldTemplate {
  return numericField('integer', options)
}

export function numberField(options: NumericFieldOptions = {}): FieldTemplate {
  return numericField('number', options)
}

export function booleanField(options: Omit<FieldTemplateOptions, 'validator'> = {}): FieldTemplate {
  return new FieldTemplate('boolean', options)
}

/** Strict list of `item`, defaulting to a fresh empty array per instance. */
export function listField(item: FieldTemplate | ScalarTypeTag, options: Pick<FieldTemplateOptions, 'description' | 'metadata'> = {}): FieldTemplate {
  const template = typeof item === 'string' ? new FieldTemplate(item) : item
  let listable = template.asListable(true).withDefaultFactory(() => [])
  if (options.description !== undefined) listable = listable.withDescription(options.description)
  if (options.metadata) listable = listable.withMetadata(options.metadata)
  return listable
}
