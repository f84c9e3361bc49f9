import AjvModule from 'ajv'
import type { Ajv as AjvInstance, ErrorObject, Options as AjvOptions } from 'ajv'

import { toJsonSchemaShape } from './field-type.js'
import { JsonSchemaShapeSchema, type JsonSchemaShape } from './json-schema-shape.js'
import type { Schema } from './schema.js'

export { JsonSchemaShapeSchema, type JsonSchemaShape } from './json-schema-shape.js'

const Ajv = AjvModule.default

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i

export type SchemaValidatorOptions = {
  ajv?: AjvInstance
  ajvOptions?: AjvOptions
}

export type SchemaValidationError = {
  field: string | undefined
  pointer: string
  message: string
  keyword?: string
}

export type SchemaValidationResult =
  | { valid: true; errors: undefined }
  | { valid: false; errors: SchemaValidationError[] }

export type CompiledSchemaValidator = {
  jsonSchema: JsonSchemaShape
  validate: (payload: unknown) => SchemaValidationResult
}

/**
 * JSON Schema view of a Schema for adapters that move records in and out of
 * external representations. A field's `jsonSchemaExtra` metadata entry is merged
 * into its property schema.
 */
export function toJsonSchema(schema: Schema): JsonSchemaShape {
  const properties: Record<string, JsonSchemaShape> = {}
  for (const [name, field] of schema.fields) {
    const property: JsonSchemaShape = { ...toJsonSchemaShape(field.template.type) }
    if (field.template.description) {
      property.description = field.template.description
    }
    const extra = JsonSchemaShapeSchema.safeParse(field.template.metadata.jsonSchemaExtra)
    if (extra.success) {
      Object.assign(property, extra.data)
    }
    properties[name] = property
  }

  return {
    type: 'object',
    title: schema.name,
    properties,
    required: [...schema.requiredFields],
    additionalProperties: true
  }
}

export function createAjv(options?: AjvOptions): AjvInstance {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    ...(options ?? {})
  })
  ajv.addFormat('uuid', UUID_PATTERN)
  ajv.addFormat('date-time', DATE_TIME_PATTERN)
  return ajv
}

export function compileSchemaValidator(schema: Schema, options?: SchemaValidatorOptions): CompiledSchemaValidator {
  const ajv = options?.ajv ?? createAjv(options?.ajvOptions)
  const jsonSchema = toJsonSchema(schema)
  const validatorFn = ajv.compile(jsonSchema)

  return {
    jsonSchema,
    validate: (payload: unknown) => {
      if (validatorFn(payload)) {
        return { valid: true, errors: undefined }
      }
      const errors = (validatorFn.errors ?? []).map((error: ErrorObject) => {
        const pointer = toJsonPointer(error)
        return {
          field: resolveFieldFromPointer(pointer, schema),
          pointer,
          message: error.message ?? 'Schema validation error',
          keyword: error.keyword
        }
      })
      return { valid: false, errors }
    }
  }
}

function toJsonPointer(error: ErrorObject): string {
  if (error.keyword === 'required') {
    const missing: unknown = error.params.missingProperty
    if (typeof missing === 'string') {
      return `${error.instancePath}/${missing}`
    }
  }
  return error.instancePath
}

function resolveFieldFromPointer(pointer: string, schema: Schema): string | undefined {
  const match = /^\/([^/]+)/.exec(pointer)
  if (!match) return undefined
  const name = match[1].replace(/~1/g, '/').replace(/~0/g, '~')
  return schema.has(name) ? name : undefined
}
