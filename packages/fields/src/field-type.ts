import { z } from 'zod'

import type { JsonSchemaShape } from './json-schema-shape.js'

export const SCALAR_TYPES = ['string', 'number', 'integer', 'boolean', 'date', 'uuid', 'object', 'unknown'] as const
export type ScalarTypeTag = (typeof SCALAR_TYPES)[number]

export type FieldType =
  | { readonly kind: 'scalar'; readonly tag: ScalarTypeTag }
  | { readonly kind: 'nullable'; readonly inner: FieldType }
  | { readonly kind: 'list'; readonly inner: FieldType; readonly strict: boolean }

export function scalarType(tag: ScalarTypeTag): FieldType {
  return Object.freeze({ kind: 'scalar', tag })
}

export function nullableType(inner: FieldType): FieldType {
  if (inner.kind === 'nullable') return inner
  return Object.freeze({ kind: 'nullable', inner })
}

export function listType(inner: FieldType, strict: boolean): FieldType {
  return Object.freeze({ kind: 'list', inner, strict })
}

export function baseTypeOf(type: FieldType): ScalarTypeTag {
  return type.kind === 'scalar' ? type.tag : baseTypeOf(type.inner)
}

export function describeFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'scalar':
      return type.tag
    case 'nullable':
      return `${describeFieldType(type.inner)} | null`
    case 'list': {
      const item = describeFieldType(type.inner)
      return type.strict ? `list<${item}>` : `${item} | list<${item}>`
    }
  }
}

const zodCache = new WeakMap<FieldType, z.ZodTypeAny>()

export function toZodSchema(type: FieldType): z.ZodTypeAny {
  const cached = zodCache.get(type)
  if (cached) return cached
  const schema = buildZodSchema(type)
  zodCache.set(type, schema)
  return schema
}

function buildZodSchema(type: FieldType): z.ZodTypeAny {
  switch (type.kind) {
    case 'nullable':
      return toZodSchema(type.inner).nullable()
    case 'list': {
      const item = toZodSchema(type.inner)
      return type.strict ? z.array(item) : z.union([item, z.array(item)])
    }
    case 'scalar':
      return scalarZodSchema(type.tag)
  }
}

function scalarZodSchema(tag: ScalarTypeTag): z.ZodTypeAny {
  switch (tag) {
    case 'string':
      return z.string()
    case 'number':
      return z.number().finite()
    case 'integer':
      return z.number().int()
    case 'boolean':
      return z.boolean()
    case 'date':
      return z.union([
        z.date(),
        z
          .string()
          .datetime({ offset: true })
          .transform((value) => new Date(value))
      ])
    case 'uuid':
      return z.string().uuid()
    case 'object':
      return z.record(z.unknown())
    case 'unknown':
      return z.unknown()
  }
}

export function toJsonSchemaShape(type: FieldType): JsonSchemaShape {
  switch (type.kind) {
    case 'nullable':
      return { anyOf: [toJsonSchemaShape(type.inner), { type: 'null' }] }
    case 'list': {
      const item = toJsonSchemaShape(type.inner)
      const array: JsonSchemaShape = { type: 'array', items: item }
      return type.strict ? array : { anyOf: [item, array] }
    }
    case 'scalar':
      return scalarJsonSchema(type.tag)
  }
}

function scalarJsonSchema(tag: ScalarTypeTag): JsonSchemaShape {
  switch (tag) {
    case 'string':
    case 'number':
    case 'integer':
    case 'boolean':
    case 'object':
      return { type: tag }
    case 'date':
      return { type: 'string', format: 'date-time' }
    case 'uuid':
      return { type: 'string', format: 'uuid' }
    case 'unknown':
      return {}
  }
}
