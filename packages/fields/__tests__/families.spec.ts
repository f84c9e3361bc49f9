import { describe, expect, it } from 'vitest'

import { FieldValidationError } from '../src/errors.js'
import {
  DATETIME,
  EMBEDDING,
  ID_FROZEN,
  ID_MUTABLE,
  ID_NULLABLE,
  integerField,
  listField,
  numberField,
  stringField,
  validateDatetime,
  validateEmbedding,
  validateUuid
} from '../src/families.js'

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

describe('leaf validators', () => {
  it('normalizes UUIDs', () => {
    expect(validateUuid(' 123E4567-E89B-12D3-A456-426614174000 ')).toBe('123e4567-e89b-12d3-a456-426614174000')
    expect(validateUuid('', true)).toBeNull()
    expect(() => validateUuid('not-a-uuid')).toThrow(FieldValidationError)
    expect(() => validateUuid(null)).toThrow(FieldValidationError)
  })

  it('parses datetimes with offsets', () => {
    expect(validateDatetime('2024-05-06T07:08:09+02:00')?.toISOString()).toBe('2024-05-06T05:08:09.000Z')
    const now = new Date('2024-01-01T00:00:00Z')
    expect(validateDatetime(now)).toBe(now)
    expect(validateDatetime(undefined, true)).toBeNull()
    expect(() => validateDatetime('yesterday')).toThrow(FieldValidationError)
  })

  it('accepts vectors and their JSON encoding', () => {
    expect(validateEmbedding('[1, 2.5]')).toEqual([1, 2.5])
    expect(validateEmbedding(['1', 2])).toEqual([1, 2])
    expect(validateEmbedding(null)).toEqual([])
    expect(() => validateEmbedding('{bad')).toThrow(FieldValidationError)
    expect(() => validateEmbedding({ values: [1] })).toThrow(FieldValidationError)
  })
})

describe('field families', () => {
  it('generates frozen identifiers', () => {
    expect(ID_FROZEN.frozen).toBe(true)
    expect(ID_FROZEN.required).toBe(false)
    expect(String(ID_FROZEN.resolveDefault())).toMatch(UUID)
    expect(ID_FROZEN.resolveDefault()).not.toBe(ID_FROZEN.resolveDefault())
    expect(ID_NULLABLE.defaultValue).toBeNull()
    expect(ID_MUTABLE.frozen).toBe(false)
    expect(String(ID_MUTABLE.resolveDefault())).toMatch(UUID)
    expect(ID_MUTABLE.isValid('not-a-uuid')).toBe(false)
  })

  it('stamps datetimes at resolution time', () => {
    expect(DATETIME.resolveDefault()).toBeInstanceOf(Date)
  })

  it('holds embeddings as strict number lists', () => {
    expect(EMBEDDING.listable).toBe(true)
    expect(EMBEDDING.metadata.jsonSchemaExtra).toEqual({ vectorDim: 1536 })
    expect(EMBEDDING.parse([0.1, 0.2])).toEqual([0.1, 0.2])
    expect(EMBEDDING.isValid(0.1)).toBe(false)
    expect(EMBEDDING.resolveDefault()).toEqual([])
    expect(EMBEDDING.resolveDefault()).not.toBe(EMBEDDING.resolveDefault())
  })

  it('builds constrained scalars', () => {
    const code = stringField({ minLength: 2, maxLength: 4, pattern: /^[A-Z]+$/ })
    expect(code.isValid('AB')).toBe(true)
    expect(code.isValid('A')).toBe(false)
    expect(code.isValid('ABCDE')).toBe(false)
    expect(code.isValid('ab')).toBe(false)

    const rating = integerField({ min: 1, max: 3 })
    expect(rating.isValid(2)).toBe(true)
    expect(rating.isValid(4)).toBe(false)
    expect(rating.isValid(2.5)).toBe(false)

    const ratio = numberField({ min: 0, max: 1 })
    expect(ratio.isValid(0.25)).toBe(true)
    expect(ratio.isValid(1.5)).toBe(false)
  })

  it('builds strict lists with fresh defaults', () => {
    const tags = listField('string')
    expect(tags.parse(['a'])).toEqual(['a'])
    expect(tags.isValid('a')).toBe(false)
    expect(tags.isValid([1])).toBe(false)
    expect(tags.required).toBe(false)
  })
})
