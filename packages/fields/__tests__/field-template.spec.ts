import { afterEach, describe, expect, it, vi } from 'vitest'
import { resetConfig } from '@modelforge/shared'

import { FieldContractViolation, FieldValidationError } from '../src/errors.js'
import { FieldTemplate } from '../src/field-template.js'
import { ID_FROZEN } from '../src/families.js'
import { captureLogs } from '../../../tests/log-capture.js'

function codeOf(run: () => unknown): string | undefined {
  try {
    run()
  } catch (error) {
    if (error instanceof FieldValidationError || error instanceof FieldContractViolation) {
      return error.code
    }
    throw error
  }
  return undefined
}

describe('FieldTemplate.asNullable', () => {
  it('is idempotent and defaults to null', () => {
    const base = new FieldTemplate('string')
    const once = base.asNullable()
    const twice = once.asNullable()

    expect(twice).toBe(once)
    expect(base.asNullable()).toBe(once)
    expect(once.nullable).toBe(true)
    expect(once.hasDefault).toBe(true)
    expect(once.defaultValue).toBeNull()
    expect(once.required).toBe(false)
    expect(base.required).toBe(true)
  })

  it('short-circuits absence before the validator runs', () => {
    const validator = vi.fn((value: unknown) => typeof value === 'string' && value.length > 0)
    const nullable = new FieldTemplate('string', { validator }).asNullable()

    expect(nullable.parse(null)).toBeNull()
    expect(nullable.parse(undefined)).toBeNull()
    expect(validator).not.toHaveBeenCalled()

    expect(nullable.parse('abc')).toBe('abc')
    expect(validator).toHaveBeenCalledWith('abc')
    expect(codeOf(() => nullable.parse(''))).toBe('VALIDATOR_FAILED')
  })

  it('rejects null on non-nullable templates', () => {
    expect(codeOf(() => new FieldTemplate('string').parse(null))).toBe('NULL_NOT_ALLOWED')
  })
})

describe('FieldTemplate.asListable', () => {
  const positive = new FieldTemplate('number', {
    validator: (value: unknown) => typeof value === 'number' && value > 0
  })

  it('accepts scalars or sequences and maps the validator over items', () => {
    const loose = positive.asListable()
    expect(positive.asListable()).toBe(loose)
    expect(loose.listable).toBe(true)
    expect(loose.parse(3)).toBe(3)
    expect(loose.parse([1, 2])).toEqual([1, 2])
    expect(codeOf(() => loose.parse([1, -2]))).toBe('VALIDATOR_FAILED')
    expect(codeOf(() => loose.parse(-1))).toBe('VALIDATOR_FAILED')
  })

  it('rejects scalars in strict mode', () => {
    const strict = positive.asListable(true)
    expect(strict).not.toBe(positive.asListable())
    expect(strict.parse([4])).toEqual([4])
    expect(codeOf(() => strict.parse(4))).toBe('TYPE_MISMATCH')
  })

  it('keeps nullability outside the list', () => {
    const template = positive.asNullable().asListable(true)
    expect(template.nullable).toBe(true)
    expect(template.parse(null)).toBeNull()
    expect(template.parse([1])).toEqual([1])
    expect(template.toString()).toBe('FieldTemplate(list<number> | null [nullable, listable, validated])')
  })
})

describe('FieldTemplate contracts', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('refuses both a default value and a default factory', () => {
    expect(codeOf(() => new FieldTemplate('string', { default: 'a', defaultFactory: () => 'b' }))).toBe('DEFAULT_CONFLICT')
    expect(codeOf(() => new FieldTemplate('string').createField('title', { default: 'a', defaultFactory: () => 'b' }))).toBe(
      'DEFAULT_CONFLICT'
    )
  })

  it('validates field names', () => {
    const template = new FieldTemplate('string')
    expect(codeOf(() => template.createField('1title'))).toBe('INVALID_FIELD_NAME')
    expect(codeOf(() => template.createField('has space'))).toBe('INVALID_FIELD_NAME')
    expect(codeOf(() => template.createField('toJSON'))).toBe('RESERVED_FIELD_NAME')
    expect(template.createField('_title').name).toBe('_title')
  })

  it('refuses to unfreeze a frozen template', () => {
    expect(codeOf(() => ID_FROZEN.createField('id', { frozen: false }))).toBe('FROZEN_OVERRIDE')
    expect(ID_FROZEN.createField('id', { description: 'Key' }).frozen).toBe(true)
  })

  it('applies overrides when creating fields', () => {
    const field = new FieldTemplate('string').createField('title', { default: 'untitled' })
    expect(field.required).toBe(false)
    expect(field.resolveDefault()).toBe('untitled')
    expect(field.toJSON()).toEqual({
      name: 'title',
      type: 'string',
      required: false,
      nullable: false,
      frozen: false,
      description: null,
      metadata: {}
    })
  })

  it('combines validators with AND', () => {
    const bounded = new FieldTemplate('integer')
      .withValidator((value: unknown) => typeof value === 'number' && value > 0)
      .withValidator((value: unknown) => typeof value === 'number' && value < 10)
    expect(bounded.isValid(5)).toBe(true)
    expect(bounded.isValid(12)).toBe(false)
    expect(bounded.isValid(-1)).toBe(false)
    expect(bounded.isValid(2.5)).toBe(false)
  })

  it('reports the field name on type mismatches', () => {
    try {
      new FieldTemplate('integer').parse(1.5, { field: 'count', model: 'Counter' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(FieldValidationError)
      if (error instanceof FieldValidationError) {
        expect(error.code).toBe('TYPE_MISMATCH')
        expect(error.field).toBe('count')
        expect(error.model).toBe('Counter')
      }
    }
  })

  it('keeps the cause of a throwing validator', () => {
    const failure = new Error('boom')
    const template = new FieldTemplate('string', {
      validator: () => {
        throw failure
      }
    })
    try {
      template.parse('x')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(FieldValidationError)
      if (error instanceof FieldValidationError) {
        expect(error.code).toBe('VALIDATOR_FAILED')
        expect(error.cause).toBe(failure)
      }
    }
  })

  it('parses ISO datetimes into dates', () => {
    const parsed = new FieldTemplate('date').parse('2024-01-02T03:04:05Z')
    expect(parsed).toBeInstanceOf(Date)
    expect(parsed instanceof Date ? parsed.toISOString() : null).toBe('2024-01-02T03:04:05.000Z')
  })

  it('compares by content', () => {
    const left = new FieldTemplate('string', { description: 'Title', metadata: { ui: 'text' } })
    const right = new FieldTemplate('string', { description: 'Title', metadata: { ui: 'text' } })
    expect(left.equals(right)).toBe(true)
    expect(left.fingerprint).toBe(right.fingerprint)
    expect(left.equals(right.withDescription('Heading'))).toBe(false)
    expect(left.equals(right.withDefault('x'))).toBe(false)
  })

  it('warns when metadata exceeds the configured limit', () => {
    vi.stubEnv('MODELFORGE_FIELD_META_LIMIT', '1')
    resetConfig()
    const entries = captureLogs()

    new FieldTemplate('string', { metadata: { a: 1, b: 2 } })

    expect(entries).toEqual([
      expect.objectContaining({
        level: 'warn',
        message: 'field_metadata_limit_exceeded',
        type: 'string',
        metadataCount: 2,
        limit: 1
      })
    ])
  })
})
