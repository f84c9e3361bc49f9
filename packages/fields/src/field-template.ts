import type { z } from 'zod'
import { contentHash, getConfig, getLogger } from '@modelforge/shared'

import { FieldContractViolation, FieldValidationError, type FieldValidationContext } from './errors.js'
import {
  baseTypeOf,
  describeFieldType,
  listType,
  nullableType,
  scalarType,
  toZodSchema,
  type FieldType,
  type ScalarTypeTag
} from './field-type.js'

export type FieldValidator = (value: unknown) => boolean
export type DefaultFactory = () => unknown

export type FieldTemplateOptions = {
  default?: unknown
  defaultFactory?: DefaultFactory
  nullable?: boolean
  validator?: FieldValidator
  frozen?: boolean
  description?: string
  metadata?: Record<string, unknown>
}

export type FieldOverrides = Omit<FieldTemplateOptions, 'nullable'>

type DefaultState =
  | { kind: 'none' }
  | { kind: 'value'; value: unknown }
  | { kind: 'factory'; factory: DefaultFactory }

const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

/** Names taken by members every synthesized model carries. */
export const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set([
  'constructor',
  'prototype',
  '__proto__',
  'toDict',
  'toJSON'
])

export function assertFieldName(name: string) {
  if (!FIELD_NAME_PATTERN.test(name)) {
    throw new FieldContractViolation('INVALID_FIELD_NAME', `"${name}" is not a valid field name.`, { name })
  }
  if (RESERVED_FIELD_NAMES.has(name)) {
    throw new FieldContractViolation('RESERVED_FIELD_NAME', `"${name}" is reserved and cannot be used as a field name.`, {
      name
    })
  }
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key)
}

function resolveDefaultState(options: FieldTemplateOptions): DefaultState {
  const hasValue = hasOwn(options, 'default')
  const hasFactory = options.defaultFactory !== undefined
  if (hasValue && hasFactory) {
    throw new FieldContractViolation('DEFAULT_CONFLICT', 'A field accepts either a default value or a default factory, not both.')
  }
  if (hasFactory && options.defaultFactory) {
    return { kind: 'factory', factory: options.defaultFactory }
  }
  if (hasValue) {
    return { kind: 'value', value: options.default }
  }
  return { kind: 'none' }
}

function nameValidator<T extends FieldValidator>(validator: T, name: string): T {
  Object.defineProperty(validator, 'name', { value: name })
  return validator
}

/** Absence never reaches the wrapped validator. */
export function nullSafeValidator(validator: FieldValidator): FieldValidator {
  return nameValidator(
    (value: unknown) => (value === null || value === undefined ? true : validator(value)),
    `nullable(${validator.name || 'validator'})`
  )
}

/** Maps the validator over sequence elements; scalars are checked once unless `strict`. */
export function listWiseValidator(validator: FieldValidator, strict: boolean): FieldValidator {
  return nameValidator((value: unknown) => {
    if (Array.isArray(value)) {
      return value.every((item: unknown) => validator(item))
    }
    return strict ? false : validator(value)
  }, `${strict ? 'strictList' : 'list'}(${validator.name || 'validator'})`)
}

/**
 * Immutable, reusable description of one field: its type, default, nullability,
 * validator and descriptive metadata. Every derivation returns a new template;
 * derivations of the same template are memoized so repeated calls hand back the
 * same instance.
 */
export class FieldTemplate {
  readonly type: FieldType
  readonly validator: FieldValidator | undefined
  readonly frozen: boolean
  readonly description: string | undefined
  readonly metadata: Readonly<Record<string, unknown>>

  private readonly defaultState: DefaultState
  private nullableVariant: FieldTemplate | undefined
  private readonly listableVariants = new Map<boolean, FieldTemplate>()
  private cachedFingerprint: string | undefined

  constructor(type: FieldType | ScalarTypeTag, options: FieldTemplateOptions = {}) {
    const resolvedType = typeof type === 'string' ? scalarType(type) : type
    let defaultState = resolveDefaultState(options)
    let validator = options.validator

    if (options.nullable && resolvedType.kind !== 'nullable') {
      this.type = nullableType(resolvedType)
      validator = validator && nullSafeValidator(validator)
      if (defaultState.kind === 'none') {
        defaultState = { kind: 'value', value: null }
      }
    } else {
      this.type = resolvedType
    }

    this.defaultState = defaultState
    this.validator = validator
    this.frozen = options.frozen ?? false
    this.description = options.description
    this.metadata = Object.freeze({ ...(options.metadata ?? {}) })

    const limit = getConfig().fieldMetadataLimit
    const metadataCount = Object.keys(this.metadata).length
    if (metadataCount > limit) {
      getLogger('fields').warn('field_metadata_limit_exceeded', {
        type: describeFieldType(this.type),
        metadataCount,
        limit
      })
    }
  }

  get baseType(): ScalarTypeTag {
    return baseTypeOf(this.type)
  }

  get nullable(): boolean {
    return this.type.kind === 'nullable'
  }

  get listable(): boolean {
    const inner = this.type.kind === 'nullable' ? this.type.inner : this.type
    return inner.kind === 'list'
  }

  get hasDefault(): boolean {
    return this.defaultState.kind !== 'none'
  }

  get defaultValue(): unknown {
    return this.defaultState.kind === 'value' ? this.defaultState.value : undefined
  }

  get defaultFactory(): DefaultFactory | undefined {
    return this.defaultState.kind === 'factory' ? this.defaultState.factory : undefined
  }

  /** A field must be supplied explicitly when it admits no absence and carries no default. */
  get required(): boolean {
    return !this.nullable && !this.hasDefault
  }

  get zodSchema(): z.ZodTypeAny {
    return toZodSchema(this.type)
  }

  get fingerprint(): string {
    if (this.cachedFingerprint === undefined) {
      this.cachedFingerprint = contentHash({
        type: this.type,
        default: this.defaultState,
        validator: this.validator ?? null,
        frozen: this.frozen,
        description: this.description ?? null,
        metadata: this.metadata
      })
    }
    return this.cachedFingerprint
  }

  equals(other: FieldTemplate): boolean {
    return this === other || this.fingerprint === other.fingerprint
  }

  resolveDefault(): unknown {
    switch (this.defaultState.kind) {
      case 'factory':
        return this.defaultState.factory()
      case 'value':
        return this.defaultState.value
      case 'none':
        return undefined
    }
  }

  asNullable(): FieldTemplate {
    if (this.nullable) return this
    if (!this.nullableVariant) {
      this.nullableVariant = new FieldTemplate(nullableType(this.type), {
        ...this.baseOptions(),
        validator: this.validator && nullSafeValidator(this.validator),
        default: null
      })
    }
    return this.nullableVariant
  }

  asListable(strict = false): FieldTemplate {
    const existing = this.listableVariants.get(strict)
    if (existing) return existing

    const type =
      this.type.kind === 'nullable'
        ? nullableType(listType(this.type.inner, strict))
        : listType(this.type, strict)
    let validator = this.validator && listWiseValidator(this.validator, strict)
    if (validator && this.nullable) {
      validator = nullSafeValidator(validator)
    }
    const derived = new FieldTemplate(type, {
      ...this.baseOptions(),
      ...this.defaultOptions(),
      validator
    })
    this.listableVariants.set(strict, derived)
    return derived
  }

  withValidator(validator: FieldValidator): FieldTemplate {
    const incoming = this.nullable ? nullSafeValidator(validator) : validator
    const current = this.validator
    const combined = current
      ? nameValidator((value: unknown) => current(value) && incoming(value), `${current.name}&${incoming.name}`)
      : incoming
    return this.derive({ validator: combined })
  }

  withDefault(value: unknown): FieldTemplate {
    return new FieldTemplate(this.type, { ...this.baseOptions(), validator: this.validator, default: value })
  }

  withDefaultFactory(factory: DefaultFactory): FieldTemplate {
    return new FieldTemplate(this.type, { ...this.baseOptions(), validator: this.validator, defaultFactory: factory })
  }

  withDescription(description: string): FieldTemplate {
    return this.derive({ description })
  }

  withFrozen(frozen = true): FieldTemplate {
    return this.derive({ frozen })
  }

  withMetadata(entries: Record<string, unknown>): FieldTemplate {
    return this.derive({ metadata: { ...this.metadata, ...entries } })
  }

  /** Runs the type contract, then the validator, returning the parsed value. */
  parse(value: unknown, context: FieldValidationContext = {}): unknown {
    const label = context.field ? `Field "${context.field}"` : 'Field'
    if (value === null || value === undefined) {
      if (!this.nullable) {
        throw new FieldValidationError('NULL_NOT_ALLOWED', `${label} does not accept null.`, context)
      }
      return null
    }

    const result = this.zodSchema.safeParse(value)
    if (!result.success) {
      const issues = result.error.issues.map((issue) => issue.message)
      throw new FieldValidationError(
        'TYPE_MISMATCH',
        `${label} expects ${describeFieldType(this.type)}: ${issues.join('; ')}`,
        context,
        { issues }
      )
    }

    const parsed: unknown = result.data
    if (this.validator) {
      let valid: boolean
      try {
        valid = this.validator(parsed)
      } catch (error) {
        throw new FieldValidationError(
          'VALIDATOR_FAILED',
          `${label} failed validation: ${error instanceof Error ? error.message : String(error)}`,
          context,
          { validator: this.validator.name },
          { cause: error }
        )
      }
      if (!valid) {
        throw new FieldValidationError('VALIDATOR_FAILED', `${label} failed ${this.validator.name || 'validator'}.`, context, {
          validator: this.validator.name
        })
      }
    }
    return parsed
  }

  isValid(value: unknown): boolean {
    try {
      this.parse(value)
      return true
    } catch (error) {
      if (error instanceof FieldValidationError) return false
      throw error
    }
  }

  createField(name: string, overrides: FieldOverrides = {}): Field {
    assertFieldName(name)
    if (hasOwn(overrides, 'default') && overrides.defaultFactory !== undefined) {
      throw new FieldContractViolation(
        'DEFAULT_CONFLICT',
        `Field "${name}" received both a default value and a default factory.`,
        { name }
      )
    }
    if (this.frozen && overrides.frozen === false) {
      throw new FieldContractViolation('FROZEN_OVERRIDE', `Field "${name}" is frozen and cannot be made mutable.`, { name })
    }
    return new Field(name, this.applyOverrides(overrides))
  }

  toString(): string {
    const flags = [this.nullable ? 'nullable' : null, this.listable ? 'listable' : null, this.validator ? 'validated' : null]
      .filter((flag): flag is string => flag !== null)
    return `FieldTemplate(${describeFieldType(this.type)}${flags.length ? ` [${flags.join(', ')}]` : ''})`
  }

  private applyOverrides(overrides: FieldOverrides): FieldTemplate {
    if (Object.keys(overrides).length === 0) return this
    let template: FieldTemplate = this
    if (hasOwn(overrides, 'default')) {
      template = template.withDefault(overrides.default)
    } else if (overrides.defaultFactory) {
      template = template.withDefaultFactory(overrides.defaultFactory)
    }
    if (overrides.validator) template = template.withValidator(overrides.validator)
    if (overrides.frozen !== undefined) template = template.withFrozen(overrides.frozen)
    if (overrides.description !== undefined) template = template.withDescription(overrides.description)
    if (overrides.metadata) template = template.withMetadata(overrides.metadata)
    return template
  }

  private derive(changes: Pick<FieldTemplateOptions, 'validator' | 'frozen' | 'description' | 'metadata'>): FieldTemplate {
    return new FieldTemplate(this.type, {
      ...this.baseOptions(),
      ...this.defaultOptions(),
      validator: this.validator,
      ...changes
    })
  }

  private baseOptions(): Pick<FieldTemplateOptions, 'frozen' | 'description' | 'metadata'> {
    return {
      frozen: this.frozen,
      description: this.description,
      metadata: { ...this.metadata }
    }
  }

  private defaultOptions(): Pick<FieldTemplateOptions, 'default' | 'defaultFactory'> {
    switch (this.defaultState.kind) {
      case 'factory':
        return { defaultFactory: this.defaultState.factory }
      case 'value':
        return { default: this.defaultState.value }
      case 'none':
        return {}
    }
  }
}

/** A template bound to a field name. */
export class Field {
  constructor(
    readonly name: string,
    readonly template: FieldTemplate
  ) {}

  get required(): boolean {
    return this.template.required
  }

  get frozen(): boolean {
    return this.template.frozen
  }

  resolveDefault(): unknown {
    return this.template.resolveDefault()
  }

  parse(value: unknown, model?: string): unknown {
    return this.template.parse(value, { field: this.name, model })
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: describeFieldType(this.template.type),
      required: this.required,
      nullable: this.template.nullable,
      frozen: this.frozen,
      description: this.template.description ?? null,
      metadata: this.template.metadata
    }
  }
}
