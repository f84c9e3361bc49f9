import { functionIdentity, getConfig, getLogger, LruCache } from '@modelforge/shared'

import { FieldContractViolation, FieldValidationError } from './errors.js'
import { RESERVED_FIELD_NAMES, type Field } from './field-template.js'
import type { Schema } from './schema.js'

export interface ModelInstance {
  [member: string]: unknown
  toDict(): Record<string, unknown>
  toJSON(): Record<string, unknown>
}

export type ModelBehavior = (this: ModelInstance, ...args: never[]) => unknown

export type ModelBehaviors = Readonly<Record<string, ModelBehavior>>

export interface ModelClass {
  new (input?: Record<string, unknown>): ModelInstance
  readonly schema: Schema
  readonly modelName: string
  readonly behaviors: ModelBehaviors
  fromDict(data: Record<string, unknown>): ModelInstance
}

export type ModelBuildOptions = {
  behaviors?: Record<string, ModelBehavior>
}

export type ModelFactoryOptions = {
  cacheSize?: number
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key)
}

function toJsonValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return value.map((entry: unknown) => toJsonValue(entry))
  return value
}

function assertBehaviorNames(schema: Schema, behaviors: ModelBehaviors) {
  for (const name of Object.keys(behaviors)) {
    if (schema.has(name)) {
      throw new FieldContractViolation('MEMBER_COLLISION', `Behavior "${name}" collides with a field of ${schema.name}.`, {
        name,
        model: schema.name
      })
    }
    if (RESERVED_FIELD_NAMES.has(name)) {
      throw new FieldContractViolation('MEMBER_COLLISION', `Behavior "${name}" collides with a reserved model member.`, {
        name,
        model: schema.name
      })
    }
  }
}

function synthesize(schema: Schema, behaviors: ModelBehaviors): ModelClass {
  const modelName = schema.name
  const fields: Field[] = Object.values(schema.createFields())
  const state = new WeakMap<object, Map<string, unknown>>()

  const stateOf = (target: object, member: string): Map<string, unknown> => {
    const values = state.get(target)
    if (!values) {
      throw new TypeError(`${modelName}.${member} was accessed on an object that is not a ${modelName} instance.`)
    }
    return values
  }

  class SynthesizedModel {
    [member: string]: unknown

    static readonly schema = schema
    static readonly modelName = modelName
    static readonly behaviors = behaviors

    static fromDict(data: Record<string, unknown>): SynthesizedModel {
      return new SynthesizedModel(data)
    }

    constructor(input: Record<string, unknown> = {}) {
      const values = new Map<string, unknown>()
      const missing: string[] = []
      for (const field of fields) {
        const supplied = hasOwn(input, field.name) ? input[field.name] : undefined
        if (supplied !== undefined) {
          values.set(field.name, field.parse(supplied, modelName))
        } else if (field.template.hasDefault) {
          values.set(field.name, field.resolveDefault())
        } else if (field.template.nullable) {
          values.set(field.name, null)
        } else {
          missing.push(field.name)
        }
      }
      if (missing.length) {
        throw new FieldValidationError(
          'REQUIRED',
          `${modelName} is missing required field${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
          { field: missing[0], model: modelName },
          { missing }
        )
      }
      state.set(this, values)
    }

    toDict(): Record<string, unknown> {
      const values = stateOf(this, 'toDict')
      const result: Record<string, unknown> = {}
      for (const field of fields) {
        const value = values.get(field.name)
        result[field.name] = Array.isArray(value) ? [...value] : value
      }
      return result
    }

    toJSON(): Record<string, unknown> {
      const result: Record<string, unknown> = {}
      for (const [name, value] of Object.entries(this.toDict())) {
        result[name] = toJsonValue(value)
      }
      return result
    }
  }

  for (const field of fields) {
    Object.defineProperty(SynthesizedModel.prototype, field.name, {
      enumerable: true,
      configurable: false,
      get(this: object) {
        const value = stateOf(this, field.name).get(field.name)
        return Array.isArray(value) ? [...value] : value
      },
      set(this: object, value: unknown) {
        const values = stateOf(this, field.name)
        if (field.frozen) {
          throw new FieldValidationError('FROZEN_FIELD', `Field "${field.name}" of ${modelName} is frozen.`, {
            field: field.name,
            model: modelName
          })
        }
        values.set(field.name, field.parse(value, modelName))
      }
    })
  }

  for (const [name, behavior] of Object.entries(behaviors)) {
    Object.defineProperty(SynthesizedModel.prototype, name, {
      value: behavior,
      enumerable: false,
      writable: false,
      configurable: false
    })
  }

  Object.defineProperty(SynthesizedModel, 'name', { value: modelName })
  return SynthesizedModel
}

/**
 * Synthesizes concrete classes from schemas. Classes are cached by schema
 * content and behavior identity, so equal inputs hand back the same class.
 */
export class ModelFactory {
  private readonly cache: LruCache<string, ModelClass>

  constructor(options: ModelFactoryOptions = {}) {
    this.cache = new LruCache(options.cacheSize ?? getConfig().modelCacheSize)
  }

  build(schema: Schema, options: ModelBuildOptions = {}): ModelClass {
    const behaviors: ModelBehaviors = Object.freeze({ ...(options.behaviors ?? {}) })
    const key = `${schema.hash}|${Object.keys(behaviors)
      .sort()
      .map((name) => `${name}=${functionIdentity(behaviors[name])}`)
      .join(',')}`

    const cached = this.cache.get(key)
    if (cached) return cached

    assertBehaviorNames(schema, behaviors)
    const model = synthesize(schema, behaviors)
    this.cache.set(key, model)
    getLogger('fields').debug('model_synthesized', {
      model: schema.name,
      schemaHash: schema.hash,
      fields: schema.fieldNames.length,
      behaviors: Object.keys(behaviors).length
    })
    return model
  }

  get stats() {
    return { size: this.cache.size, hits: this.cache.hits, misses: this.cache.misses }
  }

  clear() {
    this.cache.clear()
  }
}

let modelFactory: ModelFactory | null = null

export function getModelFactory(): ModelFactory {
  if (!modelFactory) {
    modelFactory = new ModelFactory()
  }
  return modelFactory
}

export function resetModelFactory() {
  modelFactory = null
}

export function invokeBehavior(instance: ModelInstance, name: string, ...args: unknown[]): unknown {
  const behavior: unknown = instance[name]
  if (typeof behavior !== 'function') {
    throw new TypeError(`"${name}" is not a behavior of this model.`)
  }
  return Reflect.apply(behavior, instance, args)
}
