import { describe, expect, it } from 'vitest'
import { invokeBehavior, stringField, type ModelInstance } from '@modelforge/fields'

import { CAPABILITY } from '../src/builtins.js'
import { DependencyViolation } from '../src/errors.js'
import { createCapabilityRegistry } from '../src/registry.js'
import { DECLARED_MEMBERS } from '../src/structural-validator.js'

describe('layered capabilities on a hand-written class', () => {
  it('grows a record from identifiable to auditable', () => {
    const registry = createCapabilityRegistry()

    class Ledger {
      static readonly [DECLARED_MEMBERS]: string[] = ['id']
      id = 'record-1'
    }

    expect(registry.register(Ledger, CAPABILITY.identifiable).ok).toBe(true)

    expect(registry.register(Ledger, CAPABILITY.auditable)).toMatchObject({
      ok: false,
      reason: 'dependency',
      capability: 'auditable',
      missing: ['temporal']
    })

    expect(registry.register(Ledger, CAPABILITY.temporal)).toMatchObject({
      ok: false,
      reason: 'structural',
      missing: ['createdAt', 'updatedAt']
    })

    Ledger[DECLARED_MEMBERS].push('createdAt', 'updatedAt')

    const outcome = registry.register(Ledger, [CAPABILITY.temporal, CAPABILITY.auditable])
    expect(outcome).toMatchObject({ ok: true, created: ['temporal', 'auditable'] })
    expect(registry.getCapabilities(Ledger)).toEqual(['identifiable', 'temporal', 'auditable'])
    expect(registry.hasCapability(Ledger, CAPABILITY.auditable)).toBe(true)
  })
})

describe('synthesized models', () => {
  it('creates and extends a model from capabilities', () => {
    const registry = createCapabilityRegistry()

    const Account = registry.createModel('Account', ['identifiable', 'temporal', 'auditable'], {
      additionalFields: { email: stringField() }
    })

    expect(Account.modelName).toBe('Account')
    expect(Account.schema.fieldNames).toEqual(['id', 'createdAt', 'updatedAt', 'createdBy', 'updatedBy', 'email'])
    expect(Account.schema.requiredFields).toEqual(['email'])
    expect(registry.getCapabilities(Account)).toEqual(['identifiable', 'temporal', 'auditable'])

    const account: ModelInstance = new Account({ email: 'someone@example.com' })
    invokeBehavior(account, 'setCreatedBy', 'alice')
    expect(account.createdBy).toBe('alice')
    expect(account.updatedBy).toBe('alice')
    expect(invokeBehavior(account, 'getId')).toBe(account.id)

    const Tagged = registry.extendModel(Account, ['taggable'])
    expect(Tagged.schema.fieldNames).toEqual([
      'id',
      'createdAt',
      'updatedAt',
      'createdBy',
      'updatedBy',
      'tags',
      'email'
    ])
    expect(registry.getCapabilities(Tagged)).toEqual(['identifiable', 'temporal', 'auditable', 'taggable'])

    const tagged = new Tagged({ email: 'someone@example.com' })
    invokeBehavior(tagged, 'addTag', 'vip')
    invokeBehavior(tagged, 'addTag', 'vip')
    expect(tagged.tags).toEqual(['vip'])
    expect(invokeBehavior(tagged, 'setCreatedBy', 'bob')).toBeUndefined()
  })

  it('lets optional capability fields be omitted', () => {
    const registry = createCapabilityRegistry()
    registry.registerCapability({ name: 'nick', optionalFields: { nickname: stringField() } })

    const Person = registry.createModel('Person', ['nick'])

    expect(Person.schema.requiredFields).toEqual([])
    expect(Person.schema.get('nickname')?.metadata).toEqual({ required: false, capability: 'nick' })
    expect(new Person({}).nickname).toBeNull()
    expect(Person.fromDict({ nickname: 'Al' }).nickname).toBe('Al')
  })

  it('records every capability of an extended model', () => {
    const registry = createCapabilityRegistry()
    const Entry = registry.createModel('Entry', ['identifiable'])

    const Stamped = registry.extendModel(Entry, ['temporal'])

    expect(Entry.schema.metadata).toEqual({ capabilities: ['identifiable'] })
    expect(Stamped.schema.metadata).toEqual({ capabilities: ['identifiable', 'temporal'] })
    expect(Stamped.schema.fieldNames).toEqual(['id', 'createdAt', 'updatedAt'])
  })

  it('refuses to compose without prerequisites', () => {
    const registry = createCapabilityRegistry()

    const attempt = () => registry.createModel('Orphan', ['auditable'])

    expect(attempt).toThrow(DependencyViolation)
    try {
      attempt()
    } catch (error) {
      expect(error).toBeInstanceOf(DependencyViolation)
      if (error instanceof DependencyViolation) {
        expect(error.names).toEqual(['identifiable', 'temporal'])
      }
    }
  })

  it('returns the same class for the same request', () => {
    const registry = createCapabilityRegistry()
    const first = registry.createModel('Post', ['identifiable', 'taggable'])
    const second = registry.createModel('Post', ['identifiable', 'taggable'])

    expect(second).toBe(first)
    expect(registry.getPerformanceStats().compositionCache).toEqual({ size: 1, hits: 1, misses: 1 })
  })
})
