import { describe, expect, it } from 'vitest'
import { ID_FROZEN } from '@modelforge/fields'

import { defineCapability } from '../src/definition.js'
import { DECLARED_MEMBERS, inspectMembers, StructuralValidator } from '../src/structural-validator.js'

const identity = defineCapability({ name: 'identity', fields: { id: ID_FROZEN } })
const greeter = defineCapability({
  name: 'greeter',
  requiredMembers: [{ name: 'greet', kind: 'callable' }, 'label']
})

class WithAccessor {
  get id() {
    return 'fixed'
  }
}

class WithDeclared {
  static readonly [DECLARED_MEMBERS] = ['id']
  id = 'declared'
}

class Parent {
  greet() {
    return 'hi'
  }
}

class Child extends Parent {
  static readonly [DECLARED_MEMBERS] = ['label']
}

class Impostor {
  static readonly [DECLARED_MEMBERS] = ['greet', 'label']
}

class Empty {}

describe('StructuralValidator', () => {
  const validator = new StructuralValidator()

  it('accepts accessors and declared members as attributes', () => {
    expect(validator.validate(WithAccessor, identity).ok).toBe(true)
    expect(validator.validate(WithDeclared, identity).ok).toBe(true)
  })

  it('reports missing members', () => {
    expect(validator.validate(Empty, identity)).toEqual({
      ok: false,
      missing: ['id'],
      issues: [{ name: 'id', expected: 'attribute', found: 'missing' }]
    })
  })

  it('walks the prototype chain for callables', () => {
    expect(inspectMembers(Child)).toEqual(
      new Map([
        ['greet', 'callable'],
        ['label', 'attribute']
      ])
    )
    expect(validator.validate(Child, greeter).ok).toBe(true)
  })

  it('requires callables to be functions', () => {
    expect(validator.validate(Impostor, greeter)).toEqual({
      ok: false,
      missing: ['greet'],
      issues: [{ name: 'greet', expected: 'callable', found: 'attribute' }]
    })
  })
})
