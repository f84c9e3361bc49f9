import { describe, expect, it } from 'vitest'

import { CoherenceGuard, isModuleWithin } from '../src/coherence-guard.js'
import { defineCapability } from '../src/definition.js'
import type { CapabilityTarget } from '../src/structural-validator.js'

class Foreign {}
class Local {}

const modules = new Map<CapabilityTarget, string>([[Foreign, 'vendor.orm']])
const guard = new CoherenceGuard({
  localModules: new Set(['app', 'lib/models']),
  moduleOf: (type) => modules.get(type)
})

const vendorCapability = defineCapability({ name: 'vendorCapability', module: 'vendor.capabilities' })
const localCapability = defineCapability({ name: 'localCapability' })

describe('isModuleWithin', () => {
  it('matches exact names and nested modules only', () => {
    expect(isModuleWithin('app', 'app')).toBe(true)
    expect(isModuleWithin('app.models', 'app')).toBe(true)
    expect(isModuleWithin('app/models', 'app')).toBe(true)
    expect(isModuleWithin('application', 'app')).toBe(false)
    expect(isModuleWithin('ap', 'app')).toBe(false)
  })
})

describe('CoherenceGuard', () => {
  it('treats undeclared modules as local', () => {
    expect(guard.isLocalModule(undefined)).toBe(true)
    expect(guard.isLocalModule('lib/models/user')).toBe(true)
    expect(guard.isLocalModule('lib')).toBe(false)
    expect(guard.isLocalType(Local)).toBe(true)
    expect(guard.isLocalType(Foreign)).toBe(false)
    expect(guard.isLocalCapability(localCapability)).toBe(true)
    expect(guard.isLocalCapability(vendorCapability)).toBe(false)
  })

  it('needs one local side', () => {
    expect(guard.validate(Foreign, vendorCapability)).toEqual({
      ok: false,
      typeModule: 'vendor.orm',
      capabilityModule: 'vendor.capabilities'
    })
    expect(guard.validate(Foreign, localCapability).ok).toBe(true)
    expect(guard.validate(Local, vendorCapability).ok).toBe(true)
  })
})
