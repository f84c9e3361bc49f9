import type { CapabilityDefinition } from './definition.js'
import type { CapabilityTarget } from './structural-validator.js'

export const BUILTIN_MODULE = '@modelforge/capabilities'

export type CoherenceContext = {
  localModules: ReadonlySet<string>
  moduleOf: (type: CapabilityTarget) => string | undefined
}

export type CoherenceResult = {
  ok: boolean
  typeModule: string | undefined
  capabilityModule: string | undefined
}

/** True when `module` equals `root` or sits below it (`root.x` or `root/x`). */
export function isModuleWithin(module: string, root: string): boolean {
  if (module === root) return true
  if (!module.startsWith(root)) return false
  const separator = module.charAt(root.length)
  return separator === '.' || separator === '/'
}

/**
 * Orphan rule: a capability may be attached to a type only when the type or
 * the capability belongs to the registering party.
 */
export class CoherenceGuard {
  constructor(private readonly context: CoherenceContext) {}

  /** Anything declared without a module is treated as in-process code. */
  isLocalModule(module: string | undefined): boolean {
    if (module === undefined) return true
    for (const root of this.context.localModules) {
      if (isModuleWithin(module, root)) return true
    }
    return false
  }

  isLocalType(type: CapabilityTarget): boolean {
    return this.isLocalModule(this.context.moduleOf(type))
  }

  isLocalCapability(definition: CapabilityDefinition): boolean {
    return this.isLocalModule(definition.module)
  }

  validate(type: CapabilityTarget, definition: CapabilityDefinition): CoherenceResult {
    const typeModule = this.context.moduleOf(type)
    return {
      ok: this.isLocalModule(typeModule) || this.isLocalCapability(definition),
      typeModule,
      capabilityModule: definition.module
    }
  }
}
