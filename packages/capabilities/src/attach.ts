import { getCapabilityRegistry, type CapabilityRegistry } from './registry.js'
import type { CapabilityTarget } from './structural-validator.js'

export type ImplementOptions = {
  registry?: CapabilityRegistry
  module?: string
}

/**
 * Wraps a class definition so it is registered as it is declared:
 *
 *   const Account = implement(['identifiable'])(class Account { ... })
 *
 * A failed check throws the matching capability error, so the class is never
 * handed back unregistered.
 */
export function implement(capabilities: string | readonly string[], options: ImplementOptions = {}) {
  return <T extends CapabilityTarget>(type: T): T => {
    const registry = options.registry ?? getCapabilityRegistry()
    registry.registerOrThrow(type, capabilities, { module: options.module })
    return type
  }
}
