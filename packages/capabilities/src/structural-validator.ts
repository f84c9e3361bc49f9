import type { CapabilityDefinition, MemberKind } from './definition.js'

/** Any class that can carry capabilities. */
export type CapabilityTarget = abstract new (...args: never[]) => object

/**
 * Static member under which a class lists attributes it sets per instance
 * (class fields are not visible on the prototype).
 */
export const DECLARED_MEMBERS: unique symbol = Symbol('modelforge.declaredMembers')

export type StructuralIssue = {
  name: string
  expected: MemberKind
  found: MemberKind | 'missing'
}

export type StructuralResult = {
  ok: boolean
  missing: string[]
  issues: StructuralIssue[]
}

function declaredMembersOf(type: CapabilityTarget): string[] {
  const names: string[] = []
  let current: unknown = type
  while (typeof current === 'function' && current !== Function.prototype) {
    if (Object.prototype.hasOwnProperty.call(current, DECLARED_MEMBERS)) {
      const declared: unknown = Reflect.get(current, DECLARED_MEMBERS)
      if (Array.isArray(declared)) {
        for (const entry of declared) {
          if (typeof entry === 'string') names.push(entry)
        }
      }
    }
    current = Object.getPrototypeOf(current)
  }
  return names
}

/**
 * Members a class exposes: everything on its prototype chain below
 * `Object.prototype` (functions are callables, accessors and plain values are
 * attributes) plus its declared members.
 */
export function inspectMembers(type: CapabilityTarget): Map<string, MemberKind> {
  const members = new Map<string, MemberKind>()
  let proto: unknown = type.prototype
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(proto)) {
      if (key === 'constructor' || members.has(key)) continue
      const descriptor = Object.getOwnPropertyDescriptor(proto, key)
      if (!descriptor) continue
      const isAccessor = descriptor.get !== undefined || descriptor.set !== undefined
      members.set(key, !isAccessor && typeof descriptor.value === 'function' ? 'callable' : 'attribute')
    }
    proto = Object.getPrototypeOf(proto)
  }
  for (const name of declaredMembersOf(type)) {
    if (!members.has(name)) members.set(name, 'attribute')
  }
  return members
}

export class StructuralValidator {
  validate(type: CapabilityTarget, definition: CapabilityDefinition): StructuralResult {
    const members = inspectMembers(type)
    const issues: StructuralIssue[] = []
    for (const requirement of definition.requiredMembers) {
      const found = members.get(requirement.name)
      if (!found) {
        issues.push({ name: requirement.name, expected: requirement.kind, found: 'missing' })
      } else if (requirement.kind === 'callable' && found !== 'callable') {
        issues.push({ name: requirement.name, expected: 'callable', found })
      }
    }
    return { ok: issues.length === 0, missing: issues.map((issue) => issue.name), issues }
  }
}
