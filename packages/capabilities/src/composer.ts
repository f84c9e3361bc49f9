import { functionIdentity, getConfig, getLogger, LruCache } from '@modelforge/shared'
import { SchemaBuilder, type FieldTemplate, type ModelBehavior, type Schema } from '@modelforge/fields'

import { optionalTemplate, type CapabilityDefinition, type MemberKind, type MemberSpec } from './definition.js'

export type ComposedField = {
  readonly kind: 'field'
  readonly name: string
  readonly template: FieldTemplate
  readonly required: boolean
  readonly owner: string
}

export type ComposedBehavior = {
  readonly kind: 'behavior'
  readonly name: string
  readonly implementation: ModelBehavior
  readonly owner: string
}

export type ComposedEntry = ComposedField | ComposedBehavior

/** Decides which entry survives when two capabilities contribute the same name. */
export type ConflictResolver = (
  name: string,
  previous: ComposedEntry,
  incoming: ComposedEntry,
  owner: string
) => ComposedEntry

export const firstWins: ConflictResolver = (_name, previous) => previous
export const lastWins: ConflictResolver = (_name, _previous, incoming) => incoming

export type CompositionConflict = {
  readonly name: string
  readonly previousOwner: string
  readonly incomingOwner: string
  readonly winner: string
}

export type ComposeOptions = {
  conflictResolver?: ConflictResolver
  name?: string
}

export type ComposerOptions = {
  cacheSize?: number
}

export class ComposedCapability {
  readonly capabilities: readonly string[]
  readonly fields: ReadonlyMap<string, ComposedField>
  readonly behaviors: ReadonlyMap<string, ComposedBehavior>

  constructor(
    readonly name: string,
    readonly definitions: readonly CapabilityDefinition[],
    entries: ReadonlyMap<string, ComposedEntry>,
    readonly requiredMembers: readonly MemberSpec[],
    readonly optionalMembers: readonly MemberSpec[],
    readonly prerequisites: readonly string[],
    readonly conflicts: readonly CompositionConflict[]
  ) {
    this.capabilities = Object.freeze(definitions.map((definition) => definition.name))
    const fields = new Map<string, ComposedField>()
    const behaviors = new Map<string, ComposedBehavior>()
    for (const entry of entries.values()) {
      if (entry.kind === 'field') fields.set(entry.name, entry)
      else behaviors.set(entry.name, entry)
    }
    this.fields = fields
    this.behaviors = behaviors
  }

  get fieldNames(): string[] {
    return Array.from(this.fields.keys())
  }

  behaviorMap(): Record<string, ModelBehavior> {
    const result: Record<string, ModelBehavior> = {}
    for (const [name, behavior] of this.behaviors) {
      result[name] = behavior.implementation
    }
    return result
  }

  toSchema(name: string = this.name): Schema {
    const builder = new SchemaBuilder(name).withMetadata({ capabilities: [...this.capabilities] })
    for (const field of this.fields.values()) {
      builder.addField(field.name, field.required ? field.template : optionalTemplate(field.template), {
        required: field.required,
        capability: field.owner
      })
    }
    return builder.build()
  }
}

function mergeMembers(target: Map<string, MemberKind>, specs: readonly MemberSpec[]) {
  for (const spec of specs) {
    const existing = target.get(spec.name)
    if (!existing || (existing === 'attribute' && spec.kind === 'callable')) {
      target.set(spec.name, spec.kind)
    }
  }
}

function toSpecs(members: Map<string, MemberKind>): MemberSpec[] {
  return Array.from(members, ([name, kind]) => ({ name, kind }))
}

function entriesOf(definition: CapabilityDefinition): ComposedEntry[] {
  const owner = definition.name
  return [
    ...Object.entries(definition.fields).map(
      ([name, template]): ComposedEntry => ({ kind: 'field', name, template, required: true, owner })
    ),
    ...Object.entries(definition.optionalFields).map(
      ([name, template]): ComposedEntry => ({ kind: 'field', name, template, required: false, owner })
    ),
    ...Object.entries(definition.behaviors).map(
      ([name, implementation]): ComposedEntry => ({ kind: 'behavior', name, implementation, owner })
    )
  ]
}

/**
 * Merges capability definitions into one aggregate. Pure over its inputs.
 * Results are cached by the set of definitions (name and revision), the
 * resolver and the result name: a repeated request for the same set returns
 * the aggregate built for the first request, whatever order it lists them in.
 */
export class Composer {
  private readonly cache: LruCache<string, ComposedCapability>

  constructor(options: ComposerOptions = {}) {
    this.cache = new LruCache(options.cacheSize ?? getConfig().compositionCacheSize)
  }

  compose(definitions: readonly CapabilityDefinition[], options: ComposeOptions = {}): ComposedCapability {
    const ordered = this.dedupe(definitions)
    const resolver = options.conflictResolver ?? firstWins
    const members = ordered.map((definition) => `${definition.name}@${definition.revision}`).sort()
    const name = options.name ?? (ordered.map((definition) => definition.name).sort().join('_') || 'composed')
    const key = [members.join(','), functionIdentity(resolver), name].join('|')

    const cached = this.cache.get(key)
    if (cached) return cached

    const composed = this.merge(ordered, resolver, name)
    this.cache.set(key, composed)
    getLogger('capabilities').debug('capabilities_composed', {
      name,
      capabilities: composed.capabilities,
      fields: composed.fieldNames.length,
      behaviors: composed.behaviors.size,
      conflicts: composed.conflicts.length
    })
    return composed
  }

  /** Definitions an aggregate was built from; a plain definition decomposes to itself. */
  decompose(target: ComposedCapability | CapabilityDefinition): readonly CapabilityDefinition[] {
    return target instanceof ComposedCapability ? target.definitions : [target]
  }

  isComposed(target: ComposedCapability | CapabilityDefinition): target is ComposedCapability {
    return target instanceof ComposedCapability
  }

  get stats() {
    return { size: this.cache.size, hits: this.cache.hits, misses: this.cache.misses }
  }

  clear() {
    this.cache.clear()
  }

  private dedupe(definitions: readonly CapabilityDefinition[]): CapabilityDefinition[] {
    const seen = new Set<string>()
    return definitions.filter((definition) => {
      if (seen.has(definition.name)) return false
      seen.add(definition.name)
      return true
    })
  }

  private merge(definitions: CapabilityDefinition[], resolver: ConflictResolver, name: string): ComposedCapability {
    const entries = new Map<string, ComposedEntry>()
    const conflicts: CompositionConflict[] = []
    const required = new Map<string, MemberKind>()
    const optional = new Map<string, MemberKind>()
    const names = definitions.map((definition) => definition.name)
    const prerequisites: string[] = []

    for (const definition of definitions) {
      for (const incoming of entriesOf(definition)) {
        const previous = entries.get(incoming.name)
        if (!previous) {
          entries.set(incoming.name, incoming)
          continue
        }
        const winner = resolver(incoming.name, previous, incoming, definition.name)
        const stillRequired =
          (previous.kind === 'field' && previous.required) || (incoming.kind === 'field' && incoming.required)
        entries.set(
          incoming.name,
          winner.kind === 'field' && stillRequired && !winner.required ? { ...winner, required: true } : winner
        )
        conflicts.push({
          name: incoming.name,
          previousOwner: previous.owner,
          incomingOwner: incoming.owner,
          winner: winner.owner
        })
      }

      mergeMembers(required, definition.requiredMembers)
      mergeMembers(optional, definition.optionalMembers)
      for (const prerequisite of definition.prerequisites) {
        if (!names.includes(prerequisite) && !prerequisites.includes(prerequisite)) {
          prerequisites.push(prerequisite)
        }
      }
    }

    for (const memberName of required.keys()) {
      optional.delete(memberName)
    }

    return new ComposedCapability(
      name,
      Object.freeze([...definitions]),
      entries,
      Object.freeze(toSpecs(required)),
      Object.freeze(toSpecs(optional)),
      Object.freeze(prerequisites),
      Object.freeze(conflicts)
    )
  }
}
