import { getConfig, getLogger, type OverwritePolicy } from '@modelforge/shared'
import {
  getModelFactory,
  SchemaBuilder,
  type FieldTemplate,
  type ModelBehavior,
  type ModelClass,
  type ModelFactory
} from '@modelforge/fields'

import { BUILTIN_CAPABILITIES } from './builtins.js'
import { BUILTIN_MODULE, CoherenceGuard } from './coherence-guard.js'
import { Composer, type ComposedCapability, type ComposeOptions, type ConflictResolver } from './composer.js'
import {
  CapabilityDefinition,
  defineCapability,
  type CapabilityDefinitionInput,
  type CapabilityPatch
} from './definition.js'
import { DependencyResolver } from './dependency-resolver.js'
import {
  CapabilityError,
  CoherenceViolation,
  DependencyViolation,
  DuplicateCapability,
  SealedCapabilityViolation,
  StructuralViolation,
  UnknownCapability
} from './errors.js'
import { StructuralValidator, type CapabilityTarget } from './structural-validator.js'

/** Non-owning handle to a registered type. */
export type TypeReference = {
  deref(): CapabilityTarget | undefined
}

export type ReferenceFactory = (target: CapabilityTarget) => TypeReference

export type ImplementationRecord = Readonly<{
  capability: string
  token: string
  typeName: string
  reference: TypeReference
  registeredAt: Date
}>

export type RegistrationFailureReason = 'structural' | 'coherence' | 'dependency' | 'unknown'

export type RegistrationOutcome =
  | {
      ok: true
      type: string
      capabilities: readonly string[]
      created: readonly string[]
      records: readonly ImplementationRecord[]
    }
  | {
      ok: false
      type: string
      capability: string
      reason: RegistrationFailureReason
      missing: readonly string[]
      message: string
    }

export type RegisterOptions = {
  /** Declaring module of the type; recorded on success. */
  module?: string
}

export type ModelOptions = RegisterOptions & {
  name?: string
  additionalFields?: Record<string, FieldTemplate>
  behaviors?: Record<string, ModelBehavior>
  conflictResolver?: ConflictResolver
}

export type CapabilityRegistryOptions = {
  createReference?: ReferenceFactory
  localModules?: readonly string[]
  overwritePolicy?: OverwritePolicy
  builtins?: boolean
  composer?: Composer
  modelFactory?: ModelFactory
  now?: () => Date
}

export type RegistryPerformanceStats = {
  registrations: number
  rejections: number
  lookups: number
  activeImplementations: number
  trackedTypes: number
  totalCapabilities: number
  sealedCapabilities: number
  compositionCache: { size: number; hits: number; misses: number }
}

type RegistrySnapshot = Readonly<{
  definitions: ReadonlyMap<string, CapabilityDefinition>
  sealed: ReadonlySet<string>
  localModules: ReadonlySet<string>
  records: ReadonlyMap<string, readonly ImplementationRecord[]>
}>

type FailedOutcome = Extract<RegistrationOutcome, { ok: false }>

const defaultReference: ReferenceFactory = (target) => new WeakRef(target)

function typeNameOf(type: CapabilityTarget): string {
  return type.name || 'anonymous'
}

function asList(names: string | readonly string[]): string[] {
  return Array.from(new Set(typeof names === 'string' ? [names] : names))
}

/** Typed error for a rejected registration. */
export function outcomeToError(outcome: FailedOutcome): CapabilityError {
  const detail = { type: outcome.type, capability: outcome.capability }
  switch (outcome.reason) {
    case 'structural':
      return new StructuralViolation(outcome.message, outcome.missing, detail)
    case 'coherence':
      return new CoherenceViolation(outcome.message, outcome.missing, detail)
    case 'dependency':
      return new DependencyViolation(outcome.message, outcome.missing, detail)
    case 'unknown':
      return new UnknownCapability(outcome.message, outcome.missing, detail)
  }
}

/**
 * Process-wide store of capability definitions and (type, capability)
 * registrations.
 *
 * State lives in one immutable snapshot. Every write validates against the
 * current snapshot, builds the next one and publishes it with a single
 * assignment, so readers never see a half-applied registration. Types are
 * held through non-owning references; `cleanupOrphanedReferences()` sweeps
 * records whose type has been reclaimed.
 */
export class CapabilityRegistry {
  private state: RegistrySnapshot
  private tokens = new WeakMap<CapabilityTarget, string>()
  private typeModules = new WeakMap<CapabilityTarget, string>()
  private nextToken = 0
  private counters = { registrations: 0, rejections: 0, lookups: 0 }

  private readonly createReference: ReferenceFactory
  private readonly overwritePolicy: OverwritePolicy
  private readonly initialModules: readonly string[]
  private readonly includeBuiltins: boolean
  private readonly composer: Composer
  private readonly modelFactory: ModelFactory
  private readonly now: () => Date
  private readonly structural = new StructuralValidator()

  constructor(options: CapabilityRegistryOptions = {}) {
    const config = getConfig()
    this.createReference = options.createReference ?? defaultReference
    this.overwritePolicy = options.overwritePolicy ?? config.overwritePolicy
    this.initialModules = [BUILTIN_MODULE, ...(options.localModules ?? config.localModules)]
    this.includeBuiltins = options.builtins ?? true
    this.composer = options.composer ?? new Composer()
    this.modelFactory = options.modelFactory ?? getModelFactory()
    this.now = options.now ?? (() => new Date())
    this.state = this.initialSnapshot()
  }

  registerCapability(input: CapabilityDefinition | CapabilityDefinitionInput): CapabilityDefinition {
    const definition = input instanceof CapabilityDefinition ? input : defineCapability(input)
    const snapshot = this.state
    if (snapshot.sealed.has(definition.name)) {
      throw new DuplicateCapability(`Capability "${definition.name}" is sealed and cannot be redefined.`, [definition.name])
    }
    const existing = snapshot.definitions.get(definition.name)
    if (existing && this.overwritePolicy === 'reject') {
      throw new DuplicateCapability(`Capability "${definition.name}" is already defined.`, [definition.name], {
        policy: this.overwritePolicy
      })
    }

    const definitions = new Map(snapshot.definitions)
    definitions.set(definition.name, definition)
    this.state = { ...snapshot, definitions }

    getLogger('capabilities').info(existing ? 'capability_overwritten' : 'capability_defined', {
      capability: definition.name,
      version: definition.version,
      revision: definition.revision,
      ...(existing ? { previousVersion: existing.version } : {})
    })
    return definition
  }

  amendCapability(name: string, patch: CapabilityPatch): CapabilityDefinition {
    const snapshot = this.state
    const current = this.requireDefinition(snapshot, name)
    if (snapshot.sealed.has(name)) {
      throw new SealedCapabilityViolation(`Capability "${name}" is sealed; its members cannot change.`, [name])
    }
    const amended = current.withMembers(patch)
    const definitions = new Map(snapshot.definitions)
    definitions.set(name, amended)
    this.state = { ...snapshot, definitions }

    getLogger('capabilities').info('capability_amended', {
      capability: name,
      revision: amended.revision,
      requiredMembers: amended.requiredMembers.map((member) => member.name)
    })
    return amended
  }

  sealCapability(name: string) {
    const snapshot = this.state
    this.requireDefinition(snapshot, name)
    if (snapshot.sealed.has(name)) return
    const sealed = new Set(snapshot.sealed)
    sealed.add(name)
    this.state = { ...snapshot, sealed }
    getLogger('capabilities').info('capability_sealed', { capability: name })
  }

  isSealed(name: string): boolean {
    return this.state.sealed.has(name)
  }

  getCapabilityDefinition(name: string): CapabilityDefinition | undefined {
    this.counters.lookups += 1
    return this.state.definitions.get(name)
  }

  /** Definitions that contribute `fieldName`, required or optional. */
  findCapabilitiesWithField(fieldName: string): CapabilityDefinition[] {
    this.counters.lookups += 1
    return Array.from(this.state.definitions.values()).filter(
      (definition) =>
        Object.prototype.hasOwnProperty.call(definition.fields, fieldName) ||
        Object.prototype.hasOwnProperty.call(definition.optionalFields, fieldName)
    )
  }

  listCapabilities(): CapabilityDefinition[] {
    return Array.from(this.state.definitions.values())
  }

  getDependencyGraph(): Record<string, string[]> {
    return new DependencyResolver(this.state.definitions).graph()
  }

  /**
   * Attaches capabilities to a type. Each capability is checked structurally,
   * then for coherence, then for prerequisites (against the requested set plus
   * what the type already holds). The first failure rejects the whole request
   * and leaves the registry untouched.
   */
  register(type: CapabilityTarget, capabilities: string | readonly string[], options: RegisterOptions = {}): RegistrationOutcome {
    const snapshot = this.state
    const names = asList(capabilities)
    const typeName = typeNameOf(type)
    const token = this.tokens.get(type)
    const existing = token ? (snapshot.records.get(token) ?? []) : []
    const held = new Set(existing.map((record) => record.capability))

    const failure = this.validate(snapshot, type, typeName, names, held, options.module)
    if (failure) {
      this.counters.rejections += 1
      getLogger('capabilities').warn('capability_registration_rejected', {
        type: typeName,
        capability: failure.capability,
        reason: failure.reason,
        missing: failure.missing
      })
      return failure
    }

    const pending = names.filter((name) => !held.has(name))
    if (!pending.length) {
      return {
        ok: true,
        type: typeName,
        capabilities: names,
        created: [],
        records: existing.filter((record) => names.includes(record.capability))
      }
    }

    const resolvedToken = token ?? this.allocateToken()
    const registeredAt = this.now()
    const reference = existing[0]?.reference ?? this.createReference(type)
    const created: ImplementationRecord[] = pending.map((capability) =>
      Object.freeze({ capability, token: resolvedToken, typeName, reference, registeredAt })
    )
    const allRecords = [...existing, ...created]

    const records = new Map(snapshot.records)
    records.set(resolvedToken, Object.freeze(allRecords))
    this.state = { ...snapshot, records }
    if (!token) this.tokens.set(type, resolvedToken)
    if (options.module !== undefined) this.typeModules.set(type, options.module)
    this.counters.registrations += created.length

    getLogger('capabilities').info('capability_registered', {
      type: typeName,
      token: resolvedToken,
      capabilities: pending
    })
    return {
      ok: true,
      type: typeName,
      capabilities: names,
      created: pending,
      records: allRecords.filter((record) => names.includes(record.capability))
    }
  }

  registerOrThrow(
    type: CapabilityTarget,
    capabilities: string | readonly string[],
    options: RegisterOptions = {}
  ): readonly ImplementationRecord[] {
    const outcome = this.register(type, capabilities, options)
    if (!outcome.ok) {
      throw outcomeToError(outcome)
    }
    return outcome.records
  }

  /** Registered membership first; unregistered types fall back to a structural check. */
  hasCapability(type: CapabilityTarget, name: string): boolean {
    this.counters.lookups += 1
    const snapshot = this.state
    const token = this.tokens.get(type)
    const records = token ? snapshot.records.get(token) : undefined
    if (records?.some((record) => record.capability === name)) {
      return true
    }
    const definition = snapshot.definitions.get(name)
    return definition ? this.structural.validate(type, definition).ok : false
  }

  getCapabilities(type: CapabilityTarget): string[] {
    this.counters.lookups += 1
    const token = this.tokens.get(type)
    const records = token ? this.state.records.get(token) : undefined
    return records ? records.map((record) => record.capability) : []
  }

  getImplementationRecord(type: CapabilityTarget, name: string): ImplementationRecord | undefined {
    this.counters.lookups += 1
    const token = this.tokens.get(type)
    const records = token ? this.state.records.get(token) : undefined
    return records?.find((record) => record.capability === name)
  }

  getPerformanceStats(): RegistryPerformanceStats {
    const snapshot = this.state
    let activeImplementations = 0
    for (const records of snapshot.records.values()) {
      activeImplementations += records.length
    }
    return {
      ...this.counters,
      activeImplementations,
      trackedTypes: snapshot.records.size,
      totalCapabilities: snapshot.definitions.size,
      sealedCapabilities: snapshot.sealed.size,
      compositionCache: this.composer.stats
    }
  }

  addLocalModule(name: string) {
    const trimmed = name.trim()
    if (!trimmed) {
      throw new TypeError('Local module names must be non-empty.')
    }
    const snapshot = this.state
    if (snapshot.localModules.has(trimmed)) return
    const localModules = new Set(snapshot.localModules)
    localModules.add(trimmed)
    this.state = { ...snapshot, localModules }
  }

  get localModules(): ReadonlySet<string> {
    return this.state.localModules
  }

  setTypeModule(type: CapabilityTarget, module: string) {
    this.typeModules.set(type, module)
  }

  /** Removes records whose type has been reclaimed. Each reference is re-read as it is visited. */
  cleanupOrphanedReferences(): number {
    const snapshot = this.state
    const records = new Map<string, readonly ImplementationRecord[]>()
    let removed = 0
    for (const [token, entries] of snapshot.records) {
      const live = entries.filter((record) => record.reference.deref() !== undefined)
      removed += entries.length - live.length
      if (live.length) {
        records.set(token, live.length === entries.length ? entries : Object.freeze(live))
      }
    }
    if (removed > 0) {
      this.state = { ...snapshot, records }
      getLogger('capabilities').info('orphaned_references_cleaned', { removed })
    }
    return removed
  }

  /** Drops every record of `type`. Returns the number removed. */
  unregisterType(type: CapabilityTarget): number {
    const token = this.tokens.get(type)
    if (!token) return 0
    const snapshot = this.state
    const entries = snapshot.records.get(token) ?? []
    const records = new Map(snapshot.records)
    records.delete(token)
    this.state = { ...snapshot, records }
    this.tokens.delete(type)
    getLogger('capabilities').info('capability_type_unregistered', {
      type: typeNameOf(type),
      token,
      removed: entries.length
    })
    return entries.length
  }

  reset() {
    this.state = this.initialSnapshot()
    this.tokens = new WeakMap()
    this.typeModules = new WeakMap()
    this.counters = { registrations: 0, rejections: 0, lookups: 0 }
    this.composer.clear()
    getLogger('capabilities').info('capability_registry_reset', {
      capabilities: this.state.definitions.size
    })
  }

  compose(names: readonly string[], options: ComposeOptions = {}): ComposedCapability {
    const snapshot = this.state
    const requested = asList(names)
    const unknown = requested.filter((name) => !snapshot.definitions.has(name))
    if (unknown.length) {
      throw new UnknownCapability(`Unknown capabilities: ${unknown.join(', ')}`, unknown)
    }
    const dependencies = new DependencyResolver(snapshot.definitions).resolve(requested)
    if (!dependencies.ok) {
      throw new DependencyViolation(
        `Composition of ${requested.join(', ')} is missing prerequisites: ${dependencies.missing.join(', ')}`,
        dependencies.missing
      )
    }
    const definitions = requested.map((name) => this.requireDefinition(snapshot, name))
    return this.composer.compose(definitions, options)
  }

  /** Composes capabilities into a schema, synthesizes a class and registers it. */
  createModel(name: string, capabilities: readonly string[], options: ModelOptions = {}): ModelClass {
    const composed = this.compose(capabilities, { conflictResolver: options.conflictResolver, name })
    let schema = composed.toSchema(name)
    if (options.additionalFields) {
      schema = schema.extend(options.additionalFields)
    }
    const model = this.modelFactory.build(schema, {
      behaviors: { ...composed.behaviorMap(), ...(options.behaviors ?? {}) }
    })
    this.registerOrThrow(model, composed.capabilities, { module: options.module })
    return model
  }

  /** Adds capabilities to an existing model. Fields and behaviors the model already has take precedence. */
  extendModel(model: ModelClass, capabilities: readonly string[], options: ModelOptions = {}): ModelClass {
    const name = options.name ?? model.modelName
    const combined = asList([...this.getCapabilities(model), ...capabilities])
    const composed = this.compose(combined, { conflictResolver: options.conflictResolver, name })
    const merged = composed.toSchema(name).merge(model.schema, name)
    let schema = new SchemaBuilder(name)
      .extend(merged)
      .withMetadata({ ...merged.metadata, capabilities: [...composed.capabilities] })
      .build()
    if (options.additionalFields) {
      schema = schema.extend(options.additionalFields)
    }
    const extended = this.modelFactory.build(schema, {
      behaviors: { ...composed.behaviorMap(), ...model.behaviors, ...(options.behaviors ?? {}) }
    })
    this.registerOrThrow(extended, composed.capabilities, { module: options.module })
    return extended
  }

  private validate(
    snapshot: RegistrySnapshot,
    type: CapabilityTarget,
    typeName: string,
    names: readonly string[],
    held: ReadonlySet<string>,
    module: string | undefined
  ): FailedOutcome | undefined {
    const coherence = new CoherenceGuard({
      localModules: snapshot.localModules,
      moduleOf: (target) => (target === type && module !== undefined ? module : this.typeModules.get(target))
    })
    const dependencies = new DependencyResolver(snapshot.definitions)
    const available = new Set([...names, ...held])

    for (const name of names) {
      const fail = (reason: RegistrationFailureReason, missing: readonly string[], message: string): FailedOutcome => ({
        ok: false,
        type: typeName,
        capability: name,
        reason,
        missing,
        message
      })

      const definition = snapshot.definitions.get(name)
      if (!definition) {
        return fail('unknown', [name], `Capability "${name}" is not defined.`)
      }
      if (held.has(name)) continue

      const structural = this.structural.validate(type, definition)
      if (!structural.ok) {
        return fail(
          'structural',
          structural.missing,
          `${typeName} does not satisfy "${name}": missing ${structural.issues
            .map((issue) => (issue.found === 'missing' ? issue.name : `${issue.name} (expected ${issue.expected})`))
            .join(', ')}`
        )
      }

      const coherent = coherence.validate(type, definition)
      if (!coherent.ok) {
        return fail(
          'coherence',
          [name, typeName],
          `Neither ${typeName} (${coherent.typeModule ?? 'local'}) nor "${name}" (${definition.module ?? 'local'}) is local to this registry.`
        )
      }

      const required = new Set(dependencies.closure([name]))
      const missing = dependencies.resolve(available).missing.filter((prerequisite) => required.has(prerequisite))
      if (missing.length) {
        return fail('dependency', missing, `"${name}" on ${typeName} requires: ${missing.join(', ')}`)
      }
    }
    return undefined
  }

  private requireDefinition(snapshot: RegistrySnapshot, name: string): CapabilityDefinition {
    const definition = snapshot.definitions.get(name)
    if (!definition) {
      throw new UnknownCapability(`Capability "${name}" is not defined.`, [name])
    }
    return definition
  }

  private allocateToken(): string {
    this.nextToken += 1
    return `type_${this.nextToken}`
  }

  private initialSnapshot(): RegistrySnapshot {
    const definitions = new Map<string, CapabilityDefinition>()
    if (this.includeBuiltins) {
      for (const definition of BUILTIN_CAPABILITIES) {
        definitions.set(definition.name, definition)
      }
    }
    return Object.freeze({
      definitions,
      sealed: new Set<string>(),
      localModules: new Set(this.initialModules),
      records: new Map<string, readonly ImplementationRecord[]>()
    })
  }
}

export function createCapabilityRegistry(options?: CapabilityRegistryOptions): CapabilityRegistry {
  return new CapabilityRegistry(options)
}

let registry: CapabilityRegistry | null = null

export function getCapabilityRegistry(): CapabilityRegistry {
  if (!registry) {
    registry = createCapabilityRegistry()
  }
  return registry
}

export function setCapabilityRegistry(instance: CapabilityRegistry | null) {
  registry = instance
}

export function resetCapabilityRegistry() {
  registry = null
}
