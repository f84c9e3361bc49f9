export type CapabilityErrorCode = 'structural' | 'coherence' | 'dependency' | 'duplicate' | 'sealed' | 'unknown'

export class CapabilityError extends Error {
  readonly names: readonly string[]

  constructor(
    public readonly code: CapabilityErrorCode,
    message: string,
    names: readonly string[] = [],
    public readonly detail?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'CapabilityError'
    this.names = Object.freeze([...names])
  }
}

/** The type lacks members the capability requires. `names` lists them. */
export class StructuralViolation extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('structural', message, names, detail)
    this.name = 'StructuralViolation'
  }
}

/** Neither the type nor the capability is local. */
export class CoherenceViolation extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('coherence', message, names, detail)
    this.name = 'CoherenceViolation'
  }
}

/** Prerequisites are neither requested nor already held. `names` lists them. */
export class DependencyViolation extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('dependency', message, names, detail)
    this.name = 'DependencyViolation'
  }
}

export class DuplicateCapability extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('duplicate', message, names, detail)
    this.name = 'DuplicateCapability'
  }
}

export class SealedCapabilityViolation extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('sealed', message, names, detail)
    this.name = 'SealedCapabilityViolation'
  }
}

export class UnknownCapability extends CapabilityError {
  constructor(message: string, names: readonly string[] = [], detail?: Record<string, unknown>) {
    super('unknown', message, names, detail)
    this.name = 'UnknownCapability'
  }
}
