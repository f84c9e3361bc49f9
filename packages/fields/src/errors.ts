export type FieldContractViolationCode =
  | 'DEFAULT_CONFLICT'
  | 'INVALID_FIELD_NAME'
  | 'FROZEN_OVERRIDE'
  | 'RESERVED_FIELD_NAME'
  | 'MEMBER_COLLISION'

export class FieldContractViolation extends Error {
  constructor(
    public readonly code: FieldContractViolationCode,
    message: string,
    public readonly detail?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'FieldContractViolation'
  }
}

export type FieldValidationErrorCode =
  | 'REQUIRED'
  | 'NULL_NOT_ALLOWED'
  | 'TYPE_MISMATCH'
  | 'VALIDATOR_FAILED'
  | 'FROZEN_FIELD'

export type FieldValidationContext = {
  field?: string
  model?: string
}

export class FieldValidationError extends Error {
  public readonly field: string | undefined
  public readonly model: string | undefined

  constructor(
    public readonly code: FieldValidationErrorCode,
    message: string,
    context: FieldValidationContext = {},
    public readonly detail?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FieldValidationError'
    this.field = context.field
    this.model = context.model
  }
}
