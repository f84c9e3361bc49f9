import { z } from 'zod'
import { FieldTemplate, SchemaBuilder, type ModelBehavior, type ModelBehaviors, type Schema } from '@modelforge/fields'

export const MEMBER_KINDS = ['attribute', 'callable'] as const
export type MemberKind = (typeof MEMBER_KINDS)[number]

export type MemberSpec = {
  readonly name: string
  readonly kind: MemberKind
}

const MEMBER_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/
const CAPABILITY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/

export const CapabilityNameSchema = z
  .string()
  .regex(CAPABILITY_NAME_PATTERN, 'Capability names start with a letter or underscore and contain no spaces.')

const MemberNameSchema = z.string().regex(MEMBER_NAME_PATTERN, 'Member names must be bare identifiers.')

/** Bare names are attribute requirements. */
const MemberSpecSchema = z.union([
  MemberNameSchema.transform((name): MemberSpec => ({ name, kind: 'attribute' })),
  z.object({ name: MemberNameSchema, kind: z.enum(MEMBER_KINDS) })
])

const FieldTemplateSchema = z.instanceof(FieldTemplate)
const BehaviorSchema = z.custom<ModelBehavior>((value) => typeof value === 'function', {
  message: 'Behaviors must be functions.'
})

export const CapabilityDefinitionInputSchema = z
  .object({
    name: CapabilityNameSchema,
    version: z.string().min(1).default('1.0.0'),
    description: z.string().default(''),
    module: z.string().min(1).optional(),
    prerequisites: z.array(CapabilityNameSchema).default([]),
    requiredMembers: z.array(MemberSpecSchema).default([]),
    optionalMembers: z.array(MemberSpecSchema).default([]),
    fields: z.record(MemberNameSchema, FieldTemplateSchema).default({}),
    optionalFields: z.record(MemberNameSchema, FieldTemplateSchema).default({}),
    behaviors: z.record(MemberNameSchema, BehaviorSchema).default({})
  })
  .superRefine((value, ctx) => {
    if (value.prerequisites.includes(value.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['prerequisites'],
        message: `Capability "${value.name}" cannot list itself as a prerequisite.`
      })
    }
    const owners = new Map<string, string>()
    const groups = [
      ['fields', Object.keys(value.fields)],
      ['optionalFields', Object.keys(value.optionalFields)],
      ['behaviors', Object.keys(value.behaviors)]
    ] as const
    for (const [group, names] of groups) {
      for (const name of names) {
        const owner = owners.get(name)
        if (owner) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [group, name],
            message: `"${name}" is declared in both ${owner} and ${group}.`
          })
        }
        owners.set(name, group)
      }
    }
  })

export type CapabilityDefinitionInput = z.input<typeof CapabilityDefinitionInputSchema>
export type CapabilityDefinitionData = z.output<typeof CapabilityDefinitionInputSchema>

export type CapabilityPatch = Partial<
  Pick<
    CapabilityDefinitionInput,
    'version' | 'description' | 'prerequisites' | 'requiredMembers' | 'optionalMembers' | 'fields' | 'optionalFields' | 'behaviors'
  >
>

let nextRevision = 0

/** Optional members must be omittable at construction, so templates without a default admit null. */
export function optionalTemplate(template: FieldTemplate): FieldTemplate {
  return template.required ? template.asNullable() : template
}

function uniqueMembers(specs: Iterable<MemberSpec>, exclude: ReadonlyMap<string, MemberSpec> = new Map()) {
  const members = new Map<string, MemberSpec>()
  for (const spec of specs) {
    if (exclude.has(spec.name)) continue
    const existing = members.get(spec.name)
    // A callable requirement is stricter than an attribute one.
    if (!existing || (existing.kind === 'attribute' && spec.kind === 'callable')) {
      members.set(spec.name, Object.freeze({ ...spec }))
    }
  }
  return members
}

/**
 * Named capability contract. Instances are immutable; amendments produce a new
 * definition with a fresh `revision`.
 */
export class CapabilityDefinition {
  readonly revision: number
  readonly name: string
  readonly version: string
  readonly description: string
  readonly module: string | undefined
  readonly prerequisites: readonly string[]
  readonly fields: Readonly<Record<string, FieldTemplate>>
  readonly optionalFields: Readonly<Record<string, FieldTemplate>>
  readonly behaviors: ModelBehaviors
  readonly requiredMembers: readonly MemberSpec[]
  readonly optionalMembers: readonly MemberSpec[]

  constructor(private readonly data: CapabilityDefinitionData) {
    nextRevision += 1
    this.revision = nextRevision
    this.name = data.name
    this.version = data.version
    this.description = data.description
    this.module = data.module
    this.prerequisites = Object.freeze(Array.from(new Set(data.prerequisites)))
    this.fields = Object.freeze({ ...data.fields })
    this.optionalFields = Object.freeze({ ...data.optionalFields })
    this.behaviors = Object.freeze({ ...data.behaviors })

    const required = uniqueMembers([
      ...data.requiredMembers,
      ...Object.keys(data.fields).map((name): MemberSpec => ({ name, kind: 'attribute' }))
    ])
    const optional = uniqueMembers(
      [
        ...data.optionalMembers,
        ...Object.keys(data.optionalFields).map((name): MemberSpec => ({ name, kind: 'attribute' })),
        ...Object.keys(data.behaviors).map((name): MemberSpec => ({ name, kind: 'callable' }))
      ],
      required
    )
    this.requiredMembers = Object.freeze(Array.from(required.values()))
    this.optionalMembers = Object.freeze(Array.from(optional.values()))
  }

  get memberNames(): readonly string[] {
    return [...this.requiredMembers, ...this.optionalMembers].map((member) => member.name)
  }

  hasMember(name: string): boolean {
    return this.memberNames.includes(name)
  }

  toInput(): CapabilityDefinitionInput {
    return {
      name: this.data.name,
      version: this.data.version,
      description: this.data.description,
      module: this.data.module,
      prerequisites: [...this.data.prerequisites],
      requiredMembers: [...this.data.requiredMembers],
      optionalMembers: [...this.data.optionalMembers],
      fields: { ...this.data.fields },
      optionalFields: { ...this.data.optionalFields },
      behaviors: { ...this.data.behaviors }
    }
  }

  withMembers(patch: CapabilityPatch): CapabilityDefinition {
    const base = this.toInput()
    return defineCapability({
      ...base,
      version: patch.version ?? base.version,
      description: patch.description ?? base.description,
      prerequisites: [...this.prerequisites, ...(patch.prerequisites ?? [])],
      requiredMembers: [...this.data.requiredMembers, ...(patch.requiredMembers ?? [])],
      optionalMembers: [...this.data.optionalMembers, ...(patch.optionalMembers ?? [])],
      fields: { ...this.data.fields, ...(patch.fields ?? {}) },
      optionalFields: { ...this.data.optionalFields, ...(patch.optionalFields ?? {}) },
      behaviors: { ...this.data.behaviors, ...(patch.behaviors ?? {}) }
    })
  }

  /** Schema of the fields this capability contributes, required ones first. */
  toSchema(name: string = this.name): Schema {
    const builder = new SchemaBuilder(name).withMetadata({ capability: this.name, version: this.version })
    for (const [fieldName, template] of Object.entries(this.fields)) {
      builder.addField(fieldName, template, { required: true, capability: this.name })
    }
    for (const [fieldName, template] of Object.entries(this.optionalFields)) {
      builder.addField(fieldName, optionalTemplate(template), { required: false, capability: this.name })
    }
    return builder.build()
  }

  toString(): string {
    return `Capability(${this.name}@${this.version})`
  }
}

export function defineCapability(input: CapabilityDefinitionInput): CapabilityDefinition {
  return new CapabilityDefinition(CapabilityDefinitionInputSchema.parse(input))
}
