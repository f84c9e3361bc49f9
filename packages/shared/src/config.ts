import { z } from 'zod'

export const OVERWRITE_POLICIES = ['last-write-wins', 'reject'] as const
export type OverwritePolicy = (typeof OVERWRITE_POLICIES)[number]

const positiveInteger = (fallback: number) =>
  z.preprocess((value) => {
    if (value === undefined || value === null || value === '') {
      return fallback
    }
    if (typeof value === 'string') {
      return Number(value.trim())
    }
    return value
  }, z.number().int().positive())

const moduleList = z.preprocess((value) => {
  if (value === undefined || value === null) {
    return []
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  }
  return value
}, z.array(z.string().min(1)))

const EnvironmentSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  NODE_ENV: z.string().min(1).optional(),
  MODELFORGE_LOCAL_MODULES: moduleList,
  MODELFORGE_OVERWRITE_POLICY: z.enum(OVERWRITE_POLICIES).default('last-write-wins'),
  MODELFORGE_COMPOSITION_CACHE_SIZE: positiveInteger(128),
  MODELFORGE_MODEL_CACHE_SIZE: positiveInteger(256),
  MODELFORGE_FIELD_META_LIMIT: positiveInteger(10)
})

export type ModelforgeConfig = Readonly<{
  logLevel: string
  logLevelExplicit: boolean
  nodeEnv: string
  localModules: readonly string[]
  overwritePolicy: OverwritePolicy
  compositionCacheSize: number
  modelCacheSize: number
  fieldMetadataLimit: number
}>

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly detail?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ModelforgeConfig {
  const parsed = EnvironmentSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid modelforge configuration: ${issues.join('; ')}`, { issues })
  }
  const values = parsed.data
  return Object.freeze({
    logLevel: values.LOG_LEVEL ?? 'info',
    logLevelExplicit: values.LOG_LEVEL !== undefined,
    nodeEnv: values.NODE_ENV ?? 'development',
    localModules: Object.freeze([...values.MODELFORGE_LOCAL_MODULES]),
    overwritePolicy: values.MODELFORGE_OVERWRITE_POLICY,
    compositionCacheSize: values.MODELFORGE_COMPOSITION_CACHE_SIZE,
    modelCacheSize: values.MODELFORGE_MODEL_CACHE_SIZE,
    fieldMetadataLimit: values.MODELFORGE_FIELD_META_LIMIT
  })
}

let cached: ModelforgeConfig | null = null

export function getConfig(): ModelforgeConfig {
  if (!cached) {
    cached = loadConfig()
  }
  return cached
}

export function resetConfig() {
  cached = null
}
