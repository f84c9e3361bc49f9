import { createHash } from 'node:crypto'

export type AnyFunction = (...args: never[]) => unknown

const functionIds = new WeakMap<object, string>()
let nextFunctionId = 0

/**
 * Stable identity token for a function. Functions compare by reference, so two
 * templates sharing the same validator instance serialize identically.
 */
export function functionIdentity(fn: AnyFunction): string {
  return identityOf(fn, fn.name)
}

function identityOf(fn: object, name: string): string {
  const existing = functionIds.get(fn)
  if (existing) return existing
  nextFunctionId += 1
  const id = `fn#${nextFunctionId}${name ? `:${name}` : ''}`
  functionIds.set(fn, id)
  return id
}

/**
 * Deterministic serialization: object keys are sorted, functions are replaced
 * by their identity token and values exposing a string `fingerprint` serialize
 * as that fingerprint.
 */
export function stableSerialize(value: unknown): string {
  return serialize(value, new Set<object>())
}

function serialize(value: unknown, seen: Set<object>): string {
  if (value === null) return 'null'
  switch (typeof value) {
    case 'undefined':
      return 'undefined'
    case 'string':
      return JSON.stringify(value)
    case 'number':
    case 'boolean':
      return String(value)
    case 'bigint':
      return `${String(value)}n`
    case 'symbol':
      return String(value)
    case 'function':
      return identityOf(value, value.name)
    default:
      break
  }
  if (typeof value !== 'object' || value === null) {
    return String(value)
  }

  const objectValue = value
  if (seen.has(objectValue)) {
    return '"[Circular]"'
  }

  if (objectValue instanceof Date) {
    return `date:${Number.isNaN(objectValue.getTime()) ? 'invalid' : objectValue.toISOString()}`
  }

  const fingerprint: unknown = Reflect.get(objectValue, 'fingerprint')
  if (typeof fingerprint === 'string') {
    return `fp:${fingerprint}`
  }

  seen.add(objectValue)
  try {
    if (Array.isArray(objectValue)) {
      return `[${objectValue.map((entry: unknown) => serialize(entry, seen)).join(',')}]`
    }
    if (objectValue instanceof Map) {
      const entries = Array.from(objectValue.entries()).map(
        ([key, entry]: [unknown, unknown]) => [serialize(key, seen), serialize(entry, seen)] as const
      )
      entries.sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      return `map{${entries.map(([key, entry]) => `${key}:${entry}`).join(',')}}`
    }
    if (objectValue instanceof Set) {
      const entries = Array.from(objectValue.values()).map((entry: unknown) => serialize(entry, seen))
      entries.sort()
      return `set[${entries.join(',')}]`
    }
    const keys = Object.keys(objectValue).sort()
    const body = keys.map((key) => `${JSON.stringify(key)}:${serialize(Reflect.get(objectValue, key), seen)}`)
    return `{${body.join(',')}}`
  } finally {
    seen.delete(objectValue)
  }
}

export function contentHash(value: unknown): string {
  return createHash('sha256').update(stableSerialize(value)).digest('hex').slice(0, 16)
}
