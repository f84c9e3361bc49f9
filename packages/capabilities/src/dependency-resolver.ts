import type { CapabilityDefinition } from './definition.js'

export type DependencyResult = {
  ok: boolean
  missing: string[]
}

/**
 * Prerequisite bookkeeping over a fixed set of definitions. Nothing is ever
 * added on the caller's behalf: a prerequisite outside the requested set is
 * reported, not pulled in.
 */
export class DependencyResolver {
  constructor(private readonly definitions: ReadonlyMap<string, CapabilityDefinition>) {}

  /** Requested names plus every transitive prerequisite, in discovery order. */
  closure(names: Iterable<string>): string[] {
    const visited = new Set<string>()
    const queue = Array.from(names)
    while (queue.length) {
      const name = queue.shift()
      if (name === undefined || visited.has(name)) continue
      visited.add(name)
      const definition = this.definitions.get(name)
      if (definition) {
        queue.push(...definition.prerequisites)
      }
    }
    return Array.from(visited)
  }

  resolve(requested: Iterable<string>): DependencyResult {
    const requestedSet = new Set(requested)
    const missing = this.closure(requestedSet).filter((name) => !requestedSet.has(name))
    return { ok: missing.length === 0, missing }
  }

  /** Direct prerequisites of every known capability. */
  graph(): Record<string, string[]> {
    const graph: Record<string, string[]> = {}
    for (const [name, definition] of this.definitions) {
      graph[name] = [...definition.prerequisites]
    }
    return graph
  }
}
