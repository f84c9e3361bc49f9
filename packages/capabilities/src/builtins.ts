import {
  booleanField,
  DATETIME,
  DATETIME_NULLABLE,
  EMBEDDING,
  ID_FROZEN,
  integerField,
  listField,
  numberField,
  stringField,
  validateEmbedding,
  type ModelInstance
} from '@modelforge/fields'

import { BUILTIN_MODULE } from './coherence-guard.js'
import { defineCapability, type CapabilityDefinition } from './definition.js'

export const CAPABILITY = {
  identifiable: 'identifiable',
  temporal: 'temporal',
  auditable: 'auditable',
  versionable: 'versionable',
  softDeletable: 'softDeletable',
  taggable: 'taggable',
  embeddable: 'embeddable',
  searchable: 'searchable'
} as const

export type BuiltinCapabilityName = (typeof CAPABILITY)[keyof typeof CAPABILITY]

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : []
}

function timeOf(value: unknown): number | null {
  return value instanceof Date ? value.getTime() : null
}

export const Identifiable = defineCapability({
  name: CAPABILITY.identifiable,
  description: 'Carries a frozen unique identifier.',
  module: BUILTIN_MODULE,
  fields: { id: ID_FROZEN },
  behaviors: {
    getId(this: ModelInstance) {
      return this.id
    },
    equalsById(this: ModelInstance, other: ModelInstance) {
      return other.id !== undefined && other.id === this.id
    }
  }
})

export const Temporal = defineCapability({
  name: CAPABILITY.temporal,
  description: 'Tracks creation and last update timestamps.',
  module: BUILTIN_MODULE,
  fields: { createdAt: DATETIME, updatedAt: DATETIME },
  behaviors: {
    touch(this: ModelInstance) {
      this.updatedAt = new Date()
    },
    /** Milliseconds since creation. */
    age(this: ModelInstance, now: Date = new Date()) {
      const created = timeOf(this.createdAt)
      return created === null ? 0 : now.getTime() - created
    },
    wasModified(this: ModelInstance) {
      const created = timeOf(this.createdAt)
      const updated = timeOf(this.updatedAt)
      return created !== null && updated !== null && updated > created
    }
  }
})

export const Auditable = defineCapability({
  name: CAPABILITY.auditable,
  description: 'Records who created and last updated a record.',
  module: BUILTIN_MODULE,
  prerequisites: [CAPABILITY.identifiable, CAPABILITY.temporal],
  optionalFields: {
    createdBy: stringField({ nullable: true, description: 'Creator' }),
    updatedBy: stringField({ nullable: true, description: 'Last editor' })
  },
  behaviors: {
    setCreatedBy(this: ModelInstance, user: string) {
      this.createdBy = user
      if (this.updatedBy === null || this.updatedBy === undefined) {
        this.updatedBy = user
      }
    },
    setUpdatedBy(this: ModelInstance, user: string) {
      this.updatedBy = user
      this.updatedAt = new Date()
    },
    getAuditInfo(this: ModelInstance) {
      return {
        id: this.id,
        createdBy: this.createdBy ?? null,
        updatedBy: this.updatedBy ?? null,
        createdAt: this.createdAt,
        updatedAt: this.updatedAt
      }
    }
  }
})

export const Versionable = defineCapability({
  name: CAPABILITY.versionable,
  description: 'Optimistic version counter.',
  module: BUILTIN_MODULE,
  fields: { version: integerField({ min: 1, default: 1, description: 'Record version' }) },
  behaviors: {
    incrementVersion(this: ModelInstance) {
      const current = typeof this.version === 'number' ? this.version : 0
      this.version = current + 1
      return this.version
    },
    checkVersion(this: ModelInstance, expected: number) {
      return this.version === expected
    }
  }
})

export const SoftDeletable = defineCapability({
  name: CAPABILITY.softDeletable,
  description: 'Marks records deleted without removing them.',
  module: BUILTIN_MODULE,
  fields: {
    isDeleted: booleanField({ default: false }),
    deletedAt: DATETIME_NULLABLE
  },
  optionalFields: {
    deletedBy: stringField({ nullable: true })
  },
  behaviors: {
    softDelete(this: ModelInstance, by?: string) {
      this.isDeleted = true
      this.deletedAt = new Date()
      this.deletedBy = by ?? null
    },
    restore(this: ModelInstance) {
      this.isDeleted = false
      this.deletedAt = null
      this.deletedBy = null
    },
    isActive(this: ModelInstance) {
      return this.isDeleted !== true
    }
  }
})

export const Taggable = defineCapability({
  name: CAPABILITY.taggable,
  description: 'Free-form string tags.',
  module: BUILTIN_MODULE,
  fields: { tags: listField('string', { description: 'Tags' }) },
  behaviors: {
    addTag(this: ModelInstance, tag: string) {
      const tags = stringList(this.tags)
      if (!tags.includes(tag)) {
        this.tags = [...tags, tag]
      }
    },
    removeTag(this: ModelInstance, tag: string) {
      this.tags = stringList(this.tags).filter((entry) => entry !== tag)
    },
    hasTag(this: ModelInstance, tag: string) {
      return stringList(this.tags).includes(tag)
    },
    clearTags(this: ModelInstance) {
      this.tags = []
    },
    getTags(this: ModelInstance) {
      return stringList(this.tags)
    }
  }
})

export const Embeddable = defineCapability({
  name: CAPABILITY.embeddable,
  description: 'Holds a numeric embedding vector.',
  module: BUILTIN_MODULE,
  fields: { embedding: EMBEDDING },
  behaviors: {
    setEmbedding(this: ModelInstance, vector: unknown) {
      this.embedding = validateEmbedding(vector)
    },
    hasEmbedding(this: ModelInstance) {
      return Array.isArray(this.embedding) && this.embedding.length > 0
    }
  }
})

export const Searchable = defineCapability({
  name: CAPABILITY.searchable,
  description: 'Full-text search text, keywords and a relevance score.',
  module: BUILTIN_MODULE,
  optionalFields: {
    searchText: stringField({ nullable: true, metadata: { fulltextIndex: true } }),
    searchKeywords: listField('string', { metadata: { index: true } }),
    searchScore: numberField({ nullable: true, min: 0, max: 1 })
  },
  behaviors: {
    /** Joins the non-empty values of `fields` into `searchText`. */
    updateSearchText(this: ModelInstance, ...fields: string[]) {
      const parts: string[] = []
      for (const field of fields) {
        const value = this[field]
        if (value !== undefined && value !== null && value !== '' && value !== false && value !== 0) {
          parts.push(String(value))
        }
      }
      this.searchText = parts.join(' ')
    },
    addKeyword(this: ModelInstance, keyword: string) {
      const keywords = stringList(this.searchKeywords)
      if (!keywords.includes(keyword)) {
        this.searchKeywords = [...keywords, keyword]
      }
    },
    /** 1 for a match in the search text, 0.8 for a keyword match, 0 otherwise. */
    calculateRelevance(this: ModelInstance, query: string) {
      const needle = query.toLowerCase()
      const text = typeof this.searchText === 'string' ? this.searchText.toLowerCase() : ''
      if (text.includes(needle)) return 1
      if (stringList(this.searchKeywords).some((keyword) => keyword.toLowerCase().includes(needle))) return 0.8
      return 0
    }
  }
})

export const BUILTIN_CAPABILITIES: readonly CapabilityDefinition[] = Object.freeze([
  Identifiable,
  Temporal,
  Auditable,
  Versionable,
  SoftDeletable,
  Taggable,
  Embeddable,
  Searchable
])
