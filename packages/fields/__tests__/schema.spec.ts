import { describe, expect, it } from 'vitest'

import { FieldContractViolation } from '../src/errors.js'
import { FieldTemplate } from '../src/field-template.js'
import { integerField } from '../src/families.js'
import { createSchema, Schema, SchemaBuilder, SchemaField } from '../src/schema.js'

const title = new FieldTemplate('string', { description: 'Headline' })
const body = new FieldTemplate('string', { nullable: true })
const views = integerField({ default: 0 })

describe('Schema equality', () => {
  it('depends on content, not on how the schema was built', () => {
    const built = new SchemaBuilder('Post').addField('title', title).addField('body', body).build()
    const declared = createSchema('Post', { body, title })
    const merged = createSchema('Post', { title }).merge(createSchema('Draft', { body }), 'Post')
    const extended = createSchema('Post', { title }).extend({ body })
    const direct = new Schema('Post', [new SchemaField('title', title), new SchemaField('body', body)])

    for (const candidate of [declared, merged, extended, direct]) {
      expect(candidate.equals(built)).toBe(true)
      expect(candidate.hash).toBe(built.hash)
    }
    expect(built.fieldNames).toEqual(['title', 'body'])
    expect(declared.fieldNames).toEqual(['body', 'title'])
  })

  it('includes the name and metadata in the hash', () => {
    const base = createSchema('Post', { title })
    expect(createSchema('Article', { title }).equals(base)).toBe(false)
    expect(createSchema('Post', { title }, { table: 'posts' }).equals(base)).toBe(false)
    expect(createSchema('Post', { title: new FieldTemplate('string') }).equals(base)).toBe(false)
  })
})

describe('Schema derivations', () => {
  const schema = createSchema('Post', { title, body, views }, { table: 'posts' })

  it('splits required and optional fields lazily', () => {
    expect(schema.requiredFields).toEqual(['title'])
    expect(schema.optionalFields).toEqual(['body', 'views'])
    expect(schema.requiredFields).toBe(schema.requiredFields)
    expect(schema.size).toBe(3)
  })

  it('selects fields in their original order and drops unknown names', () => {
    const subset = schema.select(['views', 'title', 'missing'])
    expect(subset.name).toBe('Post_subset')
    expect(subset.fieldNames).toEqual(['title', 'views'])
    expect(subset.metadata).toEqual({ table: 'posts' })
    expect(schema.select([], 'Empty').size).toBe(0)
  })

  it('lets the other schema win on merge', () => {
    const shortTitle = new FieldTemplate('string', { description: 'Short headline' })
    const merged = schema.merge(createSchema('Override', { title: shortTitle }, { table: 'drafts' }))

    expect(merged.name).toBe('Post_Override')
    expect(merged.get('title')?.template).toBe(shortTitle)
    expect(merged.fieldNames).toEqual(['title', 'body', 'views'])
    expect(merged.metadata).toEqual({ table: 'drafts' })
    expect(schema.get('title')?.template).toBe(title)
  })

  it('extends without touching the original', () => {
    const extended = schema.extend({ slug: new FieldTemplate('string') })
    expect(extended.fieldNames).toEqual(['title', 'body', 'views', 'slug'])
    expect(schema.has('slug')).toBe(false)
  })

  it('creates named fields for adapters', () => {
    const fields = schema.createFields()
    expect(Object.keys(fields)).toEqual(['title', 'body', 'views'])
    expect(fields.title.name).toBe('title')
    expect(fields.views.resolveDefault()).toBe(0)
  })

  it('rejects invalid field names at build time', () => {
    expect(() => new SchemaBuilder('Bad').addField('not valid', title)).toThrow(FieldContractViolation)
  })

  it('describes itself', () => {
    expect(schema.toString()).toBe('Schema(Post: title, body, views)')
  })
})
