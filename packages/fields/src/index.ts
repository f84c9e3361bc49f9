export * from './errors.js'
export * from './field-type.js'
export * from './field-template.js'
export * from './families.js'
export * from './schema.js'
export * from './json-schema.js'
export * from './model-factory.js'
