export * from './errors.js'
export * from './definition.js'
export * from './structural-validator.js'
export * from './coherence-guard.js'
export * from './dependency-resolver.js'
export * from './composer.js'
export * from './builtins.js'
export * from './registry.js'
export * from './attach.js'
