export * from './config.js'
export * from './hashing.js'
export * from './logger.js'
export * from './lru-cache.js'
