import { describe, expect, it } from 'vitest'

import { ConfigurationError, loadConfig } from '../src/config.js'

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({})
    expect(config).toEqual({
      logLevel: 'info',
      logLevelExplicit: false,
      nodeEnv: 'development',
      localModules: [],
      overwritePolicy: 'last-write-wins',
      compositionCacheSize: 128,
      modelCacheSize: 256,
      fieldMetadataLimit: 10
    })
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('parses module lists and numeric limits', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      MODELFORGE_LOCAL_MODULES: ' app.models, app/shared ,,',
      MODELFORGE_OVERWRITE_POLICY: 'reject',
      MODELFORGE_COMPOSITION_CACHE_SIZE: '16',
      MODELFORGE_MODEL_CACHE_SIZE: '4'
    })
    expect(config.logLevel).toBe('debug')
    expect(config.logLevelExplicit).toBe(true)
    expect(config.localModules).toEqual(['app.models', 'app/shared'])
    expect(config.overwritePolicy).toBe('reject')
    expect(config.compositionCacheSize).toBe(16)
    expect(config.modelCacheSize).toBe(4)
  })

  it('rejects invalid values with the offending keys', () => {
    expect(() => loadConfig({ MODELFORGE_MODEL_CACHE_SIZE: '0' })).toThrow(ConfigurationError)
    try {
      loadConfig({ MODELFORGE_OVERWRITE_POLICY: 'sometimes' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(String(error)).toContain('MODELFORGE_OVERWRITE_POLICY')
    }
  })
})
