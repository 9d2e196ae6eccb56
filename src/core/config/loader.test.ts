import { describe, it, expect, beforeEach } from 'vitest'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { ConfigLoader, createConfigLoader } from './loader.js'
import { engineOptionsFromConfig } from './index.js'
import { ConfigLoadError } from '../errors.js'
import { createEngine } from '../engine/index.js'

const fixturesPath = fileURLToPath(new URL('./__fixtures__', import.meta.url))

describe('ConfigLoader', () => {
  let loader: ConfigLoader

  beforeEach(() => {
    loader = new ConfigLoader({ basePath: fixturesPath })
  })

  describe('load', () => {
    it('loads a valid config file', async () => {
      const config = await loader.load('valid-config.yaml')

      expect(config.name).toBe('test-config')
      expect(config.dialect).toBe('postgresql')
      expect(config.thresholds).toEqual({ offsetMax: 500 })
      expect(config.rules['PERF-SCAN-001']).toEqual({ severity: 'low' })
      expect(config.exceptions).toHaveLength(1)
      expect(config.gate).toEqual({ failOn: 'high', warnOn: 'medium', weights: {} })
      expect(config.parseTimeoutMs).toBe(200)
    })

    it('resolves plugin paths against the config file', async () => {
      const config = await loader.load('valid-config.yaml')

      expect(config.plugins).toEqual([join(fixturesPath, 'plugins/team.ts')])
    })

    it('throws ConfigLoadError for a missing file', async () => {
      await expect(loader.load('non-existent.yaml')).rejects.toThrow(ConfigLoadError)
    })

    it('throws ConfigLoadError with every validation error', async () => {
      const error = await loader.load('invalid-config.yaml').catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ConfigLoadError)
      if (error instanceof ConfigLoadError) {
        expect(error.validationErrors).toContain('version: Version must be semver format')
        expect(error.validationErrors).toContain('dialect: Unsupported SQL dialect: cobol')
        expect(error.validationErrors).toContain('gate: warnOn must not be more severe than failOn')
        expect(error.validationErrors.some(message => message.startsWith('thresholds.offsetMax:'))).toBe(true)
      }
    })

    it('caches loaded configs', async () => {
      const first = await loader.load('valid-config.yaml')

      expect(await loader.load('valid-config.yaml')).toBe(first)
      loader.clearCache()
      const reloaded = await loader.load('valid-config.yaml')
      expect(reloaded).not.toBe(first)
      expect(reloaded).toEqual(first)
    })
  })

  describe('extends', () => {
    it('merges a child config over its base', async () => {
      const config = await loader.load('child-config.yaml')

      expect(config.name).toBe('child-config')
      expect(config.dialect).toBe('mysql')
      expect(config.thresholds).toEqual({ offsetMax: 500, inListMax: 100 })
      expect(config.rules['PERF-SCAN-001']).toEqual({ severity: 'low', enabled: false })
      expect(config.exceptions.map(exception => exception.pattern)).toEqual(['legacy/**', 'scripts/**'])
      expect(config.gate.weights).toEqual({ critical: 50, high: 15 })
      expect(config.plugins).toEqual([join(fixturesPath, 'plugins/team.ts')])
    })

    it('ignores extends when disabled', async () => {
      const config = await new ConfigLoader({ basePath: fixturesPath, allowExtends: false }).load('child-config.yaml')

      expect(config.dialect).toBeUndefined()
      expect(config.exceptions).toHaveLength(1)
    })

    it('rejects circular extends', async () => {
      await expect(loader.load('loop-a.yaml')).rejects.toThrow('Circular extends')
    })
  })

  describe('loadDefault', () => {
    it('loads the bundled default config', async () => {
      const config = await createConfigLoader().loadDefault()

      expect(config.name).toBe('default')
      expect(config.thresholds.offsetMax).toBe(1000)
      expect(config.gate.weights).toEqual({ critical: 25, high: 10, medium: 4, low: 1, info: 0 })
      expect(config.plugins).toEqual([])
    })
  })

  describe('loadFromString', () => {
    it('applies defaults', () => {
      const config = loader.loadFromString('version: "1.0"\nname: inline\n')

      expect(config.rules).toEqual({})
      expect(config.exceptions).toEqual([])
      expect(config.gate).toEqual({ failOn: 'critical', warnOn: 'high', weights: {} })
    })
  })

  describe('validate', () => {
    it('reports a valid file', async () => {
      expect(await loader.validate('valid-config.yaml')).toEqual({ valid: true, errors: [] })
    })

    it('reports errors without throwing', async () => {
      const result = await loader.validate('invalid-config.yaml')

      expect(result.valid).toBe(false)
      expect(result.errors).toContain('name: Config name is required')
    })

    it('reports an unreadable file', async () => {
      expect(await loader.validate('non-existent.yaml')).toEqual({ valid: false, errors: ['ENOENT'] })
    })
  })
})

describe('engineOptionsFromConfig', () => {
  it('configures the engine from a loaded config', async () => {
    const config = await new ConfigLoader({ basePath: fixturesPath }).load('valid-config.yaml')
    const engine = createEngine(engineOptionsFromConfig(config))

    expect(engine.dialect).toBe('postgres')
    expect(engine.thresholds.offsetMax).toBe(500)
    const findings = engine.analyze('select * from users').findings

    expect(findings.map(finding => [finding.rule, finding.severity])).toEqual([['PERF-SCAN-001', 'low']])
  })
})
