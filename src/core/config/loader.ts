import { readFile } from 'fs/promises'
import { join, dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { ConfigLoadError } from '../errors.js'
import { type Config, validateConfig, validateConfigSafe, formatValidationErrors } from './schema.js'

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

/**
 * Bundled default configuration, beside the package root
 */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../../config/default.yaml', import.meta.url))

export class ConfigLoader {
  private cache = new Map<string, Config>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load configuration from file path. Plugin paths come back absolute.
   */
  async load(configPath: string): Promise<Config> {
    return this.loadFile(resolve(this.basePath, configPath), [])
  }

  /**
   * Load the bundled default configuration
   */
  async loadDefault(): Promise<Config> {
    return this.load(DEFAULT_CONFIG_PATH)
  }

  /**
   * Load configuration from string content
   */
  loadFromString(content: string): Config {
    return validateConfig(yaml.load(content))
  }

  /**
   * Validate a configuration file without loading its base
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const absolutePath = resolve(this.basePath, configPath)
      const content = await this.readConfigFile(absolutePath)
      const validation = validateConfigSafe(yaml.load(content))

      if (validation.success) {
        return { valid: true, errors: [] }
      }

      return {
        valid: false,
        errors: formatValidationErrors(validation.errors)
      }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  private async loadFile(absolutePath: string, chain: string[]): Promise<Config> {
    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    if (chain.includes(absolutePath)) {
      throw new ConfigLoadError(
        `Circular extends in configuration: ${[...chain, absolutePath].join(' -> ')}`,
        absolutePath,
        ['circular extends']
      )
    }

    const content = await this.readConfigFile(absolutePath)

    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(`Invalid YAML in configuration file: ${absolutePath}`, absolutePath, [message])
    }

    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid configuration file: ${absolutePath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    const directory = dirname(absolutePath)
    let config: Config = {
      ...validation.data,
      plugins: validation.data.plugins.map(plugin => resolve(directory, plugin))
    }

    if (config.extends && this.allowExtends) {
      const base = await this.loadFile(join(directory, config.extends), [...chain, absolutePath])
      config = this.mergeConfig(base, config)
    }

    this.cache.set(absolutePath, config)
    return config
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN'
      throw new ConfigLoadError(
        `Failed to read configuration file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }

  private mergeConfig(base: Config, override: Config): Config {
    const rules = { ...base.rules }
    for (const [id, rule] of Object.entries(override.rules)) {
      rules[id] = { ...rules[id], ...rule }
    }

    return {
      ...base,
      ...override,
      dialect: override.dialect ?? base.dialect,
      parseTimeoutMs: override.parseTimeoutMs ?? base.parseTimeoutMs,
      thresholds: {
        ...base.thresholds,
        ...override.thresholds
      },
      rules,
      exceptions: [
        ...base.exceptions,
        ...override.exceptions
      ],
      gate: {
        ...override.gate,
        weights: {
          ...base.gate.weights,
          ...override.gate.weights
        }
      },
      plugins: [
        ...new Set([...base.plugins, ...override.plugins])
      ]
    }
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
