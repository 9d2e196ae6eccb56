import type { EngineOptions } from '../engine/index.js'
import type { Config } from './schema.js'

export {
  ConfigSchema,
  RuleConfigSchema,
  ExceptionSchema,
  GateSchema,
  SeverityWeightsSchema,
  validateConfig,
  validateConfigSafe,
  formatValidationErrors,
  type Config,
  type ConfigValidation,
  type RuleConfig,
  type Exception,
  type GateConfig
} from './schema.js'
export { ConfigLoader, createConfigLoader, DEFAULT_CONFIG_PATH, type LoaderOptions } from './loader.js'

/**
 * Configuration file looked up in the working directory
 */
export const CONFIG_FILENAME = '.sqlscout.yaml'

/**
 * Engine options carried by a configuration
 */
export function engineOptionsFromConfig(config: Config): EngineOptions {
  return {
    ...(config.dialect !== undefined ? { dialect: config.dialect } : {}),
    thresholds: config.thresholds,
    ruleOverrides: config.rules,
    ...(config.parseTimeoutMs !== undefined ? { parseTimeoutMs: config.parseTimeoutMs } : {})
  }
}
