/**
 * sqlscout library entry
 */

export type * from './types/index.js'
export { VERSION } from './version.js'

export {
  AnalysisEngine,
  createEngine,
  computeStatistics,
  toJSON,
  type EngineOptions,
  type AnalyzeOptions,
  type RuleOverride,
  type SerializedResult,
  type SerializedFinding,
  type SerializedStatement,
  type SerializedDiagnostic
} from './core/engine/index.js'

export {
  SEVERITIES,
  DIMENSIONS,
  SeveritySchema,
  DimensionSchema,
  compareSeverity,
  severityAtLeast,
  isSeverity,
  isDimension
} from './core/taxonomy.js'
export { SqlScoutError, ParseError, DuplicateRuleError, UnsupportedDialectError, ConfigLoadError } from './core/errors.js'
export { normalizeSql } from './core/normalize.js'
export { segment, splitStatements, type SegmentedStatement, type SegmentationResult } from './core/segmenter/index.js'
export {
  SUPPORTED_DIALECTS,
  DialectDetector,
  DEFAULT_SIGNATURES,
  resolveDialect,
  isDialect,
  type DialectSignature
} from './core/dialect/index.js'

export * from './core/parser/index.js'
export {
  builtinCatalog,
  builtinRuleMetadata,
  PatternCatalog,
  DEFAULT_THRESHOLDS,
  type CatalogEntry,
  type RuleMetadata,
  type Thresholds,
  type DetectorHit,
  type DetectorInput
} from './core/catalog/index.js'
export { createFinding } from './core/finding.js'
export * from './core/rules/index.js'
export {
  RuleRegistry,
  getRuleRegistry,
  resetRuleRegistry,
  registerRulePlugin,
  getPluginErrors,
  loadPluginModules,
  isRulePlugin,
  type RulePlugin,
  type PluginError,
  type RegistryStats,
  type RuleListing,
  type SearchOptions
} from './core/registry/index.js'
export {
  AnalyzerOrchestrator,
  BaseAnalyzer,
  DimensionAnalyzer,
  createOrchestrator,
  type AnalyzerResult
} from './core/analyzer/index.js'

export {
  ConfigLoader,
  createConfigLoader,
  ConfigSchema,
  validateConfig,
  engineOptionsFromConfig,
  CONFIG_FILENAME,
  DEFAULT_CONFIG_PATH,
  type Config
} from './core/config/index.js'
export {
  QualityGate,
  GateEngine,
  createQualityGate,
  ExitCodes,
  DEFAULT_WEIGHTS,
  type GateResult,
  type GateEvaluation
} from './core/gate/index.js'
export { JsonReporter, createJsonReporter } from './core/reporter/json.js'
export { MarkdownReporter, createMarkdownReporter } from './core/reporter/markdown.js'
export type { Reporter } from './core/reporter/base.js'
