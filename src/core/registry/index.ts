import { resolve } from 'path'
import { pathToFileURL } from 'url'
import { createLogger } from '../../utils/logger.js'
import { builtinCatalog } from '../catalog/index.js'
import { DuplicateRuleError } from '../errors.js'
import type { Rule } from '../rules/base.js'
import { patternRules } from '../rules/pattern-rule.js'
import { structuralRules } from '../rules/structural.js'
import { RuleRegistry } from './registry.js'

const logger = createLogger('registry')

/**
 * Externally supplied rules
 */
export interface RulePlugin {
  name: string
  rules(): Rule[]
}

export interface PluginError {
  plugin: string
  message: string
}

let registry: RuleRegistry | undefined
let pluginErrors: PluginError[] = []

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

export function isRulePlugin(value: unknown): value is RulePlugin {
  return isRecord(value) && typeof value.name === 'string' && typeof value.rules === 'function'
}

function recordPluginError(plugin: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error)
  logger.warn(`Plugin ${plugin} not loaded: ${message}`)
  pluginErrors = [...pluginErrors, { plugin, message }]
}

/**
 * Register every rule of a plugin, or none of them
 */
function applyPlugin(target: RuleRegistry, plugin: RulePlugin): void {
  try {
    const rules = plugin.rules()
    const ids = new Set<string>()
    for (const rule of rules) {
      if (ids.has(rule.id) || target.has(rule.id)) {
        throw new DuplicateRuleError(rule.id)
      }
      ids.add(rule.id)
    }
    for (const rule of rules) {
      target.register(rule)
    }
    logger.debug(`Plugin ${plugin.name} registered ${rules.length} rules`)
  } catch (error) {
    recordPluginError(plugin.name, error)
  }
}

function buildRegistry(): RuleRegistry {
  const built = new RuleRegistry()
  for (const rule of patternRules(builtinCatalog())) {
    built.register(rule)
  }
  for (const rule of structuralRules()) {
    built.register(rule)
  }
  logger.debug(`Rule registry built with ${built.size} rules`)
  return built
}

/**
 * Process-wide registry, built on first access from the built-in catalog
 * and the structural rules
 */
export function getRuleRegistry(): RuleRegistry {
  if (!registry) {
    registry = buildRegistry()
  }
  return registry
}

/**
 * Drop the registry, its plugin rules and plugin errors so the next access rebuilds
 */
export function resetRuleRegistry(): void {
  registry = undefined
  pluginErrors = []
}

/**
 * Apply a plugin to the process-wide registry, building it first if needed.
 * Returns false when the plugin was rejected; the reason is in getPluginErrors().
 */
export function registerRulePlugin(plugin: RulePlugin): boolean {
  const before = pluginErrors.length
  applyPlugin(getRuleRegistry(), plugin)
  return pluginErrors.length === before
}

export function getPluginErrors(): readonly PluginError[] {
  return pluginErrors
}

/**
 * Import plugin modules (default export or `plugin` export) and register them.
 * Returns the number of plugins registered.
 */
export async function loadPluginModules(paths: readonly string[], basePath: string = process.cwd()): Promise<number> {
  let loaded = 0
  for (const path of paths) {
    try {
      const mod: unknown = await import(pathToFileURL(resolve(basePath, path)).href)
      const candidate = isRecord(mod) ? (mod.default ?? mod.plugin) : undefined
      if (!isRulePlugin(candidate)) {
        throw new Error('module exports no rule plugin')
      }
      if (registerRulePlugin(candidate)) loaded++
    } catch (error) {
      recordPluginError(path, error)
    }
  }
  return loaded
}

export { RuleRegistry, type RegisterOptions, type SearchOptions, type RegistryStats, type RuleListing } from './registry.js'
