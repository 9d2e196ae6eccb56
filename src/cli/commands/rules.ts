/**
 * rules command - list or count registered rules
 */

import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { getRuleRegistry, loadPluginModules, type RuleListing, type SearchOptions } from '../../core/registry/index.js'
import { isDimension, isSeverity } from '../../core/taxonomy.js'
import { resolveConfig } from './analyze.js'

const logger = createLogger('rules')

export interface RulesCommandOptions {
  dimension?: string
  severity?: string
  search?: string
  stats?: boolean
  json?: boolean
}

export type Write = (text: string) => void

function searchOptions(options: RulesCommandOptions): SearchOptions {
  const search: SearchOptions = {}
  if (options.dimension !== undefined) {
    const dimension = options.dimension.toLowerCase()
    if (!isDimension(dimension)) {
      throw new Error(`Unknown dimension: ${options.dimension}`)
    }
    search.dimensions = [dimension]
  }
  if (options.severity !== undefined) {
    const severity = options.severity.toLowerCase()
    if (!isSeverity(severity)) {
      throw new Error(`Unknown severity: ${options.severity}`)
    }
    search.severities = [severity]
  }
  return search
}

export function formatRuleRow(rule: RuleListing): string {
  const state = rule.enabled ? '' : ' (disabled)'
  return `${rule.id.padEnd(18)} ${rule.severity.padEnd(8)} ${rule.dimension.padEnd(11)} ${rule.name}${state}`
}

/**
 * Execute rules command
 */
export async function executeRules(
  options: RulesCommandOptions,
  globalOptions: GlobalOptions,
  write: Write = text => process.stdout.write(text)
): Promise<number> {
  try {
    const config = await resolveConfig(globalOptions.config)
    if (config.plugins.length > 0) {
      await loadPluginModules(config.plugins)
    }
    const registry = getRuleRegistry()

    if (options.stats) {
      write(JSON.stringify(registry.stats(), null, 2) + '\n')
      return ExitCode.PASS
    }

    const matched = new Set(registry.search(options.search ?? '', searchOptions(options)).map(rule => rule.id))
    const rows = registry.listAll().filter(rule => matched.has(rule.id))

    if (options.json) {
      write(JSON.stringify(rows, null, 2) + '\n')
      return ExitCode.PASS
    }

    for (const row of rows) {
      write(formatRuleRow(row) + '\n')
    }
    write(`${rows.length} rule(s)\n`)
    return ExitCode.PASS
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Listing rules failed: ${message}`)
    return ExitCode.ERROR
  }
}

/**
 * Register rules command on the program
 */
export function registerRulesCommand(program: Command): void {
  program
    .command('rules')
    .description('List registered rules')
    .option('--dimension <dimension>', 'Only rules of this dimension')
    .option('--severity <severity>', 'Only rules of this severity')
    .option('--search <text>', 'Match id, name or description')
    .option('--stats', 'Print rule counts instead of the list')
    .option('--json', 'Print rule metadata as JSON')
    .action(async (options: RulesCommandOptions) => {
      const exitCode = await executeRules(options, program.opts<GlobalOptions>())
      process.exit(exitCode)
    })
}
