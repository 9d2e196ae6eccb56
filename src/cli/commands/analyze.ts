/**
 * analyze command
 *
 * Config → plugins → engine per input → quality gate → reporter
 */

import { readFile } from 'fs/promises'
import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, finding as logFinding, success } from '../../utils/logger.js'
import { isFile } from '../../utils/hash.js'
import { maskCriticalFindings } from '../../utils/mask.js'
import { VERSION } from '../../version.js'
import {
  createConfigLoader,
  engineOptionsFromConfig,
  CONFIG_FILENAME,
  type Config,
  type GateConfig
} from '../../core/config/index.js'
import { createEngine, toJSON } from '../../core/engine/index.js'
import { createQualityGate } from '../../core/gate/index.js'
import { getPluginErrors, loadPluginModules } from '../../core/registry/index.js'
import { JsonReporter } from '../../core/reporter/json.js'
import { MarkdownReporter } from '../../core/reporter/markdown.js'
import { SeveritySchema, compareSeverity, summarizeBySeverity } from '../../core/taxonomy.js'
import type { AnalysisReport, AnalysisResult, Finding } from '../../types/index.js'

const logger = createLogger('analyze')

/**
 * Source name used for text read from stdin
 */
export const STDIN_SOURCE = '<stdin>'

export interface AnalyzeCommandOptions {
  dialect?: string
  format?: 'json' | 'markdown'
  output?: string
  failOn?: string
}

export interface AnalyzeIO {
  readStdin: () => Promise<string>
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Explicit --config, else the project file in the working directory, else the bundled default
 */
export async function resolveConfig(configPath?: string): Promise<Config> {
  const loader = createConfigLoader()
  if (configPath) {
    return loader.load(configPath)
  }
  const projectConfig = resolve(process.cwd(), CONFIG_FILENAME)
  if (await isFile(projectConfig)) {
    logger.debug(`Using ${projectConfig}`)
    return loader.load(projectConfig)
  }
  return loader.loadDefault()
}

function gateWithFailOn(gate: GateConfig, failOn: string | undefined): GateConfig {
  if (failOn === undefined) {
    return gate
  }
  const parsed = SeveritySchema.safeParse(failOn.toLowerCase())
  if (!parsed.success) {
    throw new Error(`Invalid --fail-on severity: ${failOn}`)
  }
  const severity = parsed.data
  return {
    ...gate,
    failOn: severity,
    warnOn: compareSeverity(gate.warnOn, severity) > 0 ? severity : gate.warnOn
  }
}

function formatLocation(found: Finding): string {
  const { file, line, column } = found.location
  return `${file ?? STDIN_SOURCE}:${line}:${column}`
}

/**
 * Execute analyze command
 */
export async function executeAnalyze(
  files: string[],
  options: AnalyzeCommandOptions,
  globalOptions: GlobalOptions,
  io: AnalyzeIO = { readStdin: readProcessStdin }
): Promise<number> {
  const startTime = Date.now()
  const errors: string[] = []

  try {
    const config = await resolveConfig(globalOptions.config)
    const gate = gateWithFailOn(config.gate, options.failOn)

    if (config.plugins.length > 0) {
      const loaded = await loadPluginModules(config.plugins)
      logger.debug(`Loaded ${loaded} of ${config.plugins.length} rule plugins`)
    }
    for (const pluginError of getPluginErrors()) {
      errors.push(`Plugin ${pluginError.plugin}: ${pluginError.message}`)
    }

    const engine = createEngine({
      ...engineOptionsFromConfig(config),
      ...(options.dialect ? { dialect: options.dialect } : {})
    })

    const sources: string[] = []
    const results: AnalysisResult[] = []

    if (files.length === 0) {
      sources.push(STDIN_SOURCE)
      results.push(engine.analyze(await io.readStdin()))
    }

    for (const file of files) {
      let content: string
      try {
        content = await readFile(file, 'utf-8')
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        errors.push(`Failed to read ${file}: ${message}`)
        continue
      }
      logger.debug(`Analyzing ${file}`)
      sources.push(file)
      results.push(engine.analyze(content, { file }))
    }

    if (results.length === 0) {
      for (const error of errors) {
        logger.error(error)
      }
      return ExitCode.ERROR
    }

    const qualityGate = createQualityGate({ name: config.name, gate, exceptions: config.exceptions })
    const enforcement = qualityGate.enforce(results.flatMap(result => result.findings))
    const suppressed = new Set(enforcement.evaluation.suppressedFindings)

    const report: AnalysisReport = {
      version: VERSION,
      timestamp: enforcement.timestamp,
      sources,
      decision: enforcement.decision,
      score: enforcement.evaluation.score,
      results: results.map(result => {
        const serialized = toJSON(result)
        // masked before suppression, so a suppressed critical finding still flags its statement
        const findings = maskCriticalFindings(serialized.findings)
        return {
          ...serialized,
          findings: findings.filter((_, index) => !suppressed.has(result.findings[index]))
        }
      }),
      summary: summarizeBySeverity(enforcement.evaluation.findings),
      suppressed: suppressed.size,
      duration: Date.now() - startTime,
      configName: enforcement.configName,
      errors
    }

    const reporter = options.format === 'markdown'
      ? new MarkdownReporter()
      : new JsonReporter()
    await reporter.write(report, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    // stdout carries the report unless it went to a file
    if (!globalOptions.quiet && options.output) {
      for (const found of enforcement.evaluation.findings) {
        logFinding(found.severity, `${found.rule} ${found.title}`, formatLocation(found))
      }
      success(enforcement.summary)
      for (const reason of enforcement.reasons) {
        logger.info(`  - ${reason}`)
      }
    }

    return enforcement.exitCode
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Analysis failed: ${message}`)
    return ExitCode.ERROR
  }
}

/**
 * Register analyze command on the program
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze [files...]')
    .description('Analyze SQL files, or stdin when no file is given')
    .option('-d, --dialect <dialect>', 'SQL dialect to assume')
    .option('-f, --format <format>', 'Output format (json|markdown)', 'json')
    .option('-o, --output <file>', 'Output file path')
    .option('--fail-on <severity>', 'Lowest severity that fails the run')
    .action(async (files: string[], options: AnalyzeCommandOptions) => {
      const exitCode = await executeAnalyze(files, options, program.opts<GlobalOptions>())
      process.exit(exitCode)
    })
}
