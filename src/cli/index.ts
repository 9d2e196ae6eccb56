#!/usr/bin/env node
/**
 * sqlscout CLI entry point
 *
 * Static analysis for SQL files
 */

import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { VERSION } from '../version.js'
import { createConfigLoader } from '../core/config/index.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerAnalyzeCommand } from './commands/analyze.js'
import { registerRulesCommand } from './commands/rules.js'

/**
 * Exit codes for the CLI
 * - 0: pass
 * - 1: fail (a finding reached failOn)
 * - 2: warn (a finding reached warnOn)
 * - 3: error (analysis could not run)
 */
export const ExitCode = {
  PASS: 0,
  FAIL: 1,
  WARN: 2,
  ERROR: 3
} as const

/**
 * Global CLI options
 */
export type GlobalOptions = {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('sqlscout')
    .description('Static analysis for SQL: anti-patterns, correctness hazards, security risks and style')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: globalOpts.verbose ? 'debug' : 'info',
        quiet: globalOpts.quiet ?? false
      })
    })

  registerAnalyzeCommand(program)
  registerRulesCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        logger.info(`Created config file: ${result.outputPath}`)
        process.exit(ExitCode.PASS)
      } else {
        logger.error(`Failed to create config file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (configPath: string) => {
      try {
        const loader = createConfigLoader()
        const result = await loader.validate(configPath)

        if (result.valid) {
          logger.info(`✓ Config file is valid: ${configPath}`)
          process.exit(ExitCode.PASS)
        } else {
          logger.error(`✗ Config file is invalid: ${configPath}`)
          for (const error of result.errors) {
            logger.error(`  - ${error}`)
          }
          process.exit(ExitCode.ERROR)
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        logger.error(`Failed to validate config: ${message}`)
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

// Run CLI when executed directly (not when imported as a module)
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  decodeURIComponent(import.meta.url) === `file://${process.argv[1]}`
if (isMainModule) {
  await run()
}
