/**
 * init command - write the default configuration file
 */

import * as fs from 'fs'
import * as path from 'path'
import { CONFIG_FILENAME, DEFAULT_CONFIG_PATH } from '../../core/config/index.js'

export const DEFAULT_OUTPUT_FILENAME = CONFIG_FILENAME

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Execute the init command
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(
    process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const configContent = fs.readFileSync(DEFAULT_CONFIG_PATH, 'utf-8')

    const parentDir = path.dirname(outputPath)
    if (parentDir !== '.' && parentDir !== outputPath) {
      fs.mkdirSync(parentDir, { recursive: true })
    }

    fs.writeFileSync(outputPath, configContent, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    return {
      success: false,
      outputPath,
      error: message
    }
  }
}
