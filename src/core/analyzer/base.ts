import type { Diagnostic, Dimension, Finding } from '../../types/index.js'
import type { RuleContext } from '../rules/base.js'

/**
 * Context provided to analyzers: one rule context per statement, in statement order
 */
export interface AnalyzerContext {
  statements: readonly RuleContext[]
}

/**
 * What one analyzer produced
 */
export interface AnalyzerResult {
  analyzer: string
  findings: Finding[]
  diagnostics: Diagnostic[]
  /** Wall time in milliseconds */
  duration: number
  error?: string
}

export interface AnalyzerOutput {
  findings: Finding[]
  diagnostics: Diagnostic[]
}

/**
 * Abstract base class for all analyzers
 */
export abstract class BaseAnalyzer {
  abstract readonly name: string
  abstract readonly dimension: Dimension

  /**
   * Run the analysis over every statement in context
   */
  abstract analyze(context: AnalyzerContext): AnalyzerOutput

  /**
   * Execute the analyzer with error handling and timing
   */
  execute(context: AnalyzerContext): AnalyzerResult {
    const start = Date.now()
    try {
      const { findings, diagnostics } = this.analyze(context)
      return {
        analyzer: this.name,
        findings,
        diagnostics,
        duration: Date.now() - start
      }
    } catch (error) {
      return {
        analyzer: this.name,
        findings: [],
        diagnostics: [],
        duration: Date.now() - start,
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }
}
