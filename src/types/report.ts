import type { FindingSummary } from './finding.js'
import type { SerializedResult } from '../core/engine/serialize.js'

/**
 * Decision made by the quality gate
 */
export type Decision = 'pass' | 'warn' | 'fail'

/**
 * Complete analysis report over one or more inputs
 */
export interface AnalysisReport {
  /** Report version */
  version: string

  /** Timestamp of the run */
  timestamp: string

  /** Files (or `<stdin>`) that were analyzed */
  sources: string[]

  /** Final decision */
  decision: Decision

  /** Health score (0-100) */
  score: number

  /** Per-input analysis results */
  results: SerializedResult[]

  /** Summary of gated findings by severity */
  summary: FindingSummary

  /** Findings removed by configured exceptions */
  suppressed: number

  /** Wall time in milliseconds */
  duration: number

  /** Configuration used for evaluation */
  configName: string

  /** Any errors encountered */
  errors: string[]
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'json' | 'markdown'
  output?: string
  quiet?: boolean
}
