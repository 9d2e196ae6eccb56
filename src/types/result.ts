import type { Dialect, Statement } from './statement.js'
import type { DimensionSummary, Finding, FindingSummary } from './finding.js'

export type DiagnosticKind = 'parse-failed' | 'rule-failed' | 'segmentation-fallback' | 'unsupported-dialect'

/**
 * A non-fatal problem encountered while analyzing a batch
 */
export interface Diagnostic {
  kind: DiagnosticKind
  statementIndex?: number
  rule?: string
  message: string
}

export interface AnalysisStatistics {
  totalStatements: number
  parsedStatements: number
  totalFindings: number
  bySeverity: FindingSummary
  byDimension: DimensionSummary
  /** Finding count per rule id, in first-seen order */
  byRule: Record<string, number>
}

/**
 * Everything produced by one analysis run
 */
export interface AnalysisResult {
  readonly version: string
  /** SHA-256 of the analyzed text */
  readonly fingerprint: string
  readonly dialect: Dialect | 'unknown'
  readonly file?: string
  readonly statements: readonly Statement[]
  readonly findings: readonly Finding[]
  readonly diagnostics: readonly Diagnostic[]
  readonly statistics: AnalysisStatistics
  /** Wall time in milliseconds */
  readonly duration: number
}
