/**
 * Severity levels for findings, ordered from least to most severe
 */
export type Severity = 'info' | 'low' | 'medium' | 'high' | 'critical'

/**
 * Top-level classification axis for a finding
 */
export type Dimension =
  | 'security'
  | 'performance'
  | 'reliability'
  | 'compliance'
  | 'quality'
  | 'cost'

/**
 * Location information for a finding
 */
export interface FindingLocation {
  /** Zero-based index of the statement within the analyzed text */
  statementIndex: number
  /** 1-based line of the statement's first character */
  line: number
  /** 1-based column of the statement's first character */
  column: number
  file?: string
}

/**
 * Detector-specific annotations attached to a finding
 */
export interface FindingMetadata {
  /** Set on critical security findings */
  critical?: boolean
  /** Threshold the observed value was compared against */
  threshold?: number
  observed?: number
  /** Matched fragment of the normalized statement */
  match?: string
  annotations?: Record<string, string>
}

/**
 * A single problem detected in a SQL statement
 */
export interface Finding {
  /** Rule identifier that triggered this finding */
  readonly rule: string

  /** Human-readable issue type */
  readonly title: string

  readonly description: string
  readonly fix: string
  readonly impact: string

  readonly severity: Severity
  readonly dimension: Dimension
  readonly category?: string

  readonly location: FindingLocation

  /** Original statement text, as written */
  readonly query: string

  readonly metadata?: FindingMetadata
}

/**
 * Count of findings per severity
 */
export type FindingSummary = Record<Severity, number>

/**
 * Count of findings per dimension
 */
export type DimensionSummary = Record<Dimension, number>
