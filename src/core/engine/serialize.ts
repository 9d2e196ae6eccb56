import type {
  AnalysisResult,
  AnalysisStatistics,
  Dialect,
  DiagnosticKind,
  FindingLocation,
  FindingMetadata,
  Severity,
  Dimension,
  StatementKind
} from '../../types/index.js'

export interface SerializedStatement {
  index: number
  kind: StatementKind
  dialect: Dialect | 'unknown'
  line: number
  column: number
  tables: string[]
  columns: string[]
  parsed: boolean
}

export interface SerializedFinding {
  rule: string
  title: string
  severity: Severity
  dimension: Dimension
  category: string | null
  description: string
  fix: string
  impact: string
  location: FindingLocation
  query: string
  metadata: FindingMetadata
}

export interface SerializedDiagnostic {
  kind: DiagnosticKind
  statementIndex: number | null
  rule: string | null
  message: string
}

/**
 * Stable JSON shape of an analysis result
 */
export interface SerializedResult {
  version: string
  fingerprint: string
  dialect: Dialect | 'unknown'
  file: string | null
  duration: number
  statistics: AnalysisStatistics
  statements: SerializedStatement[]
  findings: SerializedFinding[]
  diagnostics: SerializedDiagnostic[]
}

export function toJSON(result: AnalysisResult): SerializedResult {
  return {
    version: result.version,
    fingerprint: result.fingerprint,
    dialect: result.dialect,
    file: result.file ?? null,
    duration: result.duration,
    statistics: {
      ...result.statistics,
      bySeverity: { ...result.statistics.bySeverity },
      byDimension: { ...result.statistics.byDimension },
      byRule: { ...result.statistics.byRule }
    },
    statements: result.statements.map((statement) => ({
      index: statement.index,
      kind: statement.kind,
      dialect: statement.dialect,
      line: statement.location.line,
      column: statement.location.column,
      tables: [...statement.tables],
      columns: [...statement.columns],
      parsed: statement.facts.available
    })),
    findings: result.findings.map((finding) => ({
      rule: finding.rule,
      title: finding.title,
      severity: finding.severity,
      dimension: finding.dimension,
      category: finding.category ?? null,
      description: finding.description,
      fix: finding.fix,
      impact: finding.impact,
      location: { ...finding.location },
      query: finding.query,
      metadata: { ...finding.metadata }
    })),
    diagnostics: result.diagnostics.map((diagnostic) => ({
      kind: diagnostic.kind,
      statementIndex: diagnostic.statementIndex ?? null,
      rule: diagnostic.rule ?? null,
      message: diagnostic.message
    }))
  }
}
