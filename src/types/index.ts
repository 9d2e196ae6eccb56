export type {
  Severity,
  Dimension,
  FindingLocation,
  FindingMetadata,
  Finding,
  FindingSummary,
  DimensionSummary
} from './finding.js'
export type {
  Dialect,
  StatementKind,
  StatementLocation,
  Statement
} from './statement.js'
export type {
  DiagnosticKind,
  Diagnostic,
  AnalysisStatistics,
  AnalysisResult
} from './result.js'
export type { Decision, AnalysisReport, ReportOptions } from './report.js'
