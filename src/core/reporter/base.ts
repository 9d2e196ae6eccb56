import type { AnalysisReport, ReportOptions } from '../../types/index.js'

/**
 * Base interface for all reporters
 */
export interface Reporter {
  /**
   * Generate a report from analysis results
   */
  generate(report: AnalysisReport, options?: Partial<ReportOptions>): string

  /**
   * Write report to file or stdout
   */
  write(report: AnalysisReport, options?: Partial<ReportOptions>): Promise<void>
}

/**
 * Extended report options with format-specific settings
 */
export interface JsonReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
  /** Mask quoted literals in critical security findings */
  maskSecrets?: boolean
}
