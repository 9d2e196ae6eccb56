import { writeFile } from 'fs/promises'
import type { AnalysisReport } from '../../types/index.js'
import { maskCriticalFindings } from '../../utils/mask.js'
import type { Reporter, JsonReportOptions } from './base.js'

/**
 * Mask secret literals in every result of a report
 */
export function maskReport(report: AnalysisReport): AnalysisReport {
  return {
    ...report,
    results: report.results.map(result => ({
      ...result,
      findings: maskCriticalFindings(result.findings)
    }))
  }
}

/**
 * JSON Reporter for analysis results
 *
 * Outputs reports in JSON format for machine consumption.
 * Quoted literals of statements with a critical security finding are masked
 * unless disabled.
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'json',
    pretty: true,
    maskSecrets: true
  }

  generate(report: AnalysisReport, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    const outputReport = opts.maskSecrets ? maskReport(report) : report

    if (opts.pretty) {
      return JSON.stringify(outputReport, null, 2)
    }

    return JSON.stringify(outputReport)
  }

  async write(report: AnalysisReport, options?: Partial<JsonReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const json = this.generate(report, opts)

    if (opts.output) {
      await writeFile(opts.output, json, 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(json + '\n')
    }
  }
}

/**
 * Create a new JSON reporter instance
 */
export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
