import { writeFile } from 'fs/promises'
import type { AnalysisReport, Decision, Severity } from '../../types/index.js'
import type { SerializedFinding, SerializedResult } from '../engine/serialize.js'
import type { Reporter, JsonReportOptions } from './base.js'
import { maskReport } from './json.js'

export type MarkdownReportOptions = JsonReportOptions

function getDecisionBadge(decision: Decision): { emoji: string; label: string } {
  const badges: Record<Decision, { emoji: string; label: string }> = {
    pass: { emoji: '✅', label: 'PASS' },
    warn: { emoji: '⚠️', label: 'WARN' },
    fail: { emoji: '❌', label: 'FAIL' }
  }
  return badges[decision]
}

function getSeverityEmoji(severity: Severity): string {
  const emojis: Record<Severity, string> = {
    critical: '🔴',
    high: '🟠',
    medium: '🟡',
    low: '🔵',
    info: 'ℹ️'
  }
  return emojis[severity]
}

/**
 * Format duration in seconds
 */
function formatDuration(ms: number): string {
  return (ms / 1000).toFixed(2)
}

function groupFindingsBySeverity(findings: readonly SerializedFinding[]): Map<Severity, SerializedFinding[]> {
  const groups = new Map<Severity, SerializedFinding[]>()
  const severityOrder: Severity[] = ['critical', 'high', 'medium', 'low', 'info']

  for (const severity of severityOrder) {
    groups.set(severity, [])
  }

  for (const finding of findings) {
    groups.get(finding.severity)?.push(finding)
  }

  return groups
}

function formatLocation(finding: SerializedFinding): string {
  const { file, line, column, statementIndex } = finding.location
  if (file) {
    return `${file}:${line}:${column}`
  }
  return `statement ${statementIndex}, line ${line}, column ${column}`
}

function generateSourcesSection(results: readonly SerializedResult[]): string {
  const lines: string[] = [
    '## Sources',
    '',
    '| Source | Dialect | Statements | Parsed | Findings |',
    '|--------|---------|------------|--------|----------|'
  ]

  for (const result of results) {
    const { totalStatements, parsedStatements, totalFindings } = result.statistics
    lines.push(
      `| \`${result.file ?? '<stdin>'}\` | ${result.dialect} | ${totalStatements} | ${parsedStatements} | ${totalFindings} |`
    )
  }

  lines.push('')

  return lines.join('\n')
}

function generateSummarySection(report: AnalysisReport): string {
  const lines: string[] = [
    '## Summary',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Score | **${report.score}**/100 |`,
    `| Config | ${report.configName} |`,
    `| Suppressed | ${report.suppressed} |`,
    `| Duration | ${formatDuration(report.duration)}s |`,
    '',
    '### Findings by Severity',
    '',
    '| Severity | Count |',
    '|----------|-------|',
    `| 🔴 Critical | ${report.summary.critical} |`,
    `| 🟠 High | ${report.summary.high} |`,
    `| 🟡 Medium | ${report.summary.medium} |`,
    `| 🔵 Low | ${report.summary.low} |`,
    `| ℹ️ Info | ${report.summary.info} |`,
    ''
  ]

  return lines.join('\n')
}

function generateFindingItem(shown: SerializedFinding): string {
  const lines: string[] = [
    `#### ${shown.rule}: ${shown.title}`,
    '',
    `**Dimension:** ${shown.dimension}${shown.category ? ` (${shown.category})` : ''}`,
    `**Location:** \`${formatLocation(shown)}\``,
    '',
    shown.description,
    '',
    `**Fix:** ${shown.fix}`,
    '',
    '```sql',
    shown.query,
    '```',
    ''
  ]

  return lines.join('\n')
}

function generateFindingsSection(findings: readonly SerializedFinding[]): string {
  if (findings.length === 0) {
    return '## Findings\n\n✅ No issues found.\n'
  }

  const lines: string[] = ['## Findings', '']
  const grouped = groupFindingsBySeverity(findings)

  for (const [severity, severityFindings] of grouped) {
    if (severityFindings.length === 0) {
      continue
    }

    const emoji = getSeverityEmoji(severity)
    lines.push(`### ${emoji} ${severity.charAt(0).toUpperCase() + severity.slice(1)} (${severityFindings.length})`)
    lines.push('')

    for (const finding of severityFindings) {
      lines.push(generateFindingItem(finding))
    }
  }

  return lines.join('\n')
}

function generateDiagnosticsSection(results: readonly SerializedResult[]): string {
  const lines: string[] = []

  for (const result of results) {
    for (const diagnostic of result.diagnostics) {
      lines.push(`- \`${result.file ?? '<stdin>'}\` ${diagnostic.kind}: ${diagnostic.message}`)
    }
  }

  if (lines.length === 0) {
    return ''
  }

  return ['## Diagnostics', '', ...lines, ''].join('\n')
}

function generateErrorsSection(errors: readonly string[]): string {
  if (errors.length === 0) {
    return ''
  }

  const lines: string[] = [
    '## Errors',
    '',
    'The following errors occurred during analysis:',
    ''
  ]

  for (const error of errors) {
    lines.push(`- ${error}`)
  }

  lines.push('')

  return lines.join('\n')
}

/**
 * Markdown Reporter for analysis results
 *
 * Outputs reports in Markdown format for human consumption.
 */
export class MarkdownReporter implements Reporter {
  private readonly defaultOptions: MarkdownReportOptions = {
    format: 'markdown',
    maskSecrets: true
  }

  generate(report: AnalysisReport, options?: Partial<MarkdownReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    const { emoji, label } = getDecisionBadge(report.decision)
    const shown = opts.maskSecrets === false ? report : maskReport(report)
    const findings = shown.results.flatMap(result => result.findings)

    const sections: string[] = [
      '# SQL Analysis Report',
      '',
      `**Decision:** ${emoji} **${label}**`,
      '',
      `*Generated: ${report.timestamp}*`,
      `*Version: ${report.version}*`,
      '',
      '---',
      '',
      generateSourcesSection(report.results),
      generateSummarySection(report),
      generateFindingsSection(findings),
      generateDiagnosticsSection(report.results),
      generateErrorsSection(report.errors),
      '---',
      '',
      '*Report generated by sqlscout*'
    ]

    return sections.filter(Boolean).join('\n')
  }

  async write(report: AnalysisReport, options?: Partial<MarkdownReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const markdown = this.generate(report, opts)

    if (opts.output) {
      await writeFile(opts.output, markdown, 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(markdown + '\n')
    }
  }
}

export function createMarkdownReporter(): MarkdownReporter {
  return new MarkdownReporter()
}
