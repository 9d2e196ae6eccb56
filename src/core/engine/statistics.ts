import type { AnalysisStatistics, Finding, Statement } from '../../types/index.js'
import { emptyDimensionSummary, summarizeBySeverity } from '../taxonomy.js'

/**
 * Aggregate counts over one analysis run. Every severity and dimension is
 * listed, zero included; `byRule` follows finding order.
 */
export function computeStatistics(
  statements: readonly Statement[],
  findings: readonly Finding[]
): AnalysisStatistics {
  const byDimension = emptyDimensionSummary()
  const byRule: Record<string, number> = {}
  for (const finding of findings) {
    byDimension[finding.dimension]++
    byRule[finding.rule] = (byRule[finding.rule] ?? 0) + 1
  }

  return {
    totalStatements: statements.length,
    parsedStatements: statements.filter((statement) => statement.facts.available).length,
    totalFindings: findings.length,
    bySeverity: summarizeBySeverity(findings),
    byDimension,
    byRule
  }
}
