export { BaseAnalyzer, type AnalyzerContext, type AnalyzerResult, type AnalyzerOutput } from './base.js'
export { DimensionAnalyzer, isRuleActive, type RuleSelection } from './dimension.js'

import type { Diagnostic, Finding } from '../../types/index.js'
import { DIMENSIONS } from '../taxonomy.js'
import type { RuleRegistry } from '../registry/registry.js'
import type { AnalyzerContext, AnalyzerResult, BaseAnalyzer } from './base.js'
import { DimensionAnalyzer, type RuleSelection } from './dimension.js'

export interface OrchestratorOutput {
  /** Sorted by statement index, then rule registration order */
  findings: Finding[]
  diagnostics: Diagnostic[]
  results: AnalyzerResult[]
}

/**
 * Runs every registered analyzer and merges their output in a fixed order
 */
export class AnalyzerOrchestrator {
  private analyzers: BaseAnalyzer[] = []

  constructor(private readonly registry: RuleRegistry) {}

  register(analyzer: BaseAnalyzer): void {
    this.analyzers = [...this.analyzers, analyzer]
  }

  get analyzerCount(): number {
    return this.analyzers.length
  }

  run(context: AnalyzerContext): OrchestratorOutput {
    const results = this.analyzers.map((analyzer) => analyzer.execute(context))
    const order = new Map(this.registry.inCatalogOrder().map((rule, index) => [rule.id, index]))
    const rank = (finding: Finding) => order.get(finding.rule) ?? Number.MAX_SAFE_INTEGER

    const findings = results
      .flatMap((result) => result.findings)
      .sort((a, b) => a.location.statementIndex - b.location.statementIndex || rank(a) - rank(b))

    const diagnostics = results.flatMap((result) => [
      ...result.diagnostics,
      ...(result.error
        ? [{ kind: 'rule-failed' as const, message: `Analyzer ${result.analyzer} failed: ${result.error}` }]
        : [])
    ])

    return { findings, diagnostics, results }
  }
}

/**
 * Orchestrator with one analyzer per dimension
 */
export function createOrchestrator(registry: RuleRegistry, selection: RuleSelection = {}): AnalyzerOrchestrator {
  const orchestrator = new AnalyzerOrchestrator(registry)
  for (const dimension of DIMENSIONS) {
    orchestrator.register(new DimensionAnalyzer(dimension, registry, selection))
  }
  return orchestrator
}
