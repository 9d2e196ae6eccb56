import type { Diagnostic, Dimension, Finding, Severity } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { withSeverity } from '../finding.js'
import type { RuleRegistry } from '../registry/registry.js'
import type { Rule } from '../rules/base.js'
import { BaseAnalyzer, type AnalyzerContext, type AnalyzerOutput } from './base.js'

const logger = createLogger('analyzer')

/**
 * Per-run rule adjustments from configuration
 */
export interface RuleSelection {
  /** Rule ids to skip */
  disabledRules?: ReadonlySet<string>
  /** Ids of registry-disabled rules to run anyway */
  enabledRules?: ReadonlySet<string>
  /** Severity to report instead of the rule's own */
  severityOverrides?: Readonly<Record<string, Severity>>
}

export function isRuleActive(rule: Rule, selection: RuleSelection): boolean {
  if (selection.disabledRules?.has(rule.id)) return false
  return rule.enabled || (selection.enabledRules?.has(rule.id) ?? false)
}

/**
 * Runs the registry's active rules of one dimension, in registration order
 */
export class DimensionAnalyzer extends BaseAnalyzer {
  readonly name: string

  constructor(
    readonly dimension: Dimension,
    private readonly registry: RuleRegistry,
    private readonly selection: RuleSelection = {}
  ) {
    super()
    this.name = `${dimension}-analyzer`
  }

  analyze(context: AnalyzerContext): AnalyzerOutput {
    const rules = this.registry
      .inCatalogOrder()
      .filter((rule) => rule.dimension === this.dimension && isRuleActive(rule, this.selection))
    const findings: Finding[] = []
    const diagnostics: Diagnostic[] = []

    for (const ruleContext of context.statements) {
      for (const rule of rules) {
        try {
          findings.push(...rule.check(ruleContext).map((finding) => this.adjust(finding)))
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          logger.warn(`Rule ${rule.id} failed on statement ${ruleContext.statement.index}: ${message}`)
          diagnostics.push({
            kind: 'rule-failed',
            statementIndex: ruleContext.statement.index,
            rule: rule.id,
            message
          })
        }
      }
    }
    return { findings, diagnostics }
  }

  private adjust(finding: Finding): Finding {
    const severity = this.selection.severityOverrides?.[finding.rule]
    return severity && severity !== finding.severity ? withSeverity(finding, severity) : finding
  }
}
