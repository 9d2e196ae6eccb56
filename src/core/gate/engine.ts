import { minimatch } from 'minimatch'
import type { Decision, Finding, Severity } from '../../types/index.js'
import type { Exception, GateConfig } from '../config/schema.js'
import { severityAtLeast } from '../taxonomy.js'

/**
 * Score deducted per finding when the config gives no weight
 */
export const DEFAULT_WEIGHTS: Readonly<Record<Severity, number>> = Object.freeze({
  critical: 25,
  high: 10,
  medium: 4,
  low: 1,
  info: 0
})

/**
 * Result of gate evaluation
 */
export interface GateEvaluation {
  /** Health score (0-100, starting from 100) */
  score: number

  /** Findings that count toward the decision */
  findings: Finding[]

  /** Rules with at least one finding at or above failOn */
  failingRules: string[]

  /** Rules with at least one finding at or above warnOn, below failOn */
  warningRules: string[]

  /** Findings removed by exceptions */
  suppressedFindings: Finding[]
}

export class GateEngine {
  private readonly weights: Record<Severity, number>

  constructor(
    private readonly gate: GateConfig,
    private readonly exceptions: readonly Exception[] = []
  ) {
    this.weights = { ...DEFAULT_WEIGHTS, ...gate.weights }
  }

  evaluate(findings: readonly Finding[]): GateEvaluation {
    let score = 100
    const kept: Finding[] = []
    const suppressedFindings: Finding[] = []
    const failingRules = new Set<string>()
    const warningRules = new Set<string>()

    for (const finding of findings) {
      if (this.isSuppressed(finding)) {
        suppressedFindings.push(finding)
        continue
      }

      kept.push(finding)
      score -= this.weights[finding.severity]

      if (severityAtLeast(finding.severity, this.gate.failOn)) {
        failingRules.add(finding.rule)
      } else if (severityAtLeast(finding.severity, this.gate.warnOn)) {
        warningRules.add(finding.rule)
      }
    }

    return {
      score: Math.max(0, score),
      findings: kept,
      failingRules: [...failingRules],
      warningRules: [...warningRules],
      suppressedFindings
    }
  }

  /**
   * Findings without a file are never suppressed
   */
  private isSuppressed(finding: Finding): boolean {
    const file = finding.location.file
    if (file === undefined) {
      return false
    }
    return this.exceptions.some(
      exception => exception.ignore.includes(finding.rule) && minimatch(file, exception.pattern)
    )
  }

  getDecision(evaluation: GateEvaluation): Decision {
    if (evaluation.failingRules.length > 0) {
      return 'fail'
    }
    if (evaluation.warningRules.length > 0) {
      return 'warn'
    }
    return 'pass'
  }

  get failOn(): Severity {
    return this.gate.failOn
  }

  get warnOn(): Severity {
    return this.gate.warnOn
  }
}
