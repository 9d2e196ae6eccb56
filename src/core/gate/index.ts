import type { Decision, Finding } from '../../types/index.js'
import type { Config } from '../config/schema.js'
import { GateEngine, type GateEvaluation } from './engine.js'

/**
 * Exit codes for CLI
 */
export const ExitCodes: Record<Decision | 'error', number> = {
  pass: 0,
  fail: 1,
  warn: 2,
  error: 3
} as const

/**
 * Result of the quality gate
 */
export interface GateResult {
  decision: Decision
  exitCode: number
  evaluation: GateEvaluation
  /** Human-readable summary */
  summary: string
  /** Reasons for the decision */
  reasons: string[]
  configName: string
  timestamp: string
}

export type GateSettings = Pick<Config, 'name' | 'gate' | 'exceptions'>

export class QualityGate {
  private engine: GateEngine

  constructor(private readonly settings: GateSettings) {
    this.engine = new GateEngine(settings.gate, settings.exceptions)
  }

  enforce(findings: readonly Finding[]): GateResult {
    const evaluation = this.engine.evaluate(findings)
    const decision = this.engine.getDecision(evaluation)

    return {
      decision,
      exitCode: ExitCodes[decision],
      evaluation,
      summary: this.buildSummary(evaluation, decision),
      reasons: this.buildReasons(evaluation),
      configName: this.settings.name,
      timestamp: new Date().toISOString()
    }
  }

  private buildReasons(evaluation: GateEvaluation): string[] {
    const reasons: string[] = []

    if (evaluation.failingRules.length > 0) {
      reasons.push(
        `Findings at or above ${this.engine.failOn}: ${evaluation.failingRules.join(', ')}`
      )
    }

    if (evaluation.warningRules.length > 0) {
      reasons.push(
        `Findings at or above ${this.engine.warnOn}: ${evaluation.warningRules.join(', ')}`
      )
    }

    if (evaluation.suppressedFindings.length > 0) {
      reasons.push(
        `${evaluation.suppressedFindings.length} finding(s) suppressed by exceptions`
      )
    }

    return reasons
  }

  private buildSummary(evaluation: GateEvaluation, decision: Decision): string {
    const decisionText = {
      pass: 'PASSED',
      warn: 'WARNED',
      fail: 'FAILED'
    }[decision]

    const count = evaluation.findings.length
    if (count === 0) {
      return `${decisionText}: No issues detected. Score: ${evaluation.score}/100`
    }

    return `${decisionText}: ${count} finding(s). Score: ${evaluation.score}/100`
  }
}

/**
 * Create a quality gate from configuration
 */
export function createQualityGate(settings: GateSettings): QualityGate {
  return new QualityGate(settings)
}

export { GateEngine, DEFAULT_WEIGHTS, type GateEvaluation } from './engine.js'
