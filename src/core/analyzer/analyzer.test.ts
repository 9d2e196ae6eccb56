import { describe, it, expect, vi, afterEach } from 'vitest'
import { AnalyzerOrchestrator, BaseAnalyzer, DimensionAnalyzer, createOrchestrator, isRuleActive } from './index.js'
import type { AnalyzerContext, AnalyzerOutput } from './index.js'
import { RuleRegistry } from '../registry/registry.js'
import { BaseRule, createRuleContext, type RuleContext } from '../rules/base.js'
import { createStatement } from '../statement.js'
import type { Dimension, Finding, Severity } from '../../types/index.js'

class KeywordRule extends BaseRule {
  constructor(id: string, dimension: Dimension, private readonly keyword: RegExp, severity: Severity = 'medium') {
    super({ id, name: id, description: 'd', fix: 'f', impact: 'i', severity, dimension })
  }

  check(context: RuleContext): Finding[] {
    return this.keyword.test(context.statement.normalized) ? [this.report(context)] : []
  }
}

class ThrowingRule extends BaseRule {
  constructor() {
    super({ id: 'BAD-001', name: 'bad', description: 'd', fix: 'f', impact: 'i', severity: 'low', dimension: 'quality' })
  }

  check(): Finding[] {
    throw new Error('kaboom')
  }
}

function context(...sql: string[]): AnalyzerContext {
  return {
    statements: sql.map((raw, index) =>
      createRuleContext(
        createStatement({
          index,
          raw,
          dialect: 'unknown',
          location: { statementIndex: index, line: index + 1, column: 1, offset: 0 }
        })
      )
    )
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('DimensionAnalyzer', () => {
  it('should run only its dimension in registration order', () => {
    const registry = new RuleRegistry()
    registry.register(new KeywordRule('Z-001', 'quality', /SELECT/))
    registry.register(new KeywordRule('A-001', 'quality', /SELECT/))
    registry.register(new KeywordRule('S-001', 'security', /SELECT/))

    const result = new DimensionAnalyzer('quality', registry).execute(context('SELECT 1'))

    expect(result.analyzer).toBe('quality-analyzer')
    expect(result.findings.map((finding) => finding.rule)).toEqual(['Z-001', 'A-001'])
    expect(result.error).toBeUndefined()
  })

  it('should skip disabled rules unless selected', () => {
    const registry = new RuleRegistry()
    const off = new KeywordRule('OFF-001', 'quality', /SELECT/)
    off.enabled = false
    registry.register(off)
    registry.register(new KeywordRule('ON-001', 'quality', /SELECT/))

    const plain = new DimensionAnalyzer('quality', registry).execute(context('SELECT 1'))
    const selected = new DimensionAnalyzer('quality', registry, {
      enabledRules: new Set(['OFF-001']),
      disabledRules: new Set(['ON-001'])
    }).execute(context('SELECT 1'))

    expect(plain.findings.map((finding) => finding.rule)).toEqual(['ON-001'])
    expect(selected.findings.map((finding) => finding.rule)).toEqual(['OFF-001'])
  })

  it('should apply severity overrides', () => {
    const registry = new RuleRegistry()
    registry.register(new KeywordRule('A-001', 'quality', /SELECT/))

    const result = new DimensionAnalyzer('quality', registry, { severityOverrides: { 'A-001': 'high' } }).execute(
      context('SELECT 1')
    )

    expect(result.findings[0].severity).toBe('high')
  })

  it('should clear the critical flag when a security rule is demoted', () => {
    const registry = new RuleRegistry()
    registry.register(new KeywordRule('S-001', 'security', /SELECT/, 'critical'))

    const plain = new DimensionAnalyzer('security', registry).execute(context('SELECT 1'))
    const demoted = new DimensionAnalyzer('security', registry, { severityOverrides: { 'S-001': 'low' } }).execute(
      context('SELECT 1')
    )

    expect(plain.findings[0].metadata).toEqual({ critical: true })
    expect(demoted.findings[0].severity).toBe('low')
    expect(demoted.findings[0].metadata).toBeUndefined()
  })

  it('should set the critical flag when a security rule is promoted', () => {
    const registry = new RuleRegistry()
    registry.register(new KeywordRule('S-001', 'security', /SELECT/))
    registry.register(new KeywordRule('Q-001', 'quality', /SELECT/))

    const security = new DimensionAnalyzer('security', registry, { severityOverrides: { 'S-001': 'critical' } }).execute(
      context('SELECT 1')
    )
    const quality = new DimensionAnalyzer('quality', registry, { severityOverrides: { 'Q-001': 'critical' } }).execute(
      context('SELECT 1')
    )

    expect(security.findings[0].metadata).toEqual({ critical: true })
    expect(quality.findings[0].severity).toBe('critical')
    expect(quality.findings[0].metadata).toBeUndefined()
  })

  it('should turn a throwing rule into a diagnostic', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const registry = new RuleRegistry()
    registry.register(new ThrowingRule())
    registry.register(new KeywordRule('A-001', 'quality', /SELECT/))

    const result = new DimensionAnalyzer('quality', registry).execute(context('SELECT 1'))

    expect(result.findings.map((finding) => finding.rule)).toEqual(['A-001'])
    expect(result.diagnostics).toEqual([
      { kind: 'rule-failed', statementIndex: 0, rule: 'BAD-001', message: 'kaboom' }
    ])
  })
})

describe('BaseAnalyzer.execute', () => {
  it('should capture a thrown error', () => {
    class Broken extends BaseAnalyzer {
      readonly name = 'broken'
      readonly dimension = 'cost' as const

      analyze(): AnalyzerOutput {
        throw new Error('analyzer down')
      }
    }

    const result = new Broken().execute(context('SELECT 1'))

    expect(result.findings).toEqual([])
    expect(result.error).toBe('analyzer down')
    expect(result.duration).toBeGreaterThanOrEqual(0)
  })
})

describe('AnalyzerOrchestrator', () => {
  it('should order findings by statement, then registration order', () => {
    const registry = new RuleRegistry()
    registry.register(new KeywordRule('SEC-001', 'security', /DELETE|SELECT/))
    registry.register(new KeywordRule('PERF-001', 'performance', /SELECT/))
    registry.register(new KeywordRule('QUAL-001', 'quality', /DELETE/))

    const output = createOrchestrator(registry).run(context('DELETE FROM t', 'SELECT 1'))

    expect(output.findings.map((finding) => [finding.location.statementIndex, finding.rule])).toEqual([
      [0, 'SEC-001'],
      [0, 'QUAL-001'],
      [1, 'SEC-001'],
      [1, 'PERF-001']
    ])
    expect(output.results).toHaveLength(6)
  })

  it('should report a failed analyzer as a diagnostic', () => {
    class Broken extends BaseAnalyzer {
      readonly name = 'broken'
      readonly dimension = 'cost' as const

      analyze(): AnalyzerOutput {
        throw new Error('analyzer down')
      }
    }
    const orchestrator = new AnalyzerOrchestrator(new RuleRegistry())
    orchestrator.register(new Broken())

    expect(orchestrator.analyzerCount).toBe(1)
    expect(orchestrator.run(context('SELECT 1')).diagnostics).toEqual([
      { kind: 'rule-failed', message: 'Analyzer broken failed: analyzer down' }
    ])
  })
})

describe('isRuleActive', () => {
  it('should let disabledRules win', () => {
    const rule = new KeywordRule('A-001', 'quality', /x/)

    expect(isRuleActive(rule, {})).toBe(true)
    expect(isRuleActive(rule, { disabledRules: new Set(['A-001']), enabledRules: new Set(['A-001']) })).toBe(false)
  })
})
