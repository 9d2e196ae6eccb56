import { describe, it, expect } from 'vitest'
import { createEngine, toJSON } from './index.js'
import { ParseError, UnsupportedDialectError } from '../errors.js'
import type { SqlParser, ParseOutcome } from '../parser/types.js'
import type { Dialect } from '../../types/index.js'

class FakeParser implements SqlParser {
  readonly name = 'fake'
  readonly calls: { text: string; dialect?: Dialect }[] = []

  constructor(private readonly respond: (text: string) => ParseOutcome = () => ({ ok: false, reason: 'unsupported' })) {}

  parse(text: string, dialect?: Dialect): ParseOutcome {
    this.calls.push({ text, dialect })
    return this.respond(text)
  }
}

function ids(sql: string): [number, string][] {
  return createEngine()
    .analyze(sql)
    .findings.map((finding) => [finding.location.statementIndex, finding.rule])
}

describe('createEngine', () => {
  it('should reject an unsupported dialect at construction', () => {
    expect(() => createEngine({ dialect: 'cobol' })).toThrow(UnsupportedDialectError)
  })

  it('should resolve dialect aliases', () => {
    expect(createEngine({ dialect: 'PostgreSQL' }).dialect).toBe('postgres')
  })
})

describe('AnalysisEngine.analyze', () => {
  it('should report SELECT * as one medium finding', () => {
    const result = createEngine().analyze('SELECT * FROM users')

    expect(result.findings).toHaveLength(1)
    expect(result.findings[0].title).toBe('SELECT * Usage')
    expect(result.findings[0].severity).toBe('medium')
  })

  it('should report DELETE without WHERE as one critical finding', () => {
    const result = createEngine().analyze('DELETE FROM users')

    expect(result.findings).toHaveLength(1)
    expect(result.findings[0].severity).toBe('critical')
    expect(result.findings[0].category).toBe('missing WHERE')
  })

  it('should report NULL equality alongside SELECT *', () => {
    const result = createEngine().analyze('SELECT * FROM users WHERE status = NULL')

    expect(result.findings.map((finding) => [finding.rule, finding.severity])).toEqual([
      ['PERF-SCAN-001', 'medium'],
      ['REL-NULL-001', 'critical']
    ])
    expect(result.statistics.bySeverity).toEqual({ info: 0, low: 0, medium: 1, high: 0, critical: 1 })
    expect(result.statistics.byDimension).toEqual({
      security: 0,
      performance: 1,
      reliability: 1,
      compliance: 0,
      quality: 0,
      cost: 0
    })
    expect(result.statistics.byRule).toEqual({ 'PERF-SCAN-001': 1, 'REL-NULL-001': 1 })
  })

  it('should keep analyzing around a statement the parser rejects', () => {
    const result = createEngine().analyze('SELECT * FROM users;\nSELEC FROM WHERE;\nDELETE FROM orders;')

    expect(result.statements).toHaveLength(3)
    expect(result.findings.map((finding) => [finding.location.statementIndex, finding.rule])).toEqual([
      [0, 'PERF-SCAN-001'],
      [2, 'REL-DML-001']
    ])
    expect(result.diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.statementIndex])).toEqual([
      ['parse-failed', 1]
    ])
    expect(result.statements[1].parseError).toBeDefined()
    expect(result.statistics.parsedStatements).toBe(2)
  })

  it('should locate statements by line and column', () => {
    const result = createEngine().analyze('SELECT 1;\n  DELETE FROM users;')

    expect(result.findings[0].location).toEqual({ statementIndex: 1, line: 2, column: 3 })
    expect(result.findings[0].query).toBe('DELETE FROM users')
  })

  it('should be deterministic', () => {
    const sql = "select * FROM Users WHERE id IN (SELECT user_id FROM bans); DELETE FROM audit_log; UPDATE t SET a = NULL"

    expect(ids(sql)).toEqual(ids(sql))
  })

  it('should fingerprint the input', () => {
    expect(createEngine().analyze('SELECT 1').fingerprint).toBe(
      'e004ebd5b5532a4b85984a62f8ad48a81aa3460c1ca07701f386135d72cdecf5'
    )
  })

  it('should record a segmentation fallback', () => {
    const result = createEngine({ parser: new FakeParser() }).analyze("SELECT 'abc")

    expect(result.diagnostics[0].kind).toBe('segmentation-fallback')
    expect(result.diagnostics[0].message).toContain('Unterminated string literal')
  })

  it('should pass the dialect hint to the parser', () => {
    const parser = new FakeParser()
    const result = createEngine({ parser }).analyze('SELECT 1', { dialect: 'mssql', file: 'a.sql' })

    expect(result.dialect).toBe('tsql')
    expect(result.file).toBe('a.sql')
    expect(parser.calls).toEqual([{ text: 'SELECT 1', dialect: 'tsql' }])
  })

  it('should report an unsupported dialect hint instead of throwing', () => {
    const parser = new FakeParser((text) => ({
      ok: true,
      tables: [],
      columns: [],
      statementKind: 'SELECT',
      normalizedText: text,
      ast: {}
    }))
    const result = createEngine({ parser, dialect: 'mysql' }).analyze('SELECT 1', { dialect: 'cobol' })

    expect(result.dialect).toBe('mysql')
    expect(result.diagnostics).toEqual([
      { kind: 'unsupported-dialect', message: 'Unsupported SQL dialect: cobol; hint ignored' }
    ])
    expect(parser.calls).toEqual([{ text: 'SELECT 1', dialect: 'mysql' }])
  })

  it('should fall back to dialect detection', () => {
    const parser = new FakeParser()
    const result = createEngine({ parser }).analyze('SELECT id FROM t WHERE id = $1')

    expect(result.dialect).toBe('postgres')
    expect(result.statements[0].dialect).toBe('postgres')
  })

  it('should report an unknown dialect when nothing matches', () => {
    const result = createEngine({ parser: new FakeParser() }).analyze('SELECT 1')

    expect(result.dialect).toBe('unknown')
  })

  it('should treat a throwing parser as a parse failure', () => {
    const parser = new FakeParser(() => {
      throw new Error('backend crashed')
    })
    const result = createEngine({ parser }).analyze('DELETE FROM users')

    expect(result.diagnostics).toEqual([
      { kind: 'parse-failed', statementIndex: 0, message: 'Could not parse statement 0: backend crashed' }
    ])
    expect(result.findings.map((finding) => finding.rule)).toEqual(['REL-DML-001'])
  })

  it('should fail parses that exceed the timeout', () => {
    const parser = new FakeParser((text) => {
      const until = Date.now() + 5
      while (Date.now() <= until) {
        // busy wait
      }
      return { ok: true, tables: [], columns: [], statementKind: 'SELECT', normalizedText: text, ast: {} }
    })
    const result = createEngine({ parser, parseTimeoutMs: 0 }).analyze('SELECT 1')

    expect(result.diagnostics[0].message).toBe('Could not parse statement 0: parse exceeded 0 ms')
  })

  it('should stop parsing once the signal is aborted', () => {
    const parser = new FakeParser()
    const controller = new AbortController()
    controller.abort()

    const result = createEngine({ parser }).analyze('SELECT * FROM a; SELECT * FROM b', { signal: controller.signal })

    expect(parser.calls).toEqual([])
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      'Could not parse statement 0: analysis cancelled',
      'Could not parse statement 1: analysis cancelled'
    ])
    expect(result.findings).toHaveLength(2)
  })

  it('should apply rule overrides and disabled rules', () => {
    const sql = 'SELECT * FROM users WHERE status = NULL'
    const engine = createEngine({
      ruleOverrides: { 'PERF-SCAN-001': { severity: 'low' } },
      disabledRules: ['REL-NULL-001']
    })

    expect(engine.analyze(sql).findings.map((finding) => [finding.rule, finding.severity])).toEqual([
      ['PERF-SCAN-001', 'low']
    ])
  })

  it('should use overridden thresholds', () => {
    const sql = 'SELECT id FROM users ORDER BY id LIMIT 10 OFFSET 2000'

    expect(ids(sql).map(([, rule]) => rule)).toContain('PERF-PAGE-001')
    expect(
      createEngine({ thresholds: { offsetMax: 5000 } })
        .analyze(sql)
        .findings.map((finding) => finding.rule)
    ).not.toContain('PERF-PAGE-001')
  })
})

describe('AnalysisEngine.parseSingle', () => {
  const engine = createEngine()

  it('should return the parsed statement', () => {
    const statement = engine.parseSingle('SELECT id FROM users')

    expect(statement.kind).toBe('SELECT')
    expect(statement.tables).toEqual(['users'])
    expect(statement.facts.available).toBe(true)
  })

  it('should reject empty input', () => {
    expect(() => engine.parseSingle('  -- nothing\n')).toThrow(ParseError)
  })

  it('should reject several statements', () => {
    expect(() => engine.parseSingle('SELECT 1; SELECT 2')).toThrow('Expected a single statement: found 2')
  })

  it('should reject a statement the parser cannot read', () => {
    expect(() => engine.parseSingle('SELEC FROM WHERE')).toThrow(ParseError)
  })
})

describe('AnalysisEngine.parse', () => {
  it('should return statements without findings', () => {
    const statements = createEngine().parse("SELECT 'a;b'; SELECT 1;")

    expect(statements.map((statement) => statement.raw)).toEqual(["SELECT 'a;b'", 'SELECT 1'])
  })
})

describe('toJSON', () => {
  it('should produce the serializable result schema', () => {
    const result = createEngine().analyze('DELETE FROM users', { file: 'jobs/cleanup.sql' })
    const json = toJSON(result)

    expect(JSON.parse(JSON.stringify(json))).toEqual(json)
    expect(json.file).toBe('jobs/cleanup.sql')
    expect(json.statements[0]).toMatchObject({
      index: 0,
      kind: 'DELETE',
      dialect: 'unknown',
      line: 1,
      column: 1,
      tables: ['users'],
      parsed: true
    })
    expect(json.findings[0]).toMatchObject({
      rule: 'REL-DML-001',
      severity: 'critical',
      category: 'missing WHERE',
      location: { statementIndex: 0, line: 1, column: 1, file: 'jobs/cleanup.sql' },
      query: 'DELETE FROM users'
    })
    expect(json.diagnostics).toEqual([])
  })
})
