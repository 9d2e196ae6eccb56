import { describe, it, expect, vi } from 'vitest'
import { PatternCatalog, builtinCatalog, DETECTORS, builtinRuleMetadata, resolveThresholds } from './index.js'
import type { FindingLocation } from '../../types/index.js'

const location: FindingLocation = { statementIndex: 0, line: 1, column: 1 }

function ruleIds(sql: string, thresholds = resolveThresholds()): string[] {
  return builtinCatalog().runAll(sql, sql, location, thresholds).map((finding) => finding.rule)
}

function numbers(count: number): string {
  return Array.from({ length: count }, (_, i) => String(i + 1)).join(', ')
}

describe('builtin catalog', () => {
  it('should pair every metadata entry with exactly one detector', () => {
    const metadataIds = builtinRuleMetadata().map((meta) => meta.id)

    expect([...metadataIds].sort()).toEqual(Object.keys(DETECTORS).sort())
    expect(new Set(metadataIds).size).toBe(metadataIds.length)
    expect(builtinCatalog().size).toBe(134)
  })

  it('should keep the declared order', () => {
    const ids = builtinCatalog().entries.map((entry) => entry.metadata.id)

    expect(ids[0]).toBe('PERF-SCAN-001')
    expect(ids).toEqual(builtinRuleMetadata().map((meta) => meta.id))
  })
})

describe('PatternCatalog.runAll', () => {
  it('should report SELECT * as a single medium finding', () => {
    const findings = builtinCatalog().runAll('SELECT * FROM users', 'SELECT * FROM users', location)

    expect(findings).toHaveLength(1)
    expect(findings[0].rule).toBe('PERF-SCAN-001')
    expect(findings[0].title).toBe('SELECT * Usage')
    expect(findings[0].severity).toBe('medium')
    expect(findings[0].dimension).toBe('performance')
  })

  it('should report DELETE without WHERE as a single critical finding', () => {
    const findings = builtinCatalog().runAll('DELETE FROM users', 'DELETE FROM users', location)

    expect(findings).toHaveLength(1)
    expect(findings[0].severity).toBe('critical')
    expect(findings[0].category).toBe('missing WHERE')
  })

  it('should report NULL equality and SELECT * independently', () => {
    const sql = 'SELECT * FROM users WHERE status = NULL'
    const findings = builtinCatalog().runAll(sql, sql, location)

    expect(findings.map((finding) => [finding.rule, finding.severity])).toEqual([
      ['PERF-SCAN-001', 'medium'],
      ['REL-NULL-001', 'critical']
    ])
  })

  it('should attach the original text and location', () => {
    const raw = 'SELECT *\n  FROM users -- all'
    const findings = builtinCatalog().runAll(raw, raw, { statementIndex: 2, line: 4, column: 3 })

    expect(findings).toHaveLength(1)
    expect(findings[0].query).toBe(raw)
    expect(findings[0].location).toEqual({ statementIndex: 2, line: 4, column: 3 })
    expect(findings[0].metadata).toEqual({ match: 'SELECT *' })
  })

  it('should be deterministic', () => {
    const sql = "select * FROM Users WHERE id IN (SELECT user_id FROM bans) OR name = 'x' ORDER BY 1"

    expect(ruleIds(sql)).toEqual(ruleIds(sql))
    expect(ruleIds(sql).length).toBeGreaterThan(3)
  })

  it('should skip a throwing detector and keep running the rest', () => {
    const [first, second] = builtinRuleMetadata()
    const catalog = new PatternCatalog([
      {
        metadata: first,
        detect: () => {
          throw new Error('boom')
        }
      },
      { metadata: second, detect: () => ({ match: 'x' }) }
    ])
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const findings = catalog.runAll('SELECT 1', 'SELECT 1', location)

    expect(findings.map((finding) => finding.rule)).toEqual([second.id])
    expect(warn).toHaveBeenCalledTimes(1)
    warn.mockRestore()
  })
})

describe('threshold detectors', () => {
  it('should trigger large OFFSET only above 1000', () => {
    expect(ruleIds('SELECT id FROM users ORDER BY id LIMIT 10 OFFSET 1000')).not.toContain('PERF-PAGE-001')
    expect(ruleIds('SELECT id FROM users ORDER BY id LIMIT 10 OFFSET 1001')).toContain('PERF-PAGE-001')
  })

  it('should read the offset from LIMIT offset, count', () => {
    const sql = 'SELECT id FROM users ORDER BY id LIMIT 1001, 10'
    const finding = builtinCatalog()
      .runAll(sql, sql, location)
      .find((item) => item.rule === 'PERF-PAGE-001')

    expect(finding?.metadata?.observed).toBe(1001)
    expect(finding?.metadata?.threshold).toBe(1000)
  })

  it('should take the largest offset in the statement', () => {
    const sql =
      'SELECT id FROM (SELECT id FROM users ORDER BY id LIMIT 10 OFFSET 5) AS page ORDER BY id LIMIT 10 OFFSET 5000'
    const finding = builtinCatalog()
      .runAll(sql, sql, location)
      .find((item) => item.rule === 'PERF-PAGE-001')

    expect(finding?.metadata?.observed).toBe(5000)
    expect(finding?.metadata?.match).toBe('OFFSET 5000')
  })

  it('should honor overridden thresholds', () => {
    const sql = 'SELECT id FROM users ORDER BY id LIMIT 10 OFFSET 1001'

    expect(ruleIds(sql, resolveThresholds({ offsetMax: 5000 }))).not.toContain('PERF-PAGE-001')
  })

  it('should trigger a massive IN list only above 50 values', () => {
    const atLimit = `SELECT name FROM users WHERE id IN (${numbers(50)})`
    const above = `SELECT name FROM users WHERE id IN (${numbers(51)})`

    expect(ruleIds(atLimit)).not.toContain('PERF-LIST-001')
    const finding = builtinCatalog()
      .runAll(above, above, location)
      .find((item) => item.rule === 'PERF-LIST-001')
    expect(finding?.metadata?.observed).toBe(51)
    expect(finding?.metadata?.threshold).toBe(50)
  })

  it('should not count commas inside string literals', () => {
    const values = Array.from({ length: 50 }, () => "'a,b'").join(', ')

    expect(ruleIds(`SELECT name FROM users WHERE code IN (${values})`)).not.toContain('PERF-LIST-001')
  })

  it('should trigger nested subqueries above two levels', () => {
    const two = 'SELECT a FROM t WHERE a IN (SELECT a FROM u WHERE a IN (SELECT a FROM v))'
    const three = 'SELECT a FROM t WHERE a IN (SELECT a FROM u WHERE a IN (SELECT a FROM v WHERE a IN (SELECT a FROM w)))'

    expect(ruleIds(two)).not.toContain('PERF-SUB-006')
    expect(ruleIds(three)).toContain('PERF-SUB-006')
  })

  it('should trigger oversized VARCHAR above 999 or MAX', () => {
    expect(ruleIds('CREATE TABLE t (a VARCHAR(999))')).not.toContain('PERF-TYPE-001')
    expect(ruleIds('CREATE TABLE t (a VARCHAR(1000))')).toContain('PERF-TYPE-001')
    expect(ruleIds('CREATE TABLE t (a NVARCHAR(MAX))')).toContain('PERF-TYPE-001')
  })

  it('should trigger a large ENUM above 99 characters', () => {
    const body = (length: number) => `'${'a'.repeat(length - 2)}'`

    expect(ruleIds(`CREATE TABLE t (a ENUM(${body(99)}))`)).not.toContain('PERF-TYPE-003')
    expect(ruleIds(`CREATE TABLE t (a ENUM(${body(100)}))`)).toContain('PERF-TYPE-003')
  })

  it('should trigger a wide GROUP BY above three columns', () => {
    expect(ruleIds('SELECT a, b, c, COUNT(*) FROM t GROUP BY a, b, c')).not.toContain('PERF-AGG-003')
    expect(ruleIds('SELECT a, b, c, d, COUNT(*) FROM t GROUP BY a, b, c, d')).toContain('PERF-AGG-003')
  })

  it('should flag more than two JOINs only without comments', () => {
    const joins = 'SELECT a.id FROM a JOIN b ON a.id = b.id JOIN c ON b.id = c.id JOIN d ON c.id = d.id'

    expect(ruleIds(joins)).toContain('QUAL-DOC-002')
    expect(ruleIds(`-- order chain\n${joins}`)).not.toContain('QUAL-DOC-002')
    expect(ruleIds('SELECT a.id FROM a JOIN b ON a.id = b.id JOIN c ON b.id = c.id')).not.toContain('QUAL-DOC-002')
  })
})

describe('pattern detectors', () => {
  it('should only treat NULL equality in predicates as a comparison', () => {
    expect(ruleIds('UPDATE users SET deleted_at = NULL WHERE id = 1')).not.toContain('REL-NULL-001')
    expect(ruleIds('SELECT id FROM users WHERE deleted_at <> NULL')).toContain('REL-NULL-001')
  })

  it('should match keywords case-sensitively outside literals', () => {
    expect(ruleIds('select id from users')).toContain('QUAL-STYLE-001')
    expect(ruleIds("SELECT id FROM users WHERE note = 'select me'")).not.toContain('QUAL-STYLE-001')
    expect(ruleIds('SELECT id FROM userAccounts')).toContain('QUAL-STYLE-002')
  })

  it('should find the innermost CASE without ELSE', () => {
    expect(ruleIds("SELECT CASE WHEN a = 1 THEN 'x' END FROM t")).toContain('REL-LOGIC-005')
    expect(ruleIds("SELECT CASE WHEN a = 1 THEN 'x' ELSE 'y' END FROM t")).not.toContain('REL-LOGIC-005')
    expect(
      ruleIds("SELECT CASE WHEN a = 1 THEN CASE WHEN b = 2 THEN 'y' END ELSE 'z' END FROM t")
    ).toContain('REL-LOGIC-005')
  })

  it('should detect unused CTEs', () => {
    expect(ruleIds('WITH recent AS (SELECT id FROM orders) SELECT id FROM users')).toContain('QUAL-CTE-001')
    expect(ruleIds('WITH recent AS (SELECT id FROM orders) SELECT id FROM recent')).not.toContain('QUAL-CTE-001')
  })

  it('should detect duplicate select columns', () => {
    const sql = 'SELECT id, name, id FROM users'
    const finding = builtinCatalog()
      .runAll(sql, sql, location)
      .find((item) => item.rule === 'QUAL-REDUND-004')

    expect(finding?.metadata?.match).toBe('id')
  })

  it('should flag critical security findings', () => {
    const sql = "UPDATE users SET password = 'test-secret' WHERE id = 1"
    const finding = builtinCatalog()
      .runAll(sql, sql, location)
      .find((item) => item.rule === 'SEC-CRED-001')

    expect(finding?.metadata?.critical).toBe(true)
    expect(finding?.metadata?.match).toBe("password = 'test-secret'")
  })

  it('should detect tautologies and valid IPv4 literals', () => {
    expect(ruleIds("SELECT id FROM users WHERE name = '' OR 1=1")).toContain('SEC-INJ-003')
    expect(ruleIds("SELECT id FROM hosts WHERE addr = '10.0.0.1'")).toContain('SEC-EXP-001')
    expect(ruleIds("SELECT id FROM hosts WHERE addr = '999.1.1.1'")).not.toContain('SEC-EXP-001')
  })

  it('should read style issues from the raw text', () => {
    expect(ruleIds('SELECT id\tFROM users')).toContain('QUAL-STYLE-003')
    expect(ruleIds('SELECT id  \nFROM users')).toContain('QUAL-STYLE-004')
    expect(ruleIds("SELECT id FROM users WHERE name = 'a  b'")).not.toContain('QUAL-STYLE-005')
    expect(ruleIds('SELECT id -- TODO drop this\nFROM users')).toContain('QUAL-DOC-001')
  })
})
