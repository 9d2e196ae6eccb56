import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { writeFile } from 'fs/promises'
import { JsonReporter, createJsonReporter } from './json.js'
import { createMockFinding, createMockReport, createMockResult } from './__fixtures__/report.js'

vi.mock('fs/promises', () => ({
  writeFile: vi.fn()
}))

const mockWriteFile = vi.mocked(writeFile)

describe('JsonReporter', () => {
  let reporter: JsonReporter
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>

  beforeEach(() => {
    reporter = new JsonReporter()
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    mockWriteFile.mockClear()
  })

  afterEach(() => {
    stdoutWriteSpy.mockRestore()
  })

  describe('generate', () => {
    it('should generate valid JSON', () => {
      const json = reporter.generate(createMockReport())

      expect(() => JSON.parse(json)).not.toThrow()
    })

    it('should generate pretty JSON by default', () => {
      const json = reporter.generate(createMockReport())

      expect(json).toContain('\n  "version": "1.0.0"')
    })

    it('should generate compact JSON when pretty is false', () => {
      const json = reporter.generate(createMockReport(), { pretty: false })

      expect(json).not.toContain('\n')
    })

    it('should mask literals of critical findings by default', () => {
      const report = createMockReport({ results: [createMockResult({ findings: [createMockFinding()] })] })
      const parsed = JSON.parse(reporter.generate(report))

      expect(parsed.results[0].findings[0].query).toBe("SELECT id FROM users WHERE password = '********[MASKED]'")
      expect(parsed.results[0].findings[0].metadata).toEqual({
        critical: true,
        match: "password = '********[MASKED]'"
      })
    })

    it('should preserve literals when maskSecrets is false', () => {
      const report = createMockReport({ results: [createMockResult({ findings: [createMockFinding()] })] })
      const parsed = JSON.parse(reporter.generate(report, { maskSecrets: false }))

      expect(parsed.results[0].findings[0].query).toBe("SELECT id FROM users WHERE password = 'test-secret'")
    })

    it('should leave non-critical findings untouched', () => {
      const finding = createMockFinding({
        rule: 'REL-NULL-001',
        severity: 'critical',
        dimension: 'reliability',
        query: "SELECT * FROM users WHERE name = 'bob' AND status = NULL",
        metadata: {}
      })
      const report = createMockReport({ results: [createMockResult({ findings: [finding] })] })
      const parsed = JSON.parse(reporter.generate(report))

      expect(parsed.results[0].findings[0].query).toBe("SELECT * FROM users WHERE name = 'bob' AND status = NULL")
    })

    it('should mask other findings of the same statement only', () => {
      const findings = [
        createMockFinding(),
        createMockFinding({ rule: 'PERF-SCAN-002', severity: 'low', dimension: 'performance', metadata: {} }),
        createMockFinding({
          rule: 'PERF-SCAN-002',
          severity: 'low',
          dimension: 'performance',
          location: { statementIndex: 1, line: 4, column: 1, file: 'queries/login.sql' },
          query: "SELECT id FROM users WHERE name = 'bob'",
          metadata: {}
        })
      ]
      const report = createMockReport({ results: [createMockResult({ findings })] })
      const parsed = JSON.parse(reporter.generate(report))

      expect(parsed.results[0].findings[1].query).toBe("SELECT id FROM users WHERE password = '********[MASKED]'")
      expect(parsed.results[0].findings[2].query).toBe("SELECT id FROM users WHERE name = 'bob'")
    })

    it('should include all report fields', () => {
      const report = createMockReport({ decision: 'fail', score: 25, suppressed: 2 })
      const parsed = JSON.parse(reporter.generate(report))

      expect(parsed.version).toBe('1.0.0')
      expect(parsed.decision).toBe('fail')
      expect(parsed.score).toBe(25)
      expect(parsed.suppressed).toBe(2)
      expect(parsed.sources).toEqual(['queries/login.sql'])
    })
  })

  describe('write', () => {
    it('should write to file when output is specified', async () => {
      await reporter.write(createMockReport(), { output: '/tmp/report.json' })

      expect(mockWriteFile).toHaveBeenCalledWith('/tmp/report.json', expect.any(String), 'utf-8')
    })

    it('should write to stdout when no output specified', async () => {
      await reporter.write(createMockReport())

      expect(stdoutWriteSpy).toHaveBeenCalled()
      const output = String(stdoutWriteSpy.mock.calls[0][0])
      expect(() => JSON.parse(output.trim())).not.toThrow()
    })

    it('should not write to stdout when quiet is true', async () => {
      await reporter.write(createMockReport(), { quiet: true })

      expect(stdoutWriteSpy).not.toHaveBeenCalled()
    })

    it('should write to file even when quiet is true', async () => {
      await reporter.write(createMockReport(), { output: '/tmp/report.json', quiet: true })

      expect(mockWriteFile).toHaveBeenCalled()
    })
  })

  describe('createJsonReporter', () => {
    it('should create a JsonReporter instance', () => {
      expect(createJsonReporter()).toBeInstanceOf(JsonReporter)
    })
  })
})
