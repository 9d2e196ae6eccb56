import type { AnalysisReport } from '../../../types/index.js'
import type { SerializedFinding, SerializedResult } from '../../engine/serialize.js'

export function createMockFinding(overrides: Partial<SerializedFinding> = {}): SerializedFinding {
  return {
    rule: 'SEC-CRED-001',
    title: 'Hardcoded Password',
    severity: 'critical',
    dimension: 'security',
    category: 'credentials',
    description: 'Password literal in query',
    fix: 'Use bind parameters',
    impact: 'Credential exposure',
    location: { statementIndex: 0, line: 3, column: 1, file: 'queries/login.sql' },
    query: "SELECT id FROM users WHERE password = 'test-secret'",
    metadata: { critical: true, match: "password = 'test-secret'" },
    ...overrides
  }
}

export function createMockResult(overrides: Partial<SerializedResult> = {}): SerializedResult {
  return {
    version: '1.0.0',
    fingerprint: 'abc123',
    dialect: 'postgres',
    file: 'queries/login.sql',
    duration: 5,
    statistics: {
      totalStatements: 1,
      parsedStatements: 1,
      totalFindings: 0,
      bySeverity: { info: 0, low: 0, medium: 0, high: 0, critical: 0 },
      byDimension: { security: 0, performance: 0, reliability: 0, compliance: 0, quality: 0, cost: 0 },
      byRule: {}
    },
    statements: [],
    findings: [],
    diagnostics: [],
    ...overrides
  }
}

export function createMockReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    version: '1.0.0',
    timestamp: '2026-02-02T12:00:00Z',
    sources: ['queries/login.sql'],
    decision: 'pass',
    score: 85,
    results: [createMockResult()],
    summary: { critical: 0, high: 0, medium: 0, low: 0, info: 0 },
    suppressed: 0,
    duration: 1000,
    configName: 'default',
    errors: [],
    ...overrides
  }
}
