import { z } from 'zod'
import type { Dimension, Finding, FindingSummary, DimensionSummary, Severity } from '../types/index.js'

/**
 * Severities in ascending order
 */
export const SEVERITIES = ['info', 'low', 'medium', 'high', 'critical'] as const satisfies readonly Severity[]

export const DIMENSIONS = [
  'security',
  'performance',
  'reliability',
  'compliance',
  'quality',
  'cost'
] as const satisfies readonly Dimension[]

export const SeveritySchema = z.enum(SEVERITIES)
export const DimensionSchema = z.enum(DIMENSIONS)

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4
}

/**
 * Compare two severities; negative when `a` is less severe than `b`
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b]
}

/**
 * Check whether `severity` is at least as severe as `minimum`
 */
export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum]
}

export function isSeverity(value: string): value is Severity {
  return SeveritySchema.safeParse(value).success
}

export function isDimension(value: string): value is Dimension {
  return DimensionSchema.safeParse(value).success
}

export function emptySeveritySummary(): FindingSummary {
  return { info: 0, low: 0, medium: 0, high: 0, critical: 0 }
}

export function emptyDimensionSummary(): DimensionSummary {
  return {
    security: 0,
    performance: 0,
    reliability: 0,
    compliance: 0,
    quality: 0,
    cost: 0
  }
}

/**
 * Count findings per severity
 */
export function summarizeBySeverity(findings: readonly Finding[]): FindingSummary {
  const summary = emptySeveritySummary()
  for (const finding of findings) {
    summary[finding.severity]++
  }
  return summary
}
