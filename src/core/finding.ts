import type { Dimension, Finding, FindingLocation, FindingMetadata, Severity } from '../types/index.js'
import type { RuleMetadata } from './catalog/metadata.js'
import type { DetectorHit } from './catalog/detectors.js'

export interface FindingInput {
  /** Original statement text */
  query: string
  location: FindingLocation
  hit?: DetectorHit
  annotations?: Record<string, string>
}

function isCriticalSecurity(severity: Severity, dimension: Dimension): boolean {
  return severity === 'critical' && dimension === 'security'
}

/**
 * Build a frozen finding from rule metadata and detector evidence
 */
export function createFinding(rule: RuleMetadata, input: FindingInput): Finding {
  const metadata: FindingMetadata = {}
  if (isCriticalSecurity(rule.severity, rule.dimension)) metadata.critical = true
  if (input.hit?.match !== undefined) metadata.match = input.hit.match
  if (input.hit?.observed !== undefined) metadata.observed = input.hit.observed
  if (input.hit?.threshold !== undefined) metadata.threshold = input.hit.threshold
  if (input.annotations) metadata.annotations = { ...input.annotations }

  return Object.freeze({
    rule: rule.id,
    title: rule.name,
    description: rule.description,
    fix: rule.fix,
    impact: rule.impact,
    severity: rule.severity,
    dimension: rule.dimension,
    ...(rule.category !== undefined ? { category: rule.category } : {}),
    location: { ...input.location },
    query: input.query,
    ...(Object.keys(metadata).length > 0 ? { metadata } : {})
  })
}

/**
 * Re-rate a finding, keeping the critical flag in step with the new severity
 */
export function withSeverity(finding: Finding, severity: Severity): Finding {
  const { metadata, ...rest } = finding
  const next: FindingMetadata = { ...metadata }
  delete next.critical
  if (isCriticalSecurity(severity, finding.dimension)) next.critical = true

  return Object.freeze({
    ...rest,
    severity,
    ...(Object.keys(next).length > 0 ? { metadata: next } : {})
  })
}
