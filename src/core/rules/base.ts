import type { Dimension, Finding, Severity, Statement } from '../../types/index.js'
import type { RuleMetadata } from '../catalog/metadata.js'
import type { DetectorHit, DetectorInput } from '../catalog/detectors.js'
import { createDetectorInput } from '../catalog/detectors.js'
import { DEFAULT_THRESHOLDS, type Thresholds } from '../catalog/thresholds.js'
import { createFinding } from '../finding.js'
import { findingLocation } from '../statement.js'

/**
 * Everything a rule sees for one statement
 */
export interface RuleContext {
  statement: Statement
  thresholds: Thresholds
  /** Text views shared by all pattern rules of the statement */
  input: DetectorInput
}

export function createRuleContext(statement: Statement, thresholds: Thresholds = DEFAULT_THRESHOLDS): RuleContext {
  return {
    statement,
    thresholds,
    input: createDetectorInput(statement.normalized, statement.raw, thresholds)
  }
}

/**
 * A registered check. Rules hold no reference to the registry.
 */
export interface Rule {
  readonly id: string
  readonly name: string
  readonly description: string
  readonly severity: Severity
  readonly dimension: Dimension
  readonly category?: string
  readonly metadata: RuleMetadata
  enabled: boolean
  check(context: RuleContext): Finding[]
}

/**
 * Abstract base class for rules backed by static metadata
 */
export abstract class BaseRule implements Rule {
  enabled = true

  constructor(readonly metadata: RuleMetadata) {}

  get id(): string {
    return this.metadata.id
  }

  get name(): string {
    return this.metadata.name
  }

  get description(): string {
    return this.metadata.description
  }

  get severity(): Severity {
    return this.metadata.severity
  }

  get dimension(): Dimension {
    return this.metadata.dimension
  }

  get category(): string | undefined {
    return this.metadata.category
  }

  abstract check(context: RuleContext): Finding[]

  /**
   * Build this rule's finding for the statement in context
   */
  protected report(context: RuleContext, hit?: DetectorHit): Finding {
    return createFinding(this.metadata, {
      query: context.statement.raw,
      location: findingLocation(context.statement.location),
      hit
    })
  }
}
