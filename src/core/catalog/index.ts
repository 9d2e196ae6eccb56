import type { Finding, FindingLocation } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { normalizeSql } from '../normalize.js'
import { createFinding } from '../finding.js'
import { DETECTORS, createDetectorInput, type Detector, type DetectorInput } from './detectors.js'
import { builtinRuleMetadata, type RuleMetadata } from './metadata.js'
import { DEFAULT_THRESHOLDS, type Thresholds } from './thresholds.js'

const logger = createLogger('catalog')

export interface CatalogEntry {
  readonly metadata: RuleMetadata
  readonly detect: Detector
}

/**
 * Run one detector, logging and swallowing anything it throws
 */
export function runDetector(entry: CatalogEntry, input: DetectorInput): ReturnType<Detector> {
  try {
    return entry.detect(input)
  } catch (error) {
    logger.warn(`Detector ${entry.metadata.id} failed: ${error instanceof Error ? error.message : String(error)}`)
    return null
  }
}

/**
 * Table of text detectors joined with their metadata, in declared order
 */
export class PatternCatalog {
  readonly entries: readonly CatalogEntry[]

  constructor(entries: readonly CatalogEntry[]) {
    this.entries = Object.freeze([...entries])
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * Run every detector over one statement. The original text is attached to each finding.
   */
  runAll(
    normalized: string,
    original: string,
    location: FindingLocation,
    thresholds: Thresholds = DEFAULT_THRESHOLDS
  ): Finding[] {
    const input = createDetectorInput(normalizeSql(normalized), original, thresholds)
    const findings: Finding[] = []
    for (const entry of this.entries) {
      const hit = runDetector(entry, input)
      if (hit) {
        findings.push(createFinding(entry.metadata, { query: original, location, hit }))
      }
    }
    return findings
  }
}

let builtin: PatternCatalog | undefined

/**
 * The built-in catalog. Every metadata entry must have a detector and vice versa.
 */
export function builtinCatalog(): PatternCatalog {
  if (!builtin) {
    const metadata = builtinRuleMetadata()
    const entries = metadata.map((meta) => {
      const detect = DETECTORS[meta.id]
      if (!detect) throw new Error(`No detector for catalog rule ${meta.id}`)
      return { metadata: meta, detect }
    })
    const known = new Set(metadata.map((meta) => meta.id))
    const orphans = Object.keys(DETECTORS).filter((id) => !known.has(id))
    if (orphans.length > 0) throw new Error(`Detectors without metadata: ${orphans.join(', ')}`)
    builtin = new PatternCatalog(entries)
  }
  return builtin
}

export { DETECTORS, createDetectorInput, type Detector, type DetectorHit, type DetectorInput } from './detectors.js'
export { builtinRuleMetadata, RuleMetadataSchema, RuleCatalogSchema, type RuleMetadata } from './metadata.js'
export { DEFAULT_THRESHOLDS, ThresholdsSchema, resolveThresholds, type Thresholds } from './thresholds.js'
