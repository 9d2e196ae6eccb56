import type { Finding } from '../../types/index.js'
import { runDetector, type CatalogEntry, type PatternCatalog } from '../catalog/index.js'
import { BaseRule, type RuleContext } from './base.js'

/**
 * Rule wrapping one text detector of the pattern catalog
 */
export class PatternRule extends BaseRule {
  constructor(private readonly entry: CatalogEntry) {
    super(entry.metadata)
  }

  check(context: RuleContext): Finding[] {
    const hit = runDetector(this.entry, context.input)
    return hit ? [this.report(context, hit)] : []
  }
}

export function patternRules(catalog: PatternCatalog): PatternRule[] {
  return catalog.entries.map((entry) => new PatternRule(entry))
}
