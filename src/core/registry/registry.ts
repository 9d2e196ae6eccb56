import type { Dimension, Severity } from '../../types/index.js'
import { DuplicateRuleError } from '../errors.js'
import type { Rule } from '../rules/base.js'
import type { RuleMetadata } from '../catalog/metadata.js'

export interface RegisterOptions {
  /** Overwrite an existing rule with the same id */
  replace?: boolean
}

export interface SearchOptions {
  dimensions?: readonly Dimension[]
  severities?: readonly Severity[]
  enabledOnly?: boolean
}

/**
 * Catalog-wide rule counts. Buckets with no rules are omitted.
 */
export interface RegistryStats {
  total: number
  enabled: number
  disabled: number
  byDimension: Partial<Record<Dimension, number>>
  byCategory: Record<string, number>
  bySeverity: Partial<Record<Severity, number>>
}

/**
 * Metadata row for listing rules
 */
export interface RuleListing extends RuleMetadata {
  enabled: boolean
}

function addTo<K>(index: Map<K, Set<string>>, key: K, id: string): void {
  const bucket = index.get(key)
  if (bucket) {
    bucket.add(id)
  } else {
    index.set(key, new Set([id]))
  }
}

function removeFrom<K>(index: Map<K, Set<string>>, key: K, id: string): void {
  const bucket = index.get(key)
  if (!bucket) return
  bucket.delete(id)
  if (bucket.size === 0) index.delete(key)
}

/**
 * Rules keyed by id with secondary indices by dimension, category and severity.
 * Map iteration order is registration order, which is the order analysis uses.
 */
export class RuleRegistry {
  private readonly rules = new Map<string, Rule>()
  private readonly byDimension = new Map<Dimension, Set<string>>()
  private readonly byCategory = new Map<string, Set<string>>()
  private readonly bySeverity = new Map<Severity, Set<string>>()

  /**
   * Add a rule. Throws DuplicateRuleError when the id is taken and `replace` is not set.
   */
  register(rule: Rule, options: RegisterOptions = {}): void {
    if (!rule.id) {
      throw new Error('Rule id must not be empty')
    }
    if (this.rules.has(rule.id)) {
      if (!options.replace) {
        throw new DuplicateRuleError(rule.id)
      }
      this.unindex(rule.id)
    }
    this.rules.set(rule.id, rule)
    this.index(rule)
  }

  unregister(id: string): Rule | undefined {
    const rule = this.rules.get(id)
    if (!rule) return undefined
    this.unindex(id)
    this.rules.delete(id)
    return rule
  }

  get(id: string): Rule | undefined {
    return this.rules.get(id)
  }

  has(id: string): boolean {
    return this.rules.has(id)
  }

  get size(): number {
    return this.rules.size
  }

  /** All rules sorted by id */
  getAll(): Rule[] {
    return this.resolve(this.rules.keys())
  }

  getEnabled(): Rule[] {
    return this.getAll().filter((rule) => rule.enabled)
  }

  getByDimension(dimension: Dimension): Rule[] {
    return this.resolve(this.byDimension.get(dimension) ?? [])
  }

  getByCategory(category: string): Rule[] {
    return this.resolve(this.byCategory.get(category) ?? [])
  }

  getBySeverity(severity: Severity): Rule[] {
    return this.resolve(this.bySeverity.get(severity) ?? [])
  }

  getByPrefix(prefix: string): Rule[] {
    const wanted = prefix.toUpperCase()
    return this.resolve([...this.rules.keys()].filter((id) => id.toUpperCase().startsWith(wanted)))
  }

  /**
   * Case-insensitive substring search over id, name and description
   */
  search(query: string, options: SearchOptions = {}): Rule[] {
    const needle = query.toLowerCase()
    return this.getAll().filter((rule) => {
      if (options.dimensions && !options.dimensions.includes(rule.dimension)) return false
      if (options.severities && !options.severities.includes(rule.severity)) return false
      if (options.enabledOnly && !rule.enabled) return false
      return `${rule.id} ${rule.name} ${rule.description}`.toLowerCase().includes(needle)
    })
  }

  stats(): RegistryStats {
    const stats: RegistryStats = {
      total: this.rules.size,
      enabled: 0,
      disabled: 0,
      byDimension: {},
      byCategory: {},
      bySeverity: {}
    }
    for (const rule of this.rules.values()) {
      if (rule.enabled) stats.enabled++
      else stats.disabled++
    }
    for (const [dimension, ids] of this.byDimension) stats.byDimension[dimension] = ids.size
    for (const [category, ids] of this.byCategory) stats.byCategory[category] = ids.size
    for (const [severity, ids] of this.bySeverity) stats.bySeverity[severity] = ids.size
    return stats
  }

  /** Rules in registration order */
  inCatalogOrder(): Rule[] {
    return [...this.rules.values()]
  }

  /**
   * Registration position of a rule, or -1 when absent
   */
  position(id: string): number {
    let i = 0
    for (const key of this.rules.keys()) {
      if (key === id) return i
      i++
    }
    return -1
  }

  /**
   * Metadata of every rule sorted by id
   */
  listAll(): RuleListing[] {
    return this.getAll().map((rule) => ({ ...rule.metadata, enabled: rule.enabled }))
  }

  /**
   * Secondary index contents, for consistency checks
   */
  indexSnapshot(): {
    dimension: Map<Dimension, ReadonlySet<string>>
    category: Map<string, ReadonlySet<string>>
    severity: Map<Severity, ReadonlySet<string>>
  } {
    return {
      dimension: new Map(this.byDimension),
      category: new Map(this.byCategory),
      severity: new Map(this.bySeverity)
    }
  }

  clear(): void {
    this.rules.clear()
    this.byDimension.clear()
    this.byCategory.clear()
    this.bySeverity.clear()
  }

  private index(rule: Rule): void {
    addTo(this.byDimension, rule.dimension, rule.id)
    addTo(this.bySeverity, rule.severity, rule.id)
    if (rule.category) addTo(this.byCategory, rule.category, rule.id)
  }

  private unindex(id: string): void {
    const rule = this.rules.get(id)
    if (!rule) return
    removeFrom(this.byDimension, rule.dimension, id)
    removeFrom(this.bySeverity, rule.severity, id)
    if (rule.category) removeFrom(this.byCategory, rule.category, id)
  }

  private resolve(ids: Iterable<string>): Rule[] {
    return [...ids]
      .sort()
      .flatMap((id) => {
        const rule = this.rules.get(id)
        return rule ? [rule] : []
      })
  }
}
