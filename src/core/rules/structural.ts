import type { Finding, StatementKind } from '../../types/index.js'
import type { DetectorHit } from '../catalog/detectors.js'
import type { AstFacts } from '../parser/facts.js'
import { BaseRule, type RuleContext } from './base.js'

/**
 * Rule over parser facts. Produces nothing for statements the parser rejected.
 */
export abstract class StructuralRule extends BaseRule {
  check(context: RuleContext): Finding[] {
    const facts = context.statement.facts
    if (!facts.available) return []
    const hit = this.inspect(facts, context)
    return hit ? [this.report(context, hit)] : []
  }

  protected abstract inspect(facts: AstFacts, context: RuleContext): DetectorHit | null
}

const DDL_KINDS: ReadonlySet<StatementKind> = new Set(['CREATE', 'ALTER', 'DROP'])

export class GrantToPublicRule extends StructuralRule {
  constructor() {
    super({
      id: 'SEC-PRIV-002',
      name: 'Grant to PUBLIC',
      description: 'Privileges granted to every database user',
      fix: 'Grant to a specific role instead',
      impact: 'Any account can use the granted privileges',
      severity: 'high',
      dimension: 'security',
      category: 'privileges'
    })
  }

  protected inspect(facts: AstFacts, context: RuleContext): DetectorHit | null {
    if (facts.statementKind() !== 'GRANT') return null
    const match = /\bTO\s+PUBLIC\b/i.exec(context.input.stripped)
    return match ? { match: match[0] } : null
  }
}

export class DuplicateJoinTargetRule extends StructuralRule {
  constructor() {
    super({
      id: 'QUAL-JOIN-002',
      name: 'Duplicate JOIN Target',
      description: 'The same table is joined twice under the same reference',
      fix: 'Remove the repeated JOIN or give each occurrence its own alias',
      impact: 'Ambiguous references and multiplied rows',
      severity: 'medium',
      dimension: 'quality',
      category: 'joins'
    })
  }

  protected inspect(facts: AstFacts): DetectorHit | null {
    for (const clause of facts.fromClauses()) {
      const seen = new Set<string>()
      for (const reference of clause) {
        const key = `${reference.table}|${reference.alias ?? ''}`.toLowerCase()
        if (seen.has(key)) {
          return { match: reference.alias ? `${reference.table} ${reference.alias}` : reference.table }
        }
        seen.add(key)
      }
    }
    return null
  }
}

export class MultiTableDmlRule extends StructuralRule {
  constructor() {
    super({
      id: 'REL-DML-003',
      name: 'Multi-Table UPDATE/DELETE',
      description: 'UPDATE or DELETE touching more than one table',
      fix: 'Split into one statement per table inside a transaction',
      impact: 'Rows in joined tables can be changed unintentionally',
      severity: 'high',
      dimension: 'reliability',
      category: 'DML'
    })
  }

  protected inspect(facts: AstFacts): DetectorHit | null {
    const kind = facts.statementKind()
    if (kind !== 'UPDATE' && kind !== 'DELETE') return null
    const targets = facts.targets()
    if (targets.length <= 1) return null
    return { match: targets.map((target) => target.table).join(', '), observed: targets.length, threshold: 1 }
  }
}

export class UnqualifiedDdlTableRule extends StructuralRule {
  constructor() {
    super({
      id: 'QUAL-SCHEMA-001',
      name: 'Unqualified Table in DDL',
      description: 'DDL referencing several tables names one without a schema',
      fix: 'Qualify the table with its schema',
      impact: 'Depends on the session search path',
      severity: 'info',
      dimension: 'quality',
      category: 'schema design'
    })
  }

  protected inspect(facts: AstFacts): DetectorHit | null {
    if (!DDL_KINDS.has(facts.statementKind())) return null
    const tables = facts.tables()
    if (tables.length <= 1) return null
    const unqualified = tables.find((table) => !table.includes('.'))
    return unqualified ? { match: unqualified } : null
  }
}

/**
 * Structural rules in registration order
 */
export function structuralRules(): StructuralRule[] {
  return [
    new GrantToPublicRule(),
    new DuplicateJoinTargetRule(),
    new MultiTableDmlRule(),
    new UnqualifiedDdlTableRule()
  ]
}
