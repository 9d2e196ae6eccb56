import type { StatementKind } from '../../types/index.js'
import type { ParseOutcome } from './types.js'

/**
 * A syntax tree node carrying a string `type`
 */
export interface AstNode {
  type: string
  [key: string]: unknown
}

/**
 * A table named in a FROM list or as a DML target
 */
export interface TableReference {
  /** `schema.table` when qualified */
  table: string
  alias?: string
}

/**
 * Structural facts about one statement, as far as the parser understood it
 */
export interface AstFacts {
  /** False when the parser rejected the statement */
  readonly available: boolean
  tables(): readonly string[]
  columns(): readonly string[]
  statementKind(): StatementKind
  /** Every node whose `type` matches, depth-first, case-insensitive */
  findAll(nodeType: string): readonly AstNode[]
  /** Each FROM list in the tree, outermost first */
  fromClauses(): readonly (readonly TableReference[])[]
  /** Distinct tables written or read by the root statement itself */
  targets(): readonly TableReference[]
}

export const EMPTY_FACTS: AstFacts = Object.freeze({
  available: false,
  tables: () => [],
  columns: () => [],
  statementKind: (): StatementKind => 'UNKNOWN',
  findAll: () => [],
  fromClauses: () => [],
  targets: () => []
})

const KIND_BY_NODE_TYPE: Record<string, StatementKind> = {
  select: 'SELECT',
  insert: 'INSERT',
  replace: 'INSERT',
  update: 'UPDATE',
  delete: 'DELETE',
  merge: 'MERGE',
  create: 'CREATE',
  alter: 'ALTER',
  drop: 'DROP',
  truncate: 'TRUNCATE',
  grant: 'GRANT',
  revoke: 'REVOKE'
}

export function kindFromNodeType(type: string | undefined): StatementKind {
  if (!type) return 'UNKNOWN'
  return KIND_BY_NODE_TYPE[type.toLowerCase()] ?? 'OTHER'
}

const LEADING_KEYWORDS: Record<string, StatementKind> = {
  ...Object.fromEntries(
    Object.entries(KIND_BY_NODE_TYPE).map(([key, kind]) => [key.toUpperCase(), kind])
  ),
  WITH: 'WITH'
}

/**
 * Classify a normalized statement by its first keyword
 */
export function inferStatementKind(normalized: string): StatementKind {
  const keyword = /^\(*\s*([A-Za-z]+)/.exec(normalized)?.[1]
  if (!keyword) return 'UNKNOWN'
  return LEADING_KEYWORDS[keyword.toUpperCase()] ?? 'OTHER'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isAstNode(value: unknown): value is AstNode {
  return isRecord(value) && typeof value.type === 'string'
}

function toReference(value: unknown): TableReference | undefined {
  if (!isRecord(value) || typeof value.table !== 'string') return undefined
  const schema = typeof value.db === 'string' && value.db ? value.db : undefined
  const alias = typeof value.as === 'string' && value.as ? value.as : undefined
  const table = schema ? `${schema}.${value.table}` : value.table
  return alias ? { table, alias } : { table }
}

function references(list: unknown): TableReference[] {
  if (!Array.isArray(list)) return []
  return list.flatMap((item) => {
    const reference = toReference(item)
    return reference ? [reference] : []
  })
}

/**
 * Walk objects and arrays depth-first, visiting each object once
 */
function walk(root: unknown, visit: (value: Record<string, unknown>) => void): void {
  const seen = new Set<object>()
  const stack: unknown[] = [root]
  while (stack.length > 0) {
    const value = stack.pop()
    if (typeof value !== 'object' || value === null || seen.has(value)) continue
    seen.add(value)
    const children: unknown[] = Array.isArray(value) ? value : Object.values(value)
    if (isRecord(value)) visit(value)
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }
}

/**
 * Build facts from a parser outcome; a failure yields EMPTY_FACTS
 */
export function createAstFacts(outcome: ParseOutcome): AstFacts {
  if (!outcome.ok) return EMPTY_FACTS

  const tables = Object.freeze([...outcome.tables])
  const columns = Object.freeze([...outcome.columns])
  const kind = outcome.statementKind
  const ast = outcome.ast

  return {
    available: true,
    tables: () => tables,
    columns: () => columns,
    statementKind: () => kind,
    findAll(nodeType: string): AstNode[] {
      const wanted = nodeType.toLowerCase()
      const found: AstNode[] = []
      walk(ast, (node) => {
        if (isAstNode(node) && node.type.toLowerCase() === wanted) found.push(node)
      })
      return found
    },
    fromClauses(): TableReference[][] {
      const clauses: TableReference[][] = []
      walk(ast, (node) => {
        const refs = references(node.from)
        if (refs.length > 0) clauses.push(refs)
      })
      return clauses
    },
    targets(): TableReference[] {
      if (!isRecord(ast)) return []
      const seen = new Set<string>()
      return [...references(ast.table), ...references(ast.from)].filter((ref) => {
        if (seen.has(ref.table)) return false
        seen.add(ref.table)
        return true
      })
    }
  }
}
