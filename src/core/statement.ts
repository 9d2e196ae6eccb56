import type { Dialect, FindingLocation, Statement, StatementLocation } from '../types/index.js'
import { normalizeSql } from './normalize.js'
import { createAstFacts, inferStatementKind } from './parser/facts.js'
import type { ParseOutcome } from './parser/types.js'

export interface StatementInput {
  index: number
  raw: string
  dialect: Dialect | 'unknown'
  location: StatementLocation
  /** Parser result; omitted when the statement was never parsed */
  outcome?: ParseOutcome
}

/**
 * Assemble a frozen statement. Without a successful parse, tables and
 * columns are empty and the kind comes from the leading keyword.
 */
export function createStatement(input: StatementInput): Statement {
  const normalized = normalizeSql(input.raw)
  const outcome: ParseOutcome = input.outcome ?? { ok: false, reason: 'not parsed' }
  const facts = createAstFacts(outcome)

  return Object.freeze({
    index: input.index,
    raw: input.raw,
    normalized,
    dialect: input.dialect,
    location: Object.freeze({ ...input.location }),
    facts,
    tables: facts.tables(),
    columns: facts.columns(),
    kind: outcome.ok ? outcome.statementKind : inferStatementKind(normalized),
    ...(outcome.ok ? {} : { parseError: outcome.reason })
  })
}

export function findingLocation(location: StatementLocation): FindingLocation {
  return {
    statementIndex: location.statementIndex,
    line: location.line,
    column: location.column,
    ...(location.file !== undefined ? { file: location.file } : {})
  }
}
