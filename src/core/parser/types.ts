import type { Dialect, StatementKind } from '../../types/index.js'

/**
 * What a parser backend learned about one statement
 */
export interface ParsedStatement {
  ok: true
  /** Referenced tables, `schema.table` when qualified */
  tables: string[]
  /** Referenced columns, `table.column` when qualified */
  columns: string[]
  statementKind: StatementKind
  /** Backend's canonical rendering of the statement */
  normalizedText: string
  /** Backend-specific syntax tree */
  ast: unknown
}

export interface ParseFailure {
  ok: false
  reason: string
}

export type ParseOutcome = ParsedStatement | ParseFailure

/**
 * Contract for the SQL parsing collaborator.
 * Implementations must not throw; a rejected statement is a ParseFailure.
 */
export interface SqlParser {
  readonly name: string
  parse(text: string, dialect?: Dialect): ParseOutcome
}
