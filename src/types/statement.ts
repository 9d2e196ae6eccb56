import type { AstFacts } from '../core/parser/facts.js'

/**
 * Canonical names of the supported SQL dialects
 */
export type Dialect =
  | 'postgres'
  | 'mysql'
  | 'mariadb'
  | 'sqlite'
  | 'tsql'
  | 'oracle'
  | 'bigquery'
  | 'snowflake'
  | 'redshift'
  | 'clickhouse'
  | 'duckdb'
  | 'presto'
  | 'trino'
  | 'spark'
  | 'databricks'
  | 'hive'
  | 'db2'

export type StatementKind =
  | 'SELECT'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'MERGE'
  | 'CREATE'
  | 'ALTER'
  | 'DROP'
  | 'TRUNCATE'
  | 'GRANT'
  | 'REVOKE'
  | 'WITH'
  | 'OTHER'
  | 'UNKNOWN'

export interface StatementLocation {
  statementIndex: number
  line: number
  column: number
  /** 0-based character offset of the statement in the source text */
  offset: number
  file?: string
}

/**
 * One segmented and (best-effort) parsed statement
 */
export interface Statement {
  readonly index: number
  readonly raw: string
  /** Whitespace-collapsed text with comments stripped, used for matching */
  readonly normalized: string
  readonly dialect: Dialect | 'unknown'
  readonly location: StatementLocation
  readonly facts: AstFacts
  readonly tables: readonly string[]
  readonly columns: readonly string[]
  readonly kind: StatementKind
  /** Reason the external parser rejected this statement */
  readonly parseError?: string
}
