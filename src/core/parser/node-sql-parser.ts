import nodeSqlParser from 'node-sql-parser'
import type { AST } from 'node-sql-parser'
import { createLogger } from '../../utils/logger.js'
import { kindFromNodeType } from './facts.js'
import type { Dialect } from '../../types/index.js'
import type { ParseOutcome, SqlParser } from './types.js'

const { Parser } = nodeSqlParser

const logger = createLogger('parser')

/**
 * Grammar names understood by node-sql-parser's `database` option.
 * Dialects without an entry use the library's default grammar.
 */
const DATABASE_BY_DIALECT: Partial<Record<Dialect, string>> = {
  postgres: 'PostgresQL',
  mysql: 'MySQL',
  mariadb: 'MariaDB',
  sqlite: 'Sqlite',
  tsql: 'TransactSQL',
  bigquery: 'BigQuery',
  snowflake: 'Snowflake',
  redshift: 'Redshift',
  hive: 'Hive',
  spark: 'Hive',
  databricks: 'Hive',
  db2: 'DB2',
  trino: 'Trino',
  presto: 'Trino'
}

export function databaseFor(dialect: Dialect | undefined): string | undefined {
  return dialect ? DATABASE_BY_DIALECT[dialect] : undefined
}

/**
 * Parser backend built on node-sql-parser
 */
export class NodeSqlParser implements SqlParser {
  readonly name = 'node-sql-parser'
  private readonly parser = new Parser()

  parse(text: string, dialect?: Dialect): ParseOutcome {
    const database = databaseFor(dialect)
    const options = database ? { database } : {}

    let tableList: string[]
    let columnList: string[]
    let ast: AST | undefined
    try {
      const result = this.parser.parse(text, options)
      tableList = result.tableList
      columnList = result.columnList
      ast = Array.isArray(result.ast) ? result.ast[0] : result.ast
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) }
    }

    if (!ast) {
      return { ok: false, reason: 'No statement found' }
    }

    return {
      ok: true,
      tables: tablesFromList(tableList),
      columns: columnsFromList(columnList),
      statementKind: kindFromNodeType(readType(ast)),
      normalizedText: this.render(ast, options, text),
      ast
    }
  }

  private render(ast: AST, options: { database?: string }, fallback: string): string {
    try {
      return this.parser.sqlify(ast, options)
    } catch (error) {
      logger.debug(`Could not render statement: ${error instanceof Error ? error.message : String(error)}`)
      return fallback
    }
  }
}

function readType(node: unknown): string | undefined {
  if (typeof node === 'object' && node !== null && 'type' in node && typeof node.type === 'string') {
    return node.type
  }
  return undefined
}

/**
 * Entries look like `select::schema::table`; schema is `null` when absent
 */
export function tablesFromList(list: readonly string[]): string[] {
  const tables = new Set<string>()
  for (const entry of list) {
    const [, schema, table] = entry.split('::')
    if (!table) continue
    tables.add(schema && schema !== 'null' ? `${schema}.${table}` : table)
  }
  return [...tables]
}

/**
 * Entries look like `select::table::column`; `(.*)` is the star column
 */
export function columnsFromList(list: readonly string[]): string[] {
  const columns = new Set<string>()
  for (const entry of list) {
    const [, table, column] = entry.split('::')
    if (!column) continue
    const name = column === '(.*)' ? '*' : column
    columns.add(table && table !== 'null' ? `${table}.${name}` : name)
  }
  return [...columns]
}
