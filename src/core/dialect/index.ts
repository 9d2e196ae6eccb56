import { z } from 'zod'
import { UnsupportedDialectError } from '../errors.js'
import type { Dialect } from '../../types/index.js'

/**
 * Closed set of dialect names accepted as hints and in configuration
 */
export const SUPPORTED_DIALECTS = [
  'postgres',
  'mysql',
  'mariadb',
  'sqlite',
  'tsql',
  'oracle',
  'bigquery',
  'snowflake',
  'redshift',
  'clickhouse',
  'duckdb',
  'presto',
  'trino',
  'spark',
  'databricks',
  'hive',
  'db2'
] as const satisfies readonly Dialect[]

export const DialectSchema = z.enum(SUPPORTED_DIALECTS)

const DIALECT_ALIASES: Record<string, Dialect> = {
  postgresql: 'postgres',
  mssql: 'tsql',
  sqlserver: 'tsql'
}

export function isDialect(value: string): value is Dialect {
  return DialectSchema.safeParse(value).success
}

/**
 * Resolve a user-supplied dialect name (case-insensitive, aliases allowed)
 * @throws UnsupportedDialectError when the name is not supported
 */
export function resolveDialect(name: string): Dialect {
  const key = name.trim().toLowerCase()
  const resolved = DIALECT_ALIASES[key] ?? key
  if (!isDialect(resolved)) {
    throw new UnsupportedDialectError(name)
  }
  return resolved
}

/**
 * A textual feature that hints at a dialect
 */
export interface DialectSignature {
  dialect: Dialect
  pattern: RegExp
}

export const DEFAULT_SIGNATURES: readonly DialectSignature[] = [
  { dialect: 'postgres', pattern: /\$\d+/ },
  { dialect: 'postgres', pattern: /::\s*\w+/ },
  { dialect: 'mysql', pattern: /`\w+`/ },
  { dialect: 'tsql', pattern: /\bTOP\s+\d+/i },
  { dialect: 'tsql', pattern: /\[\w+\]/ },
  { dialect: 'oracle', pattern: /\bROWNUM\b/i },
  { dialect: 'bigquery', pattern: /`[\w-]+\.[\w-]+\.[\w-]+`/ },
  { dialect: 'snowflake', pattern: /\bFLATTEN\s*\(/i }
]

/**
 * Scores SQL text against a ranked signature list
 */
export class DialectDetector {
  private readonly signatures: { dialect: Dialect; pattern: RegExp }[]

  constructor(signatures: readonly DialectSignature[] = DEFAULT_SIGNATURES) {
    this.signatures = signatures.map(({ dialect, pattern }) => ({
      dialect,
      pattern: pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`)
    }))
  }

  /**
   * Pick the dialect with the most signature matches.
   * Ties go to the dialect listed first; no match at all yields undefined.
   */
  detect(sql: string): Dialect | undefined {
    const scores = new Map<Dialect, number>()

    for (const { dialect, pattern } of this.signatures) {
      const count = sql.match(pattern)?.length ?? 0
      scores.set(dialect, (scores.get(dialect) ?? 0) + count)
    }

    let best: Dialect | undefined
    let bestScore = 0
    // Map iteration follows first insertion, i.e. signature list order
    for (const [dialect, score] of scores) {
      if (score > bestScore) {
        best = dialect
        bestScore = score
      }
    }
    return best
  }
}
