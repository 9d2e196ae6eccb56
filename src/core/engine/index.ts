import type { AnalysisResult, Diagnostic, Dialect, Severity, Statement } from '../../types/index.js'
import { VERSION } from '../../version.js'
import { hashString } from '../../utils/hash.js'
import { createLogger } from '../../utils/logger.js'
import { createOrchestrator, type RuleSelection } from '../analyzer/index.js'
import { resolveThresholds, type Thresholds } from '../catalog/thresholds.js'
import { DialectDetector, resolveDialect } from '../dialect/index.js'
import { ParseError, UnsupportedDialectError } from '../errors.js'
import { NodeSqlParser } from '../parser/node-sql-parser.js'
import type { ParseOutcome, SqlParser } from '../parser/types.js'
import { getRuleRegistry } from '../registry/index.js'
import type { RuleRegistry } from '../registry/registry.js'
import { createRuleContext } from '../rules/base.js'
import { segment, type SegmentedStatement } from '../segmenter/index.js'
import { createStatement } from '../statement.js'
import { computeStatistics } from './statistics.js'

const logger = createLogger('engine')

export interface RuleOverride {
  enabled?: boolean
  severity?: Severity
}

export interface EngineOptions {
  /** Dialect name or alias; validated at construction */
  dialect?: string
  parser?: SqlParser
  /** Defaults to the process-wide registry */
  registry?: RuleRegistry
  detector?: DialectDetector
  thresholds?: Partial<Thresholds>
  ruleOverrides?: Readonly<Record<string, RuleOverride>>
  disabledRules?: readonly string[]
  /** A parse taking longer than this counts as failed */
  parseTimeoutMs?: number
  /** Source file recorded on locations */
  file?: string
}

export interface AnalyzeOptions {
  /** Dialect hint for this call; an unsupported name is reported, not thrown */
  dialect?: string
  file?: string
  /** Once aborted, remaining statements are not parsed */
  signal?: AbortSignal
}

function selectionFrom(options: EngineOptions): RuleSelection {
  const disabledRules = new Set(options.disabledRules ?? [])
  const enabledRules = new Set<string>()
  const severityOverrides: Record<string, Severity> = {}
  for (const [id, override] of Object.entries(options.ruleOverrides ?? {})) {
    if (override.enabled === false) disabledRules.add(id)
    if (override.enabled === true) enabledRules.add(id)
    if (override.severity) severityOverrides[id] = override.severity
  }
  return { disabledRules, enabledRules, severityOverrides }
}

/**
 * Segments, parses and checks SQL text. Malformed SQL never throws;
 * problems show up as diagnostics on the result.
 */
export class AnalysisEngine {
  readonly dialect: Dialect | undefined
  readonly thresholds: Thresholds
  private readonly parser: SqlParser
  private readonly detector: DialectDetector
  private readonly selection: RuleSelection

  constructor(private readonly options: EngineOptions = {}) {
    this.dialect = options.dialect ? resolveDialect(options.dialect) : undefined
    this.thresholds = resolveThresholds(options.thresholds)
    this.parser = options.parser ?? new NodeSqlParser()
    this.detector = options.detector ?? new DialectDetector()
    this.selection = selectionFrom(options)
  }

  analyze(sql: string, options: AnalyzeOptions = {}): AnalysisResult {
    const start = Date.now()
    const diagnostics: Diagnostic[] = []
    const file = options.file ?? this.options.file
    const dialect = this.batchDialect(sql, options.dialect, diagnostics)
    const statements = this.buildStatements(sql, dialect, file, options.signal, diagnostics)

    const registry = this.options.registry ?? getRuleRegistry()
    const output = createOrchestrator(registry, this.selection).run({
      statements: statements.map((statement) => createRuleContext(statement, this.thresholds))
    })
    diagnostics.push(...output.diagnostics)

    const findings = Object.freeze(output.findings)
    logger.debug(`Analyzed ${statements.length} statements with ${findings.length} findings`)

    return Object.freeze({
      version: VERSION,
      fingerprint: hashString(sql),
      dialect: dialect ?? 'unknown',
      ...(file !== undefined ? { file } : {}),
      statements: Object.freeze(statements),
      findings,
      diagnostics: Object.freeze(diagnostics),
      statistics: computeStatistics(statements, findings),
      duration: Date.now() - start
    })
  }

  /**
   * Segment and parse without running rules
   */
  parse(sql: string, options: AnalyzeOptions = {}): Statement[] {
    const dialect = this.batchDialect(sql, options.dialect, [])
    return this.buildStatements(sql, dialect, options.file ?? this.options.file, options.signal, [])
  }

  /**
   * Strict mode: exactly one statement that the parser accepts
   */
  parseSingle(sql: string, options: AnalyzeOptions = {}): Statement {
    const statements = this.parse(sql, options)
    if (statements.length === 0) {
      throw new ParseError('No statement found', sql)
    }
    if (statements.length > 1) {
      throw new ParseError('Expected a single statement', sql, `found ${statements.length}`)
    }
    const [statement] = statements
    if (statement.parseError !== undefined) {
      throw new ParseError('Could not parse statement', sql, statement.parseError)
    }
    return statement
  }

  private batchDialect(sql: string, hint: string | undefined, diagnostics: Diagnostic[]): Dialect | undefined {
    if (hint) {
      try {
        return resolveDialect(hint)
      } catch (error) {
        if (!(error instanceof UnsupportedDialectError)) throw error
        diagnostics.push({ kind: 'unsupported-dialect', message: `${error.message}; hint ignored` })
      }
    }
    return this.dialect ?? this.detector.detect(sql)
  }

  private buildStatements(
    sql: string,
    dialect: Dialect | undefined,
    file: string | undefined,
    signal: AbortSignal | undefined,
    diagnostics: Diagnostic[]
  ): Statement[] {
    const { statements: segments, anomaly } = segment(sql)
    if (anomaly) {
      diagnostics.push({ kind: 'segmentation-fallback', message: anomaly })
    }

    return segments.map((segmented, index) => {
      const statementDialect = dialect ?? this.detector.detect(segmented.text)
      const outcome = this.parseStatement(segmented, statementDialect, signal)
      if (!outcome.ok) {
        diagnostics.push({
          kind: 'parse-failed',
          statementIndex: index,
          message: `Could not parse statement ${index}: ${outcome.reason}`
        })
      }
      return createStatement({
        index,
        raw: segmented.text,
        dialect: statementDialect ?? 'unknown',
        location: {
          statementIndex: index,
          line: segmented.line,
          column: segmented.column,
          offset: segmented.offset,
          ...(file !== undefined ? { file } : {})
        },
        outcome
      })
    })
  }

  private parseStatement(
    segmented: SegmentedStatement,
    dialect: Dialect | undefined,
    signal: AbortSignal | undefined
  ): ParseOutcome {
    if (signal?.aborted) {
      return { ok: false, reason: 'analysis cancelled' }
    }
    const started = Date.now()
    let outcome: ParseOutcome
    try {
      outcome = this.parser.parse(segmented.text, dialect)
    } catch (error) {
      outcome = { ok: false, reason: error instanceof Error ? error.message : String(error) }
    }
    const elapsed = Date.now() - started
    const timeout = this.options.parseTimeoutMs
    if (timeout !== undefined && elapsed > timeout) {
      return { ok: false, reason: `parse exceeded ${timeout} ms` }
    }
    return outcome
  }
}

/**
 * Create an engine. Throws UnsupportedDialectError for an unknown dialect name.
 */
export function createEngine(options: EngineOptions = {}): AnalysisEngine {
  return new AnalysisEngine(options)
}

export { computeStatistics } from './statistics.js'
export { toJSON, type SerializedResult, type SerializedFinding, type SerializedStatement, type SerializedDiagnostic } from './serialize.js'
