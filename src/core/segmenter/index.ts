import { normalizeSql } from '../normalize.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('segmenter')

/**
 * One statement cut out of the source text
 */
export interface SegmentedStatement {
  /** Statement text without the trailing separator, trimmed */
  text: string
  /** 1-based line of the first character */
  line: number
  /** 1-based column of the first character */
  column: number
  /** 0-based offset of the first character */
  offset: number
  /** 0-based offset just past the last character */
  end: number
}

export interface SegmentationResult {
  statements: SegmentedStatement[]
  /** Set when the scan hit an unterminated quote or comment and fell back to naive splitting */
  anomaly?: string
}

const QUOTE_OPENERS: Record<string, string> = {
  "'": "'",
  '"': '"',
  '`': '`',
  '[': ']'
}

const QUOTE_NAMES: Record<string, string> = {
  "'": 'string literal',
  '"': 'quoted identifier',
  '`': 'backtick identifier',
  ']': 'bracket identifier'
}

/**
 * Split SQL text into statements on top-level semicolons.
 *
 * Semicolons inside quotes, quoted identifiers and comments do not split.
 * Regions that are blank or hold only comments are skipped. Never throws: an
 * unterminated quote or block comment makes the rest of the input fall back
 * to naive splitting on `;`.
 */
export function segment(sql: string): SegmentationResult {
  try {
    return scan(sql)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(`Statement scan failed, splitting naively: ${message}`)
    const statements: SegmentedStatement[] = []
    naiveSplit(sql, 0, new LineIndex(sql), statements)
    return { statements, anomaly: message }
  }
}

/**
 * Split SQL text into statements, see {@link segment}
 */
export function splitStatements(sql: string): SegmentedStatement[] {
  return segment(sql).statements
}

function scan(sql: string): SegmentationResult {
  const lines = new LineIndex(sql)
  const statements: SegmentedStatement[] = []
  let start = 0
  let quote: string | null = null
  let quoteStart = 0
  let inLineComment = false
  let inBlockComment = false
  let blockStart = 0

  for (let i = 0; i < sql.length; i++) {
    const ch = sql[i]
    const next = sql[i + 1]

    if (inLineComment) {
      if (ch === '\n') inLineComment = false
      continue
    }

    if (inBlockComment) {
      if (ch === '*' && next === '/') {
        inBlockComment = false
        i++
      }
      continue
    }

    if (quote) {
      if (ch === '\\' && quote !== ']') {
        i++
      } else if (ch === quote) {
        quote = null
      }
      continue
    }

    if (ch === '-' && next === '-') {
      inLineComment = true
      i++
      continue
    }

    if (ch === '/' && next === '*') {
      inBlockComment = true
      blockStart = i
      i++
      continue
    }

    if (ch in QUOTE_OPENERS) {
      quote = QUOTE_OPENERS[ch]
      quoteStart = i
      continue
    }

    if (ch === ';') {
      pushRegion(sql, start, i, lines, statements)
      start = i + 1
    }
  }

  if (quote || inBlockComment) {
    const at = quote ? quoteStart : blockStart
    const what = quote ? `Unterminated ${QUOTE_NAMES[quote]}` : 'Unterminated block comment'
    const position = lines.locate(at)
    naiveSplit(sql, start, lines, statements)
    return {
      statements,
      anomaly: `${what} at line ${position.line}, column ${position.column}`
    }
  }

  pushRegion(sql, start, sql.length, lines, statements)
  return { statements }
}

function naiveSplit(
  sql: string,
  from: number,
  lines: LineIndex,
  statements: SegmentedStatement[]
): void {
  let start = from
  let separator = sql.indexOf(';', start)
  while (separator !== -1) {
    pushRegion(sql, start, separator, lines, statements)
    start = separator + 1
    separator = sql.indexOf(';', start)
  }
  pushRegion(sql, start, sql.length, lines, statements)
}

function pushRegion(
  sql: string,
  from: number,
  to: number,
  lines: LineIndex,
  statements: SegmentedStatement[]
): void {
  let begin = from
  let end = to
  while (begin < end && /\s/.test(sql[begin])) begin++
  while (end > begin && /\s/.test(sql[end - 1])) end--
  if (begin === end) return

  const text = sql.slice(begin, end)
  if (normalizeSql(text) === '') return

  const { line, column } = lines.locate(begin)
  statements.push({ text, line, column, offset: begin, end })
}

/**
 * Maps character offsets to 1-based line and column numbers
 */
class LineIndex {
  private readonly starts: number[] = [0]

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.starts.push(i + 1)
    }
  }

  locate(offset: number): { line: number; column: number } {
    let low = 0
    let high = this.starts.length - 1
    while (low < high) {
      const mid = (low + high + 1) >> 1
      if (this.starts[mid] <= offset) {
        low = mid
      } else {
        high = mid - 1
      }
    }
    return { line: low + 1, column: offset - this.starts[low] + 1 }
  }
}
