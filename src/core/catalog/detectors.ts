import { hasComment, stripLiterals } from '../normalize.js'
import type { Thresholds } from './thresholds.js'

/**
 * Text views of one statement handed to every detector
 */
export interface DetectorInput {
  /** Comments stripped, whitespace collapsed */
  normalized: string
  /** Normalized text with string literal contents removed */
  stripped: string
  /** Statement as written */
  raw: string
  thresholds: Thresholds
}

/**
 * Evidence for a triggered detector
 */
export interface DetectorHit {
  match?: string
  observed?: number
  threshold?: number
}

export type Detector = (input: DetectorInput) => DetectorHit | null

type Source = 'stripped' | 'normalized' | 'raw'

interface PatternOptions {
  /** Text view to match against (default: stripped) */
  source?: Source
  /** Skip when this pattern also matches the same view */
  unless?: RegExp
  /** Extra condition over the match */
  when?: (match: RegExpExecArray, input: DetectorInput) => boolean
}

/**
 * Detector that fires on the first match of a non-global pattern
 */
function pattern(re: RegExp, options: PatternOptions = {}): Detector {
  return (input) => {
    const text = input[options.source ?? 'stripped']
    if (options.unless && options.unless.test(text)) return null
    const match = re.exec(text)
    if (!match) return null
    if (options.when && !options.when(match, input)) return null
    return { match: match[0] }
  }
}

export function createDetectorInput(normalized: string, raw: string, thresholds: Thresholds): DetectorInput {
  return { normalized, stripped: stripLiterals(normalized), raw, thresholds }
}

const AGGREGATE_CALL = /\b(?:COUNT|SUM|AVG|MIN|MAX)\s*\(/i
const CLAUSE_END = /\b(?:HAVING|ORDER\s+BY|LIMIT|UNION|EXCEPT|INTERSECT|WINDOW|QUALIFY|OFFSET|FETCH)\b/i
const COMMA_JOIN = /\bFROM\s+[\w.]+(?:\s+(?:AS\s+)?\w+)?\s*,\s*[\w.]+/i
const SELECT_HEAD = /^SELECT\s+(?:DISTINCT\s+|ALL\s+)?(?:TOP\s+\d+\s+)?/i

/**
 * Prefix of `text` before its first unbalanced `)`
 */
function untilUnmatchedParen(text: string): string {
  let depth = 0
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '(') {
      depth++
    } else if (text[i] === ')') {
      if (depth === 0) return text.slice(0, i)
      depth--
    }
  }
  return text
}

function cutAt(text: string, stop: RegExp): string {
  const index = text.search(stop)
  return index === -1 ? text : text.slice(0, index)
}

/**
 * Split on commas outside parentheses, dropping empty items
 */
function splitTopLevel(text: string): string[] {
  const items: string[] = []
  let depth = 0
  let start = 0
  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (ch === '(') depth++
    else if (ch === ')') depth--
    else if (ch === ',' && depth === 0) {
      items.push(text.slice(start, i).trim())
      start = i + 1
    }
  }
  items.push(text.slice(start).trim())
  return items.filter((item) => item !== '')
}

/**
 * Items of the outermost SELECT list, or undefined when the statement is not a SELECT
 */
function selectList(stripped: string): string[] | undefined {
  const head = SELECT_HEAD.exec(stripped)
  if (!head) return undefined
  const rest = stripped.slice(head[0].length)

  let depth = 0
  let end = rest.length
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i]
    if (ch === '(') depth++
    else if (ch === ')') depth--
    else if (depth === 0 && /^FROM\b/i.test(rest.slice(i)) && (i === 0 || /\W/.test(rest[i - 1]))) {
      end = i
      break
    }
  }
  return splitTopLevel(rest.slice(0, end))
}

/**
 * Deepest nesting of parenthesized SELECTs
 */
function subqueryDepth(stripped: string): number {
  const stack: boolean[] = []
  let depth = 0
  let max = 0
  for (let i = 0; i < stripped.length; i++) {
    const ch = stripped[i]
    if (ch === '(') {
      const isSubquery = /^\(\s*SELECT\b/i.test(stripped.slice(i))
      stack.push(isSubquery)
      if (isSubquery) {
        depth++
        max = Math.max(max, depth)
      }
    } else if (ch === ')') {
      if (stack.pop()) depth--
    }
  }
  return max
}

function above(observed: number, threshold: number, match?: string): DetectorHit | null {
  return observed > threshold ? { match, observed, threshold } : null
}

const largeOffset: Detector = ({ stripped, thresholds }) => {
  let largest = -1
  let text: string | undefined
  for (const match of stripped.matchAll(/\bOFFSET\s+(\d+)|\bLIMIT\s+(\d+)\s*,\s*\d+/gi)) {
    const offset = Number(match[1] ?? match[2])
    if (offset > largest) {
      largest = offset
      text = match[0]
    }
  }
  return text === undefined ? null : above(largest, thresholds.offsetMax, text)
}

const massiveInList: Detector = ({ stripped, thresholds }) => {
  let largest: DetectorHit | null = null
  for (const match of stripped.matchAll(/\bIN\s*\(([^()]*)\)/gi)) {
    if (/^\s*SELECT\b/i.test(match[1])) continue
    const count = splitTopLevel(match[1]).length
    if (count > thresholds.inListMax && (largest?.observed ?? 0) < count) {
      largest = { match: `IN (${count} values)`, observed: count, threshold: thresholds.inListMax }
    }
  }
  return largest
}

const deepSubqueries: Detector = ({ stripped, thresholds }) =>
  above(subqueryDepth(stripped), thresholds.subqueryDepthMax)

const wideGroupBy: Detector = ({ stripped, thresholds }) => {
  const match = /\bGROUP\s+BY\s+(.*)$/i.exec(stripped)
  if (!match) return null
  const body = cutAt(untilUnmatchedParen(match[1]), CLAUSE_END)
  return above(splitTopLevel(body).length, thresholds.groupByColumnsMax, `GROUP BY ${body.trim()}`)
}

const oversizedVarchar: Detector = ({ stripped, thresholds }) => {
  for (const match of stripped.matchAll(/\bN?VARCHAR2?\s*\(\s*(MAX|\d+)\s*\)/gi)) {
    if (match[1].toUpperCase() === 'MAX') return { match: match[0] }
    const hit = above(Number(match[1]), thresholds.varcharLengthMax, match[0])
    if (hit) return hit
  }
  return null
}

const largeEnum: Detector = ({ normalized, thresholds }) => {
  for (const match of normalized.matchAll(/\bENUM\s*\(([^)]*)\)/gi)) {
    const hit = above(match[1].length, thresholds.enumBodyLengthMax, match[0])
    if (hit) return hit
  }
  return null
}

const havingWithoutAggregate: Detector = ({ stripped }) => {
  const match = /\bHAVING\s+(.*)$/i.exec(stripped)
  if (!match) return null
  const body = cutAt(untilUnmatchedParen(match[1]), CLAUSE_END).trim()
  return AGGREGATE_CALL.test(body) ? null : { match: `HAVING ${body}` }
}

const missingCaseElse: Detector = ({ stripped }) => {
  const innermost = /\bCASE\b((?:(?!\bCASE\b|\bEND\b).)*)\bEND\b/i
  let text = stripped
  let match = innermost.exec(text)
  while (match) {
    if (!/\bELSE\b/i.test(match[1])) return { match: match[0] }
    text = `${text.slice(0, match.index)}expr${text.slice(match.index + match[0].length)}`
    match = innermost.exec(text)
  }
  return null
}

const duplicateSelectColumn: Detector = ({ stripped }) => {
  const items = selectList(stripped)
  if (!items) return null
  const seen = new Set<string>()
  for (const item of items) {
    const key = item.toLowerCase()
    if (key !== '*' && seen.has(key)) return { match: item }
    seen.add(key)
  }
  return null
}

const unusedCte: Detector = ({ stripped }) => {
  if (!/^WITH\b/i.test(stripped)) return null
  const definitions = stripped.matchAll(
    /(?:^WITH\s+(?:RECURSIVE\s+)?|\)\s*,\s*)(\w+)(?:\s*\([^()]*\))?\s+AS\s*(?:NOT\s+)?(?:MATERIALIZED\s+)?\(/gi
  )
  for (const definition of definitions) {
    const name = definition[1]
    const uses = stripped.match(new RegExp(`\\b${name}\\b`, 'gi'))?.length ?? 0
    if (uses < 2) return { match: name }
  }
  return null
}

const uncommentedComplexQuery: Detector = ({ stripped, raw, thresholds }) => {
  if (hasComment(raw)) return null
  const joins = stripped.match(/\bJOIN\b/gi)?.length ?? 0
  return above(joins, thresholds.joinCountMax)
}

const multipleSpaces: Detector = ({ raw }) => {
  const match = /\S {2,}\S/.exec(stripLiterals(raw))
  return match ? { match: match[0] } : null
}

const hardcodedIp: Detector = pattern(/\b(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\b/, {
  source: 'normalized',
  when: (match) => match.slice(1, 5).every((octet) => Number(octet) <= 255)
})

/**
 * Detection logic per rule id. Metadata and order live in rules.json.
 */
export const DETECTORS: Readonly<Record<string, Detector>> = {
  // Performance
  'PERF-SCAN-001': pattern(/\bSELECT\s+\*/i),
  'PERF-SARG-001': pattern(/\bWHERE\s+(?:YEAR|MONTH|DAY|UPPER|LOWER)\s*\([^)]+\)\s*(?:=|<>|!=|>=?|<=?|IN\b|LIKE\b)/i),
  'PERF-SARG-002': pattern(/\b(?:WHERE|AND|OR)\s+\w*(?:name|email|code|status|phone)\w*\s*=\s*\d+\b/i),
  'PERF-SARG-003': pattern(
    /\b(?:WHERE|AND|OR)\s+(?:LOWER|UPPER|TRIM|SUBSTRING|SUBSTR|DATE|COALESCE|CAST)\s*\(\s*(?:\w+\.)?(?:\w+_)?(?:id|email|created_at|updated_at)\b/i
  ),
  'PERF-SARG-004': pattern(/\bLIKE\s+'%/i, { source: 'normalized' }),
  'PERF-SARG-005': pattern(/\bWHERE\s+([\w.]+)\s*=\s*[^\s()]+\s+OR\s+([\w.]+)\s*=/i, {
    when: (match) => match[1].toLowerCase() !== match[2].toLowerCase()
  }),
  'PERF-SARG-006': pattern(/\bWHERE\b.*\b(?:STRFTIME|DATE_FORMAT|TO_CHAR)\s*\(/i),
  'PERF-SARG-007': pattern(/\bWHERE\b.*\bEXTRACT\s*\(/i),
  'PERF-SARG-008': pattern(/\bWHERE\b.*\bDATE_TRUNC\s*\(/i),
  'PERF-SARG-009': pattern(/\bWHERE\b.*(?:\b(?:REGEXP|RLIKE|SIMILAR\s+TO)\b|\bREGEXP_(?:LIKE|CONTAINS)\s*\(|\s!?~\*?\s)/i),
  'PERF-SARG-010': pattern(/\bLIKE\s+'%[^'%]+%[^'%]+%/i, { source: 'normalized' }),
  'PERF-SARG-011': pattern(/\bWHERE\b.*\bCASE\b/i),
  'PERF-SARG-012': pattern(/\bWHERE\b.*(?:\bJSON_\w+\s*\(|->>?|#>>?)/i),
  'PERF-JOIN-001': pattern(COMMA_JOIN, { unless: /\bWHERE\b/i }),
  'PERF-JOIN-002': pattern(/\bFULL\s+(?:OUTER\s+)?JOIN\b/i),
  'PERF-SUB-001': pattern(/\(\s*SELECT\b.*\bFROM\b.*\bWHERE\b.*=\s*\w+\.\w+/i),
  'PERF-SUB-002': pattern(/^SELECT\b(?:(?!\bFROM\b).)*\(\s*SELECT\b/i),
  'PERF-SUB-003': pattern(/\b(?:WHERE|AND|OR)\s+[\w.]+\s+IN\s*\(\s*SELECT\b/i),
  'PERF-SUB-004': pattern(/\b(?:WHERE|AND|OR)\s+\(\s*SELECT\s+COUNT\s*\(/i),
  'PERF-SUB-005': pattern(/\bEXISTS\s*\(\s*SELECT\b/i, { unless: /\bLIMIT\b/i }),
  'PERF-SUB-006': deepSubqueries,
  'PERF-PAGE-001': largeOffset,
  'PERF-PAGE-002': pattern(/\bROW_NUMBER\s*\(.*\bBETWEEN\b/i),
  'PERF-DIST-001': pattern(/\bSELECT\s+DISTINCT\s+(?:\w+\.)?(?:\w+_)?id\b/i),
  'PERF-LIST-001': massiveInList,
  'PERF-SET-001': pattern(/\bUNION\b(?!\s+ALL\b)/i),
  'PERF-SET-002': pattern(/\bUNION\s+ALL\b.*\bUNION\b(?!\s+ALL\b)|\bUNION\b(?!\s+ALL\b).*\bUNION\s+ALL\b/i),
  'PERF-SET-003': pattern(/\b(?:EXCEPT|MINUS)\s+(?:ALL\s+|DISTINCT\s+)?\(?\s*SELECT\b/i),
  'PERF-SET-004': pattern(/\bINTERSECT\b/i),
  'PERF-WIN-001': pattern(
    /\b(?:ROW_NUMBER|RANK|DENSE_RANK|NTILE|PERCENT_RANK|CUME_DIST)\s*\([^)]*\)\s*OVER\s*\((?![^)]*\bPARTITION\s+BY\b)/i
  ),
  'PERF-HINT-001': pattern(/\b(?:FORCE|USE|IGNORE)\s+INDEX\b|\bWITH\s*\(\s*(?:INDEX\s*\(|FORCESEEK\b)/i),
  'PERF-PROC-001': pattern(/\bDECLARE\b.*\bCURSOR\b/i),
  'PERF-PROC-002': pattern(/\bWHILE\b.*\bBEGIN\b/i),
  'PERF-PROC-003': pattern(/\bDECLARE\s+@\w+\s+TABLE\b/i),
  'PERF-PROC-004': pattern(/\b(?:SET|SELECT)\s+(@\w+)\s*=\s*\1\s*\+/i),
  'PERF-N1-001': pattern(/\bSELECT\b.*\bFROM\b.*\bWHERE\s+(?:\w+\.)?\w+_id\s*=\s*(?:\?|\$\d+|:\w+|@\w+)/i),
  'PERF-AGG-001': pattern(/\bCOUNT\s*\(\s*\*\s*\)\s*>\s*0\b/i),
  'PERF-AGG-002': havingWithoutAggregate,
  'PERF-AGG-003': wideGroupBy,
  'PERF-TYPE-001': oversizedVarchar,
  'PERF-TYPE-002': pattern(
    /^(?:CREATE|ALTER)\s+TABLE\b.*(?:[(,]|\bADD(?:\s+COLUMN)?)\s*\w+\s+(?:TINY|MEDIUM|LONG)?TEXT\b/i
  ),
  'PERF-TYPE-003': largeEnum,

  // Cost
  'COST-JOIN-001': pattern(/\bCROSS\s+JOIN\b/i),
  'COST-SORT-001': pattern(/\bORDER\s+BY\s+(?:RAND|RANDOM|NEWID)\s*\(\s*\)/i),
  'COST-SCAN-001': pattern(/\bSELECT\s+DISTINCT\s+\*/i),
  'COST-SCAN-002': pattern(/^SELECT\s+COUNT\s*\(\s*(?:\*|1)\s*\)\s+FROM\s+[\w.]+\s*$/i),
  'COST-SCAN-003': pattern(/\bFROM\s+`[^`]*\*`/),
  'COST-EXPORT-001': pattern(/\bUNLOAD\s*\(|\bEXPORT\s+DATA\b|\bCOPY\s+INTO\s+'(?:s3|gcs|azure):\/\//i, {
    source: 'normalized'
  }),
  'COST-TEMP-001': pattern(/\bSELECT\b.*\bINTO\s+#\w+/i),

  // Reliability
  'REL-DML-001': pattern(
    /^(?:UPDATE\s+[\w.`"[\]]+(?:\s+(?:AS\s+)?\w+)?\s+SET\b|DELETE\s+FROM\s+[\w.`"[\]]+)/i,
    { unless: /\bWHERE\b/i }
  ),
  'REL-DML-002': pattern(/\bINSERT\s+INTO\s+[\w.`"[\]]+\s+(?:VALUES|SELECT)\b/i),
  'REL-DML-004': pattern(/\bINSERT\s+INTO\b.*\bSELECT\s+\*/i),
  'REL-DML-005': pattern(/^TRUNCATE\s+(?:TABLE\s+)?[\w.]+/i, { unless: /\bCASCADE\b/i }),
  'REL-NULL-001': pattern(/\b(?:WHERE|AND|OR|ON|HAVING|WHEN)\s+[\w.]+\s*(?:=|!=|<>)\s*NULL\b/i),
  'REL-NULL-002': pattern(/\bNOT\s+IN\s*\(\s*SELECT\b/i),
  'REL-LOGIC-001': pattern(
    /\b(?:WHERE|AND)\s+([\w.]+)\s*=\s*(\d+|'[^']*')\s+AND\s+\1\s*=\s*(\d+|'[^']*')(?![\w'])/i,
    { source: 'normalized', when: (match) => match[2] !== match[3] }
  ),
  'REL-LOGIC-002': pattern(/\bWHERE\s+(?:1\s*=\s*0\b|0\s*=\s*1\b|FALSE\b)/i),
  'REL-LOGIC-003': pattern(
    /\b([\w.]+)\s+IS\s+NOT\s+NULL\s+AND\s+\1\s+IS\s+NULL\b|\b([\w.]+)\s+IS\s+NULL\s+AND\s+\2\s+IS\s+NOT\s+NULL\b/i
  ),
  'REL-LOGIC-004': pattern(/\bLEFT\s+(?:OUTER\s+)?JOIN\b.*\bWHERE\b.*\b\w+\.\w+\s+IS\s+NOT\s+NULL\b/i),
  'REL-LOGIC-005': missingCaseElse,
  'REL-LOGIC-006': pattern(/=\s*\(\s*SELECT\s+(?!(?:TOP\s+1|MAX|MIN|COUNT|SUM|AVG)\b)/i, {
    unless: /\bLIMIT\s+1\b/i
  }),
  'REL-LOGIC-007': pattern(
    /^SELECT\s+(?:DISTINCT\s+)?[\w.]+\s*(?:AS\s+\w+\s*)?,.*\b(?:COUNT|SUM|AVG|MIN|MAX)\s*\(/i,
    { unless: /\bGROUP\s+BY\b|\bOVER\s*\(/i }
  ),
  'REL-LOGIC-008': pattern(/\bHAVING\b.*\bGROUP\s+BY\b/i),
  'REL-LOGIC-009': pattern(/\b\w*(?:price|amount|total|cost|value|rate|balance)\w*\s*=\s*\d+\.\d+/i),
  'REL-TIME-001': pattern(/\bBETWEEN\s+'\d{4}-\d{2}-\d{2}'\s+AND\s+'\d{4}-\d{2}-\d{2}'/i, {
    source: 'normalized'
  }),
  'REL-TIME-002': pattern(/\b(?:NOW|CURRENT_TIMESTAMP|GETDATE|SYSDATE)\s*\(\s*\)/i, {
    unless: /\bAT\s+TIME\s+ZONE\b/i
  }),
  'REL-TIME-003': pattern(/\b\w+(?:_at|_date)\s*[+-]\s*\d+\b(?!\s*(?:DAYS?|HOURS?|MINUTES?|MONTHS?|YEARS?)\b)/i, {
    unless: /\bINTERVAL\b/i
  }),
  'REL-ORDER-001': pattern(/\bOFFSET\s+\d+/i, { unless: /\bORDER\s+BY\b/i }),
  'REL-ORDER-002': pattern(/\bLIMIT\s+\d+/i, { unless: /\bORDER\s+BY\b/i }),
  'REL-ORDER-003': pattern(/\bORDER\s+BY\s+((?:(?!\bLIMIT\b).)+)\s+LIMIT\b/i, {
    when: (match) => !/\b(?:\w+_)?id\b/i.test(match[1])
  }),
  'REL-DDL-001': pattern(/\bDROP\s+(?:TABLE|VIEW|INDEX|SEQUENCE|FUNCTION|PROCEDURE|TRIGGER)\s+(?!IF\s+EXISTS\b)/i),
  'REL-DDL-002': pattern(/^CREATE\s+(?:TABLE|INDEX|SCHEMA|SEQUENCE|DATABASE)\s+(?!IF\s+NOT\s+EXISTS\b)/i),
  'REL-DDL-003': pattern(/^CREATE\s+(?:GLOBAL\s+|LOCAL\s+)?TEMP(?:ORARY)?\s+TABLE\b/i, {
    unless: /\bON\s+COMMIT\b/i
  }),
  'REL-DDL-004': pattern(/\bDROP\s+(?:DATABASE|SCHEMA)\b/i),
  'REL-DDL-005': pattern(/\b(?:DECIMAL|NUMERIC)\b(?!\s*\(\s*\d+\s*,\s*\d+\s*\))/i),
  'REL-TYPE-001': pattern(/\b\w*(?:price|amount|cost|balance|salary|total)\w*\s+(?:FLOAT|REAL|DOUBLE)\b/i),
  'REL-LOCK-001': pattern(/\bFOR\s+UPDATE\b(?!\s+(?:NOWAIT|SKIP\s+LOCKED)\b)/i),
  'REL-LOCK-002': pattern(/\bLOCK\s+IN\s+SHARE\s+MODE\b/i),
  'REL-LOCK-003': pattern(/^LOCK\s+TABLES?\b/i),
  'REL-TXN-001': pattern(/^(?:BEGIN(?:\s+TRAN(?:SACTION)?)?|START\s+TRANSACTION)\b/i, {
    unless: /\bISOLATION\s+LEVEL\b/i
  }),
  'REL-CTE-001': pattern(/\bWITH\s+RECURSIVE\b/i, { unless: /\b(?:LIMIT|WHERE)\b/i }),

  // Quality
  'QUAL-STYLE-001': pattern(/\b(?:select|from|where|join|insert|update|delete|create|alter|drop)\b/),
  'QUAL-STYLE-002': pattern(/\b(?:FROM|JOIN|UPDATE|INTO|TABLE)\s+([a-z]+[A-Z]\w*|[A-Z]+[a-z]\w*)/),
  'QUAL-STYLE-003': pattern(/\t/, { source: 'raw' }),
  'QUAL-STYLE-004': pattern(/[ \t]+$/m, { source: 'raw' }),
  'QUAL-STYLE-005': multipleSpaces,
  'QUAL-STYLE-006': pattern(/\b(?:\w+\.)?(\w+)\s+AS\s+\1\b/i),
  'QUAL-STYLE-007': pattern(/\b(?:ORDER|GROUP)\s+BY\s+\d+\b/i),
  'QUAL-STYLE-008': pattern(COMMA_JOIN, { when: (_match, input) => /\bWHERE\b/i.test(input.stripped) }),
  'QUAL-STYLE-009': pattern(/\bRIGHT\s+(?:OUTER\s+)?JOIN\b/i),
  'QUAL-STYLE-010': pattern(/\bNATURAL\s+(?:(?:LEFT|RIGHT|INNER|FULL)\s+)?(?:OUTER\s+)?JOIN\b/i),
  'QUAL-STYLE-011': pattern(/\bJOIN\b.*\bUSING\s*\(/i),
  'QUAL-REDUND-001': pattern(/\bLIKE\s+'[^%_']+'/i, { source: 'normalized' }),
  'QUAL-REDUND-002': pattern(
    /\bCAST\s*\(\s*(?:'[^']*'\s+AS\s+(?:N?VARCHAR|N?CHAR|TEXT|STRING)\b|\d+\s+AS\s+(?:INT|INTEGER|BIGINT|SMALLINT)\s*\))/i,
    { source: 'normalized' }
  ),
  'QUAL-REDUND-003': pattern(/\bCOALESCE\s*\(\s*[\w.]+\s*\)/i),
  'QUAL-REDUND-004': duplicateSelectColumn,
  'QUAL-REDUND-005': pattern(/\bSELECT\s+DISTINCT\b.*\bGROUP\s+BY\b/i),
  'QUAL-REDUND-006': pattern(/\(\s*SELECT\s+(?:\d+|''|NULL)\s*\)/i),
  'QUAL-REDUND-007': pattern(/\(\s*\(\s*SELECT\b/i),
  'QUAL-REDUND-008': pattern(/\bWHERE\s+(?:1\s*=\s*1\b|TRUE\b)/i),
  'QUAL-REDUND-009': pattern(
    /\b([\w.]+)\s+IS\s+NOT\s+NULL\s+OR\s+\1\s+IS\s+NULL\b|\b([\w.]+)\s+IS\s+NULL\s+OR\s+\2\s+IS\s+NOT\s+NULL\b/i
  ),
  'QUAL-REDUND-010': pattern(/\b([\w.]+)\s*=\s*('[^']*'|[\w.]+)\s+OR\s+\1\s*=\s*\2(?![\w'.])/i, {
    source: 'normalized'
  }),
  'QUAL-JOIN-001': pattern(/\bJOIN\s+([\w.]+)\b.*\bJOIN\s+\1\b/i),
  'QUAL-CTE-001': unusedCte,
  'QUAL-DOC-001': pattern(/(?:--|\/\*)[^\n]*\b(?:TODO|FIXME|HACK|XXX)\b/i, { source: 'raw' }),
  'QUAL-DOC-002': uncommentedComplexQuery,
  'QUAL-LIT-001': pattern(/\b(?:WHERE|AND|OR)\s+[\w.]+\s*(?:=|<>|!=|>=|<=|>|<)\s*\d{2,}\b/i),
  'QUAL-LIT-002': pattern(/'(?:19|20)\d{2}-\d{2}-\d{2}/, { source: 'normalized' }),
  'QUAL-SCHEMA-002': pattern(/\b(?:attribute|property)(?:_\w+)?\b.*\b(?:\w+_)?value\b/i),
  'QUAL-SCHEMA-003': pattern(/\b(\w+)_type\b.*\b\1_id\b/i),
  'QUAL-SCHEMA-004': pattern(
    /\b(?:FROM|JOIN|INTO|UPDATE|TABLE)\s+(?:\w+\.)?(?:data|entity|entities|object|objects|element|elements|thing|things|info)\b/i
  ),

  // Security
  'SEC-INJ-001': pattern(/\b(?:EXEC|EXECUTE)\s*\(|\bsp_executesql\b|\bEXECUTE\s+IMMEDIATE\b/i),
  'SEC-INJ-002': pattern(
    /'[^']*\b(?:SELECT|INSERT|UPDATE|DELETE|WHERE|FROM)\b[^']*'\s*(?:\+|\|\|)|(?:\+|\|\|)\s*'[^']*\b(?:WHERE|AND|OR|FROM)\b[^']*'|\bCONCAT\s*\(\s*'[^']*\b(?:SELECT|INSERT|UPDATE|DELETE|WHERE)\b/i,
    { source: 'normalized' }
  ),
  'SEC-INJ-003': pattern(/\bOR\s+(?:'([^']*)'\s*=\s*'\1'|(\d+)\s*=\s*\2\b)/i, { source: 'normalized' }),
  'SEC-INJ-004': pattern(/\bUNION\s+(?:ALL\s+)?SELECT\s+NULL\s*(?:,\s*NULL\s*)+/i),
  'SEC-PRIV-001': pattern(/\bGRANT\s+ALL\b/i),
  'SEC-PRIV-003': pattern(/\bGRANT\b.*\bTO\s+(?:'[^']*'|\w+)@'%'/i, { source: 'normalized' }),
  'SEC-PRIV-004': pattern(/\bWITH\s+GRANT\s+OPTION\b/i),
  'SEC-PRIV-005': pattern(/^CREATE\s+(?:USER|LOGIN)\b/i, { unless: /\b(?:IDENTIFIED|PASSWORD)\b/i }),
  'SEC-PRIV-006': pattern(/\bDISABLE\s+ROW\s+LEVEL\s+SECURITY\b|\bNO\s+FORCE\s+ROW\s+LEVEL\s+SECURITY\b/i),
  'SEC-CRED-001': pattern(/\b(?:password|passwd|pwd|pass)\s*=\s*'[^']+'/i, { source: 'normalized' }),
  'SEC-CRED-002': pattern(/\bIDENTIFIED\s+(?:WITH\s+\w+\s+)?BY\s+'[^']+'|\bPASSWORD\s+'[^']+'/i, {
    source: 'normalized'
  }),
  'SEC-CRED-003': pattern(
    /\b(?:api_?key|access_?key|secret_?key|auth_?token|token|secret)\s*=\s*'[\w-]{20,}'/i,
    { source: 'normalized' }
  ),
  'SEC-CRED-004': pattern(
    /'[^']*\b(?:server|host|data source)\s*=[^']*\b(?:password|pwd)\s*=[^']*'|'[a-z][\w+.-]*:\/\/[^:'\s/]+:[^@'\s]+@[^']*'/i,
    { source: 'normalized' }
  ),
  'SEC-EXP-001': hardcodedIp,
  'SEC-EXP-002': pattern(/\bhttps?:\/\/[^\s']+/i, { source: 'normalized' }),
  'SEC-FILE-001': pattern(
    /\bLOAD_FILE\s*\(|\bINTO\s+(?:OUT|DUMP)FILE\b|\bLOAD\s+DATA\s+(?:LOCAL\s+)?INFILE\b|\bpg_read_(?:binary_)?file\s*\(|\bCOPY\b.*\b(?:FROM|TO)\s+PROGRAM\b/i
  ),
  'SEC-CMD-001': pattern(/\b(?:xp_cmdshell|sp_OACreate)\b/i),

  // Compliance
  'COMP-PII-001': pattern(/[\w.%+-]+@[\w-]+(?:\.[\w-]+)*\.[A-Za-z]{2,}\b/, { source: 'normalized' }),
  'COMP-PII-002': pattern(
    /^SELECT\b(?:(?!\bFROM\b).)*\b(?:\w+\.)?(?:ssn|social_security\w*|credit_card\w*|card_number|cvv|tax_id|passport\w*|date_of_birth|dob)\b/i
  ),
  'COMP-PII-003': pattern(/^SELECT\b(?:(?!\bFROM\b).)*\b(?:\w+\.)?(?:password|passwd|password_hash|pwd)\b/i),
  'COMP-PII-004': pattern(/'\+?\d{0,3}[\s.-]?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}'/, { source: 'normalized' }),
  'COMP-AUDIT-001': pattern(
    /^(?:UPDATE|DELETE\s+FROM|TRUNCATE(?:\s+TABLE)?|DROP\s+TABLE(?:\s+IF\s+EXISTS)?)\s+(?:\w+\.)?(?:\w+_)?(?:audit|history|logs?)(?:_\w+)?\b/i
  ),
  'COMP-AUDIT-002': pattern(
    /\bSET\s+(?:GLOBAL\s+|SESSION\s+)?(?:sql_log_bin|general_log|log_statement)\s*=\s*(?:0|OFF\b|'none'|'off')|\bSET\s+UNLOGGED\b/i,
    { source: 'normalized' }
  )
}
