/**
 * Normalization of statement text for pattern matching.
 *
 * Comments are removed (comment markers inside quoted literals and quoted
 * identifiers are kept), every whitespace run becomes a single space and the
 * result is trimmed. Normalizing already-normalized text returns it unchanged.
 */

const QUOTE_CLOSERS: Record<string, string> = {
  "'": "'",
  '"': '"',
  '`': '`'
}

export function normalizeSql(sql: string): string {
  let out = ''
  let quote: string | null = null
  let i = 0

  while (i < sql.length) {
    const ch = sql[i]
    const next = sql[i + 1]

    if (quote) {
      out += ch
      if (ch === '\\' && next !== undefined) {
        out += next
        i += 2
        continue
      }
      if (ch === quote) {
        if (next === quote) {
          out += next
          i += 2
          continue
        }
        quote = null
      }
      i++
      continue
    }

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i + 2)
      out += ' '
      if (end === -1) break
      i = end
      continue
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2)
      out += ' '
      if (end === -1) break
      i = end + 2
      continue
    }

    if (ch in QUOTE_CLOSERS) {
      quote = QUOTE_CLOSERS[ch]
    }
    out += ch
    i++
  }

  return out.replace(/\s+/g, ' ').trim()
}

/**
 * Remove the contents of quoted string literals, keeping the quotes.
 * Used by detectors that must not look inside literals.
 */
export function stripLiterals(normalized: string): string {
  return normalized.replace(/'(?:[^'\\]|\\.|'')*'/g, "''")
}

/**
 * Check whether the raw statement text carries a comment
 */
export function hasComment(raw: string): boolean {
  return normalizeSql(raw) !== raw.replace(/\s+/g, ' ').trim()
}
