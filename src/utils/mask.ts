/**
 * Masking utilities for sensitive information
 */

/**
 * Mask a secret value, showing only a prefix
 */
export function maskSecret(
  value: string,
  options: { prefixLength?: number; maskChar?: string } = {}
): string {
  const { prefixLength = 4, maskChar = '*' } = options

  if (value.length <= prefixLength + 4) {
    return maskChar.repeat(value.length)
  }

  const prefix = value.slice(0, prefixLength)
  const maskLength = Math.min(value.length - prefixLength, 8)

  return `${prefix}${maskChar.repeat(maskLength)}[MASKED]`
}

const QUOTED_LITERAL = /'((?:[^']|'')*)'/g

/**
 * Mask the contents of every single-quoted literal in a SQL fragment
 */
export function maskSecretLiterals(text: string): string {
  return text.replace(QUOTED_LITERAL, (_match, inner: string) => `'${maskSecret(inner, { prefixLength: 0 })}'`)
}

interface MaskableFinding {
  query: string
  location: { statementIndex: number }
  metadata?: { critical?: boolean; match?: string }
}

function maskFinding<T extends MaskableFinding>(finding: T): T {
  const match = finding.metadata?.match
  return {
    ...finding,
    query: maskSecretLiterals(finding.query),
    ...(finding.metadata && match !== undefined
      ? { metadata: { ...finding.metadata, match: maskSecretLiterals(match) } }
      : {})
  }
}

/**
 * Mask literals in every finding of a statement that has a finding flagged critical.
 * Findings must come from one analysis result.
 */
export function maskCriticalFindings<T extends MaskableFinding>(findings: readonly T[]): T[] {
  const flagged = new Set(
    findings.filter(finding => finding.metadata?.critical).map(finding => finding.location.statementIndex)
  )
  return findings.map(finding => (flagged.has(finding.location.statementIndex) ? maskFinding(finding) : finding))
}
