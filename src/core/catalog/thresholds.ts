import { z } from 'zod'

/**
 * Limits used by threshold-based detectors. A value equal to the limit
 * does not trigger; one above it does.
 */
export interface Thresholds {
  /** Largest OFFSET accepted */
  offsetMax: number
  /** Most values accepted in a literal IN list */
  inListMax: number
  /** Most JOINs accepted in a query without comments */
  joinCountMax: number
  /** Deepest accepted `(SELECT` nesting */
  subqueryDepthMax: number
  /** Longest accepted VARCHAR length */
  varcharLengthMax: number
  /** Longest accepted ENUM value list, in characters */
  enumBodyLengthMax: number
  /** Most GROUP BY columns accepted */
  groupByColumnsMax: number
}

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  offsetMax: 1000,
  inListMax: 50,
  joinCountMax: 2,
  subqueryDepthMax: 2,
  varcharLengthMax: 999,
  enumBodyLengthMax: 99,
  groupByColumnsMax: 3
})

const limit = z.number().int().nonnegative()

export const ThresholdsSchema = z
  .object({
    offsetMax: limit,
    inListMax: limit,
    joinCountMax: limit,
    subqueryDepthMax: limit,
    varcharLengthMax: limit,
    enumBodyLengthMax: limit,
    groupByColumnsMax: limit
  })
  .partial()
  .strict()

export function resolveThresholds(overrides: Partial<Thresholds> = {}): Thresholds {
  return { ...DEFAULT_THRESHOLDS, ...overrides }
}
