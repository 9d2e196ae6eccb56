import { z } from 'zod'
import { DimensionSchema, SeveritySchema } from '../taxonomy.js'
import rulesJson from './rules.json' with { type: 'json' }

/**
 * Static description of one rule
 */
export const RuleMetadataSchema = z.object({
  id: z.string().regex(/^[A-Z]+(?:-[A-Z0-9]+)+$/, 'Rule ids look like PERF-SCAN-001'),
  name: z.string().min(1),
  description: z.string().min(1),
  fix: z.string().min(1),
  impact: z.string().min(1),
  severity: SeveritySchema,
  dimension: DimensionSchema,
  category: z.string().min(1).optional()
})

export type RuleMetadata = z.infer<typeof RuleMetadataSchema>

export const RuleCatalogSchema = z
  .array(RuleMetadataSchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>()
    entries.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate rule id ${entry.id}`
        })
      }
      seen.add(entry.id)
    })
  })

let builtin: readonly RuleMetadata[] | undefined

/**
 * Built-in rule metadata in catalog order, validated on first use
 */
export function builtinRuleMetadata(): readonly RuleMetadata[] {
  if (!builtin) {
    builtin = Object.freeze(RuleCatalogSchema.parse(rulesJson).map((entry) => Object.freeze(entry)))
  }
  return builtin
}
