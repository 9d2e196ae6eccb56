import { z } from 'zod'
import { SeveritySchema, compareSeverity } from '../taxonomy.js'
import { ThresholdsSchema } from '../catalog/thresholds.js'
import { resolveDialect } from '../dialect/index.js'

/**
 * Per-rule adjustment
 */
export const RuleConfigSchema = z
  .object({
    enabled: z.boolean().optional().describe('Run or skip this rule'),
    severity: SeveritySchema.optional().describe('Severity reported instead of the built-in one')
  })
  .strict()

export type RuleConfig = z.infer<typeof RuleConfigSchema>

/**
 * Exception pattern
 */
export const ExceptionSchema = z.object({
  pattern: z.string()
    .min(1, 'Pattern is required')
    .describe('Glob pattern to match files'),
  ignore: z.array(z.string())
    .min(1, 'At least one rule to ignore is required')
    .describe('Rule IDs to ignore for matched files'),
  reason: z.string()
    .optional()
    .describe('Explanation for this exception')
})

export type Exception = z.infer<typeof ExceptionSchema>

export const SeverityWeightsSchema = z
  .object({
    critical: z.number().nonnegative(),
    high: z.number().nonnegative(),
    medium: z.number().nonnegative(),
    low: z.number().nonnegative(),
    info: z.number().nonnegative()
  })
  .partial()
  .strict()

/**
 * Quality gate settings
 */
export const GateSchema = z
  .object({
    failOn: SeveritySchema.default('critical').describe('Lowest severity that fails the gate'),
    warnOn: SeveritySchema.default('high').describe('Lowest severity that warns'),
    weights: SeverityWeightsSchema.default({}).describe('Score deduction per finding by severity')
  })
  .refine(
    data => compareSeverity(data.warnOn, data.failOn) <= 0,
    { message: 'warnOn must not be more severe than failOn' }
  )

export type GateConfig = z.infer<typeof GateSchema>

const DialectNameSchema = z.string().refine(
  canResolve,
  name => ({ message: `Unsupported SQL dialect: ${name}` })
)

function canResolve(name: string): boolean {
  try {
    resolveDialect(name)
    return true
  } catch {
    return false
  }
}

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Configuration version in semver format'),

  name: z.string()
    .min(1, 'Config name is required')
    .max(50, 'Config name too long')
    .describe('Identifier shown in reports'),

  description: z.string()
    .optional(),

  extends: z.string()
    .optional()
    .describe('Base configuration to extend, relative to this file'),

  dialect: DialectNameSchema
    .optional()
    .describe('Dialect used when statements give no signal'),

  thresholds: ThresholdsSchema
    .default({})
    .describe('Limits for threshold-based rules'),

  rules: z.record(z.string(), RuleConfigSchema)
    .default({})
    .describe('Rule adjustments keyed by rule ID'),

  exceptions: z.array(ExceptionSchema)
    .default([])
    .describe('File-specific rule exceptions'),

  gate: GateSchema
    .default({}),

  plugins: z.array(z.string().min(1))
    .default([])
    .describe('Rule plugin modules, relative to this file'),

  parseTimeoutMs: z.number()
    .int()
    .positive()
    .optional()
    .describe('Parse time after which a statement counts as unparsed')
})

export type Config = z.infer<typeof ConfigSchema>

export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data)
}

export type ConfigValidation =
  | { success: true; data: Config }
  | { success: false; errors: z.ZodError }

/**
 * Validate configuration with detailed errors
 */
export function validateConfigSafe(data: unknown): ConfigValidation {
  const result = ConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return path ? `${path}: ${err.message}` : err.message
  })
}
