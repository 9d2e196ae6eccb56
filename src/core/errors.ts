/**
 * Base class for all errors raised by sqlscout
 */
export class SqlScoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SqlScoutError'
  }
}

/**
 * Raised in strict single-statement mode, or by a parser backend
 */
export class ParseError extends SqlScoutError {
  constructor(
    message: string,
    public readonly sql: string,
    public readonly details?: string
  ) {
    super(details ? `${message}: ${details}` : message)
    this.name = 'ParseError'
  }
}

export class DuplicateRuleError extends SqlScoutError {
  constructor(public readonly ruleId: string) {
    super(`Rule '${ruleId}' is already registered. Pass { replace: true } to override.`)
    this.name = 'DuplicateRuleError'
  }
}

export class UnsupportedDialectError extends SqlScoutError {
  constructor(public readonly dialect: string) {
    super(`Unsupported SQL dialect: ${dialect}`)
    this.name = 'UnsupportedDialectError'
  }
}

/**
 * Custom error for configuration loading failures
 */
export class ConfigLoadError extends SqlScoutError {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}
