export { BaseRule, createRuleContext, type Rule, type RuleContext } from './base.js'
export { PatternRule, patternRules } from './pattern-rule.js'
export {
  StructuralRule,
  GrantToPublicRule,
  DuplicateJoinTargetRule,
  MultiTableDmlRule,
  UnqualifiedDdlTableRule,
  structuralRules
} from './structural.js'
