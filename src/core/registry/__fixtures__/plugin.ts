import type { RulePlugin } from '../index.js'
import { BaseRule, type RuleContext } from '../../rules/base.js'
import type { Finding } from '../../../types/index.js'

class NoLockHintRule extends BaseRule {
  constructor() {
    super({
      id: 'TEAM-HINT-001',
      name: 'NOLOCK Hint',
      description: 'Dirty reads through the NOLOCK table hint',
      fix: 'Use snapshot isolation instead',
      impact: 'Reads uncommitted rows',
      severity: 'high',
      dimension: 'reliability',
      category: 'locking'
    })
  }

  check(context: RuleContext): Finding[] {
    return /\bNOLOCK\b/i.test(context.input.stripped) ? [this.report(context)] : []
  }
}

const plugin: RulePlugin = {
  name: 'team-rules',
  rules: () => [new NoLockHintRule()]
}

export default plugin
