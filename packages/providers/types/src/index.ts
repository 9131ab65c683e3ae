import { technologyForFile } from '@rulehub/core'
import type { Rule, RuleProvider } from '@rulehub/core'

export type { Rule, RuleProvider } from '@rulehub/core'

/** Technology is taken from the path's extension (`general` when unmapped). */
export function fetchRulesForFile(provider: RuleProvider, filePath: string): Promise<Rule[]> {
  return provider.fetchRules(technologyForFile(filePath))
}

/** Deep copies, so callers can mutate what a provider hands out */
export function cloneRules(rules: readonly Rule[]): Rule[] {
  return rules.map((r) => structuredClone(r))
}
