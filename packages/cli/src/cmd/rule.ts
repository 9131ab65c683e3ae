import type { RuleServerClient } from '../api'
import { reportServerFailure } from '../cli-utils'

export async function ruleCLI(client: RuleServerClient, technology: string, ruleId: string): Promise<number> {
  try {
    const rule = await client.getRule(technology, ruleId)
    console.log(JSON.stringify(rule, null, 2))
    return 0
  } catch (e) {
    return reportServerFailure(e)
  }
}
