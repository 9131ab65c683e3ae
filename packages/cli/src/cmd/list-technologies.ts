import type { RuleServerClient } from '../api'
import { info, printList, reportServerFailure } from '../cli-utils'

export async function listTechnologiesCLI(client: RuleServerClient): Promise<number> {
  info('Fetching available technologies...')
  try {
    const technologies = await client.listTechnologies()
    console.log('Available technologies:')
    printList(technologies)
    return 0
  } catch (e) {
    return reportServerFailure(e)
  }
}
