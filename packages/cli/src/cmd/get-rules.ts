import { fileExtension, type FileContext } from '@rulehub/core'

import type { RuleServerClient } from '../api'
import { formatRuleLine, info, reportServerFailure } from '../cli-utils'

export interface GetRulesCliOptions {
  file: string
  projectType?: string
}

export async function getRulesCLI(client: RuleServerClient, opts: GetRulesCliOptions): Promise<number> {
  const ctx: FileContext = { file_path: opts.file, project_type: opts.projectType ?? null }
  const ext = fileExtension(opts.file)
  if (ext) ctx.file_type = ext

  info(`Getting rules for ${opts.file}...`)
  try {
    const res = await client.getRulesForFile(ctx)
    console.log(`Found ${res.total} rules:`)
    for (const rule of res.rules) console.log(formatRuleLine(rule))
    return 0
  } catch (e) {
    return reportServerFailure(e)
  }
}
