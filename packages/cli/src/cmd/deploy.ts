import path from 'node:path'
import { dim } from 'colorette'
import { DEPLOY_DIR_NAME } from '@rulehub/core'

import type { RuleServerClient } from '../api'
import { fail, info, ok, reportServerFailure } from '../cli-utils'

export interface DeployCliOptions {
  /** Relative paths resolve against `cwd`; the server gets an absolute one */
  target: string
  technology?: string
  cwd?: string
}

export async function deployCLI(client: RuleServerClient, opts: DeployCliOptions): Promise<number> {
  const targetDir = path.resolve(opts.cwd ?? process.cwd(), opts.target)
  info(`Deploying rules to ${opts.target}...`)

  try {
    const res = await client.deploy({
      target_dir: targetDir,
      ...(opts.technology ? { technology: opts.technology } : {}),
    })
    if (!res.success) {
      fail(`Failed to deploy rules to ${res.target_dir}`)
      return 1
    }
    ok(`Successfully deployed ${res.rules_count} rules for ${res.technology}.`)
    console.log('  ' + dim(path.join(res.target_dir, DEPLOY_DIR_NAME)))
    return 0
  } catch (e) {
    return reportServerFailure(e)
  }
}
