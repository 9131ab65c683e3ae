import type { FastifyPluginAsync } from 'fastify'
import type { DeployResult, RuleDeployer, RuleManager } from '@rulehub/core'

import { HttpError } from '../errors'
import { deployRequestSchema, type DeployRequest } from '../schemas'

export interface DeployRoutesOptions {
  manager: RuleManager
  deployer: RuleDeployer
}

export const deployRoutes: FastifyPluginAsync<DeployRoutesOptions> = async (app, { manager, deployer }) => {
  app.post<{ Body: DeployRequest }>(
    '/deploy',
    { schema: { body: deployRequestSchema } },
    async (req): Promise<DeployResult> => {
      const targetDir = req.body.target_dir
      const technology = req.body.technology || (await deployer.detectProjectType(targetDir))
      if (!technology) {
        throw new HttpError(400, 'Could not detect project type. Please specify technology parameter.')
      }

      const ruleset = await manager.getRulesForTechnology(technology)
      if (ruleset.rules.length === 0) {
        throw new HttpError(404, `No rules found for technology: ${technology}`)
      }

      if (!(await deployer.deployRules(targetDir, technology))) {
        throw new HttpError(500, `Failed to deploy rules to ${targetDir}`)
      }

      return { success: true, technology, rules_count: ruleset.total, target_dir: targetDir }
    },
  )
}
