import type { FastifyPluginAsync } from 'fastify'
import { KNOWN_TECHNOLOGIES, type FileContext, type Rule, type RuleManager, type RuleSet } from '@rulehub/core'

import { HttpError } from '../errors'
import {
  fileContextSchema,
  ruleParamsSchema,
  technologyParamsSchema,
  type RuleParams,
  type TechnologyParams,
} from '../schemas'

export interface RuleRoutesOptions {
  manager: RuleManager
}

export const ruleRoutes: FastifyPluginAsync<RuleRoutesOptions> = async (app, { manager }) => {
  app.get('/technologies', async (): Promise<string[]> => [...KNOWN_TECHNOLOGIES])

  app.get<{ Params: TechnologyParams }>(
    '/technologies/:technology/rules',
    { schema: { params: technologyParamsSchema } },
    async (req): Promise<RuleSet> => manager.getRulesForTechnology(req.params.technology),
  )

  app.get<{ Params: RuleParams }>(
    '/technologies/:technology/rules/:ruleId',
    { schema: { params: ruleParamsSchema } },
    async (req): Promise<Rule> => {
      const { technology, ruleId } = req.params
      const rule = await manager.getRuleById(ruleId, technology)
      if (!rule) throw new HttpError(404, `Rule ${ruleId} not found for ${technology}`)
      return rule
    },
  )

  app.post<{ Body: FileContext }>(
    '/context/rules',
    { schema: { body: fileContextSchema } },
    async (req): Promise<RuleSet> => manager.getRulesForFile(req.body),
  )
}
