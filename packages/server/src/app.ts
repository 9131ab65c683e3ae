import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { createLogger, errorMessage, type Logger, type RuleDeployer, type RuleManager } from '@rulehub/core'

import pkg from '../package.json'
import { HttpError, INTERNAL_ERROR_DETAIL, NOT_FOUND_DETAIL, type ErrorBody } from './errors'
import { deployRoutes } from './routes/deploy'
import { ruleRoutes } from './routes/rules'

export const API_PREFIX = '/api/v1'
export const SERVER_NAME = 'rulehub'

export interface ServerDeps {
  manager: RuleManager
  deployer: RuleDeployer
  logger?: Logger
}

function errorBody(detail: string): ErrorBody {
  return { detail }
}

export function buildServer({ manager, deployer, logger }: ServerDeps): FastifyInstance {
  const log = logger ?? createLogger('server')
  const app = Fastify({ logger: false })

  app.register(cors, { origin: '*' })

  app.addHook('onResponse', async (req, reply) => {
    const path = req.url.split('?')[0] ?? req.url
    const seconds = (reply.elapsedTime / 1000).toFixed(4)
    log.info(`${req.method} ${path} - ${reply.statusCode} - ${seconds}s`)
  })

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof HttpError) {
      return reply.code(err.statusCode).send(errorBody(err.detail))
    }
    if (err.validation) {
      return reply.code(400).send(errorBody(err.message))
    }
    // malformed JSON, unsupported media type, oversized body
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send(errorBody(err.message))
    }
    log.error(`Unhandled error on ${req.method} ${req.url}: ${errorMessage(err)}`, err)
    return reply.code(500).send(errorBody(INTERNAL_ERROR_DETAIL))
  })

  app.setNotFoundHandler((_req, reply) => reply.code(404).send(errorBody(NOT_FOUND_DETAIL)))

  app.get('/', async () => ({ name: SERVER_NAME, version: pkg.version, status: 'running' }))
  app.get('/health', async () => ({ status: 'healthy' }))

  app.register(ruleRoutes, { prefix: API_PREFIX, manager })
  app.register(deployRoutes, { prefix: API_PREFIX, manager, deployer })

  return app
}
