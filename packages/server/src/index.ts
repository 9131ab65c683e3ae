import type { FastifyInstance } from 'fastify'
import { RuleDeployer, RuleManager, createLogger, setLogLevel, type Settings } from '@rulehub/core'
import { pickProvider } from '@rulehub/providers'
import type { RuleProvider } from '@rulehub/provider-types'

import { buildServer } from './app'

export * from './app'
export * from './errors'
export * from './schemas'

export interface StartServerOptions {
  /** Overrides the provider named in settings */
  provider?: RuleProvider
}

/** Wire settings into services and listen on `settings.host:settings.port`. */
export async function startServer(settings: Settings, opts: StartServerOptions = {}): Promise<FastifyInstance> {
  setLogLevel(settings.logLevel)
  const log = createLogger('server')

  const provider = opts.provider ?? pickProvider(settings)
  const manager = new RuleManager({
    provider,
    rulesDir: settings.rulesLocalPath,
    ttlSeconds: settings.cacheTtlSeconds,
  })
  const deployer = new RuleDeployer({ rulesDir: settings.rulesLocalPath })

  const app = buildServer({ manager, deployer, logger: log })
  await app.listen({ host: settings.host, port: settings.port })
  log.info(`Rule server listening on http://${settings.host}:${settings.port} (provider: ${provider.name})`)
  return app
}
