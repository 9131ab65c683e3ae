import {
  LOG_LEVELS,
  errorMessage,
  loadSettings,
  parseLogLevel,
  parseProviderName,
  type Settings,
} from '@rulehub/core'
import { listProviders } from '@rulehub/providers'
import { startServer } from '@rulehub/server'

import { fail, info, warn } from '../cli-utils'

export interface ServeCliOptions {
  host?: string
  port?: string
  logLevel?: string
  provider?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface RunningServer {
  close(): PromiseLike<unknown>
}

export interface ServeDeps {
  start?: (settings: Settings) => Promise<RunningServer>
  /** Defaults to closing on SIGINT/SIGTERM */
  onStarted?: (server: RunningServer) => void
}

function closeOnSignals(server: RunningServer) {
  const shutdown = (signal: NodeJS.Signals) => {
    info(`Received ${signal}, shutting down`)
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        fail(`Error while shutting down: ${errorMessage(e)}`)
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

/** Flags validated here; an invalid one is reported rather than silently defaulted. */
function flagsAsSettings(opts: ServeCliOptions): Partial<Settings> | string {
  const out: Partial<Settings> = {}
  if (opts.host) out.host = opts.host
  if (opts.port !== undefined) {
    const port = Number(opts.port)
    if (!Number.isInteger(port) || port < 0 || port > 65535) return `Invalid port: ${opts.port}`
    out.port = port
  }
  if (opts.logLevel !== undefined) {
    const level = parseLogLevel(opts.logLevel)
    if (!level) return `Invalid log level: ${opts.logLevel} (expected one of ${LOG_LEVELS.join(', ')})`
    out.logLevel = level
  }
  if (opts.provider !== undefined) {
    const provider = parseProviderName(opts.provider)
    if (!provider) return `Unknown provider "${opts.provider}". Available: ${listProviders().join(', ')}`
    out.provider = provider
  }
  return out
}

export async function serveCLI(opts: ServeCliOptions, deps: ServeDeps = {}): Promise<number> {
  const overrides = flagsAsSettings(opts)
  if (typeof overrides === 'string') {
    fail(overrides)
    return 1
  }

  const settings = loadSettings({ cwd: opts.cwd, env: opts.env, overrides })
  if (settings.provider === 'github' && !settings.githubToken) {
    warn('GITHUB_TOKEN is not set; using anonymous GitHub access (low rate limit)')
  }
  info(`Starting rule server on ${settings.host}:${settings.port}`)

  const start = deps.start ?? startServer
  const server = await start(settings)
  const onStarted = deps.onStarted ?? closeOnSignals
  onStarted(server)
  return 0
}
