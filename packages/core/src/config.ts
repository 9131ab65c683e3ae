import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'

import { parseLogLevel, type LogLevel } from './lib/log'

export type ProviderName = 'github' | 'mock'

export const PROVIDER_NAMES: readonly ProviderName[] = ['github', 'mock']

export interface Settings {
  /** Empty → anonymous GitHub access */
  githubToken: string
  /** `owner/name` */
  githubRepository: string
  cacheTtlSeconds: number
  /** Absolute */
  rulesLocalPath: string
  host: string
  port: number
  logLevel: LogLevel
  provider: ProviderName
}

export interface LoadSettingsOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Defaults to `<cwd>/rulehub.config.yml` */
  configFile?: string
  /** Highest priority (CLI flags) */
  overrides?: Partial<Settings>
}

export const CONFIG_FILE_NAME = 'rulehub.config.yml'

/**
 * Defaults applied when neither the config file nor the environment set a value.
 * `rulesLocalPath` is relative here and absolutized against cwd.
 */
export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  githubToken: '',
  githubRepository: 'rulehub-dev/rules',
  cacheTtlSeconds: 3600,
  rulesLocalPath: './rules',
  host: '0.0.0.0',
  port: 8000,
  logLevel: 'INFO',
  provider: 'github',
})

function readYamlSafe(file: string): unknown {
  try {
    return parseYaml(fs.readFileSync(file, 'utf8'))
  } catch {
    return undefined
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function ensureString(v: unknown): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined
}

function ensureTtl(v: unknown): number | undefined {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v
  return typeof n === 'number' && Number.isFinite(n) && n >= 0 ? n : undefined
}

function ensurePort(v: unknown): number | undefined {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 && n <= 65535 ? n : undefined
}

export function parseProviderName(v: unknown): ProviderName | undefined {
  if (typeof v !== 'string') return undefined
  const key = v.trim().toLowerCase()
  return PROVIDER_NAMES.find((p) => p === key)
}

/** tiny helper: keep only the keys that are defined */
function pickDefined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {}
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key]
  }
  return out
}

function fileAsSettings(raw: unknown): Partial<Settings> {
  if (!isRecord(raw)) return {}
  const github = isRecord(raw.github) ? raw.github : {}
  const cache = isRecord(raw.cache) ? raw.cache : {}
  const rules = isRecord(raw.rules) ? raw.rules : {}
  const server = isRecord(raw.server) ? raw.server : {}

  return pickDefined({
    githubToken: ensureString(github.token),
    githubRepository: ensureString(github.repository),
    cacheTtlSeconds: ensureTtl(cache.ttlSeconds),
    rulesLocalPath: ensureString(rules.localPath),
    host: ensureString(server.host),
    port: ensurePort(server.port),
    logLevel: parseLogLevel(raw.logLevel) ?? undefined,
    provider: parseProviderName(raw.provider),
  })
}

/** ENV → settings */
function envAsSettings(env: NodeJS.ProcessEnv): Partial<Settings> {
  return pickDefined({
    githubToken: ensureString(env.GITHUB_TOKEN),
    githubRepository: ensureString(env.GITHUB_REPOSITORY),
    cacheTtlSeconds: ensureTtl(env.RULES_CACHE_TTL),
    rulesLocalPath: ensureString(env.RULES_LOCAL_PATH),
    host: ensureString(env.API_HOST),
    port: ensurePort(env.API_PORT),
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? undefined,
    provider: parseProviderName(env.RULEHUB_PROVIDER),
  })
}

/**
 * Public loader: defaults <- rulehub.config.yml <- env <- overrides.
 * Invalid values at any layer are ignored rather than rejected.
 */
export function loadSettings(opts: LoadSettingsOptions = {}): Settings {
  const cwd = opts.cwd ?? process.cwd()
  const env = opts.env ?? process.env
  const configPath = opts.configFile
    ? path.resolve(cwd, opts.configFile)
    : path.join(cwd, CONFIG_FILE_NAME)

  const merged: Settings = {
    ...DEFAULT_SETTINGS,
    ...fileAsSettings(readYamlSafe(configPath)),
    ...envAsSettings(env),
    ...pickDefined(opts.overrides ?? {}),
  }

  return {
    ...merged,
    rulesLocalPath: path.resolve(cwd, merged.rulesLocalPath),
  }
}

/** Split `owner/name`; null when the identifier is malformed */
export function parseRepository(id: string): { owner: string; repo: string } | null {
  const m = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/.exec(id.trim())
  if (!m || !m[1] || !m[2]) return null
  return { owner: m[1], repo: m[2] }
}
