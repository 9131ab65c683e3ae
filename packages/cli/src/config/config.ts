import fs from 'node:fs'
import path from 'node:path'

export const RC_FILE_NAME = '.rulehubrc.json'
export const DEFAULT_SERVER = 'http://localhost:8000'

export interface RulehubRc {
  server?: string
}

export interface ResolvedClientConfig {
  server: string
  /** Absolute path of the rc file that contributed, if any */
  rcPath: string | null
}

export interface LoadClientConfigOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** CLI flags; highest priority */
  flags?: RulehubRc
}

function readJsonSafe(p: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(p, 'utf8'))
  } catch {
    return null
  }
}

/** Nearest `.rulehubrc.json` from `startDir` up to the filesystem root */
export function findRc(startDir: string): string | null {
  let dir = path.resolve(startDir)
  while (true) {
    const candidate = path.join(dir, RC_FILE_NAME)
    if (fs.existsSync(candidate)) return candidate
    const parent = path.dirname(dir)
    if (parent === dir) return null
    dir = parent
  }
}

function asRc(raw: unknown): RulehubRc {
  if (typeof raw !== 'object' || raw === null || !('server' in raw)) return {}
  return typeof raw.server === 'string' && raw.server ? { server: raw.server } : {}
}

function envAsRc(env: NodeJS.ProcessEnv): RulehubRc {
  return env.RULEHUB_SERVER ? { server: env.RULEHUB_SERVER } : {}
}

/** defaults <- .rulehubrc.json <- RULEHUB_SERVER <- flags */
export function loadClientConfig(opts: LoadClientConfigOptions = {}): ResolvedClientConfig {
  const cwd = opts.cwd ?? process.cwd()
  const env = opts.env ?? process.env
  const rcPath = findRc(cwd)
  const fromRc = rcPath ? asRc(readJsonSafe(rcPath)) : {}

  const server = opts.flags?.server || envAsRc(env).server || fromRc.server || DEFAULT_SERVER
  return { server, rcPath }
}
