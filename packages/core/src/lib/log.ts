import { bold, cyan, dim, gray, magenta, red, yellow } from 'colorette'

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL'

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']

const rank: Record<LogLevel, number> = {
  DEBUG: 10, INFO: 20, WARNING: 30, ERROR: 40, CRITICAL: 50,
}

const paint: Record<LogLevel, (s: string) => string> = {
  DEBUG: gray,
  INFO: cyan,
  WARNING: yellow,
  ERROR: red,
  CRITICAL: (s) => bold(magenta(s)),
}

export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string, err?: unknown): void
  critical(msg: string, err?: unknown): void
}

let currentLevel: LogLevel = 'INFO'

export function setLogLevel(level: LogLevel) {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

/** Case-insensitive; accepts `WARN` as an alias. Null for anything else. */
export function parseLogLevel(v: unknown): LogLevel | null {
  if (typeof v !== 'string') return null
  const key = v.trim().toUpperCase()
  if (key === 'WARN') return 'WARNING'
  return LOG_LEVELS.find((l) => l === key) ?? null
}

export function isLevelEnabled(level: LogLevel): boolean {
  return rank[level] >= rank[currentLevel]
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function write(level: LogLevel, scope: string, msg: string, err?: unknown) {
  if (!isLevelEnabled(level)) return
  const time = new Date().toISOString().slice(11, 19)
  let line = `${dim(time)} ${paint[level](level)} ${scope}: ${msg}`
  if (err instanceof Error && err.stack && isLevelEnabled('DEBUG')) {
    line += '\n' + dim(err.stack)
  }
  if (level === 'DEBUG' || level === 'INFO') console.log(line)
  else if (level === 'WARNING') console.warn(line)
  else console.error(line)
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg) => write('DEBUG', scope, msg),
    info: (msg) => write('INFO', scope, msg),
    warn: (msg) => write('WARNING', scope, msg),
    error: (msg, err) => write('ERROR', scope, msg, err),
    critical: (msg, err) => write('CRITICAL', scope, msg, err),
  }
}

export interface LogRecord {
  level: LogLevel
  msg: string
}

/** Collects records in memory instead of printing; ignores the global level. */
export function createMemoryLogger(): Logger & { records: LogRecord[]; messages(level?: LogLevel): string[] } {
  const records: LogRecord[] = []
  const push = (level: LogLevel) => (msg: string) => {
    records.push({ level, msg })
  }
  return {
    records,
    messages: (level) => records.filter((r) => !level || r.level === level).map((r) => r.msg),
    debug: push('DEBUG'),
    info: push('INFO'),
    warn: push('WARNING'),
    error: push('ERROR'),
    critical: push('CRITICAL'),
  }
}
