import fs from 'node:fs'
import path from 'node:path'

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p)
    return true
  } catch {
    return false
  }
}

/** Parsed but unchecked; narrow the result before use */
export async function readJsonFile(file: string): Promise<unknown> {
  const raw = await fs.promises.readFile(file, 'utf8')
  return JSON.parse(raw)
}

/** Pretty JSON via temp file + rename; creates parent dirs */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true })
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`
  await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf8')
  try {
    await fs.promises.rename(tmp, file)
  } catch (e) {
    await fs.promises.rm(tmp, { force: true })
    throw e
  }
}

/** Names of regular `*.json` files directly inside `dir`, sorted */
export async function listJsonFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true })
  return entries
    .filter((e) => e.isFile() && e.name.endsWith('.json'))
    .map((e) => e.name)
    .sort()
}

/**
 * A single path segment that cannot climb out of its parent:
 * non-empty, no separators, not `.` or `..`.
 */
export function isSafePathSegment(name: string): boolean {
  if (!name || name === '.' || name === '..') return false
  return !name.includes('/') && !name.includes('\\') && !name.includes('\0')
}
