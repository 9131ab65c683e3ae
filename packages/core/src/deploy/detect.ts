import fs from 'node:fs'
import path from 'node:path'

import { pathExists } from '../lib/fs'
import { createLogger, errorMessage, type Logger } from '../lib/log'
import { PROJECT_MARKERS, fileExtension, technologyForExtension } from '../lib/technology'

/**
 * Count file extensions under `root`, top-down: a directory's files are
 * counted before its subdirectories are entered, both in name order.
 * Symlinks are not followed; unreadable directories are skipped.
 */
export async function countExtensions(root: string, log?: Logger): Promise<Map<string, number>> {
  const counts = new Map<string, number>()

  async function walk(dir: string) {
    let entries: fs.Dirent[]
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true })
    } catch (e) {
      log?.debug(`Skipping unreadable directory ${dir}: ${errorMessage(e)}`)
      return
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      if (!entry.isFile()) continue
      const ext = fileExtension(entry.name)
      if (ext !== null) counts.set(ext, (counts.get(ext) ?? 0) + 1)
    }
    for (const entry of entries) {
      if (entry.isDirectory()) await walk(path.join(dir, entry.name))
    }
  }

  await walk(root)
  return counts
}

/**
 * Best-effort guess of a project's main technology: the first marker file
 * found among its top-level entries, else the technology of the most
 * frequent mapped file extension (ties go to the first one counted).
 */
export async function detectProjectType(
  projectDir: string,
  log: Logger = createLogger('deployer'),
): Promise<string | null> {
  log.info(`Detecting project type for: ${projectDir}`)

  for (const [file, technology] of PROJECT_MARKERS) {
    if (await pathExists(path.join(projectDir, file))) {
      log.info(`Detected project type: ${technology} based on ${file}`)
      return technology
    }
  }

  const counts = await countExtensions(projectDir, log)
  let best: string | null = null
  let max = 0
  for (const [ext, count] of counts) {
    const technology = technologyForExtension(ext)
    if (technology && count > max) {
      best = technology
      max = count
    }
  }

  if (best) {
    log.info(`Detected project type: ${best} based on file extensions`)
    return best
  }
  log.info('Could not detect project type')
  return null
}
