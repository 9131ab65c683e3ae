import fs from 'node:fs'
import path from 'node:path'

import { isSafePathSegment, listJsonFiles, pathExists, readJsonFile, writeJsonAtomic } from '../lib/fs'
import { createLogger, errorMessage, type Logger } from '../lib/log'
import type { IndexFile } from '../types'
import { detectProjectType } from './detect'

export const DEPLOY_DIR_NAME = '.cursor-rules'
export const INDEX_FILE_NAME = 'index.json'

export interface RuleDeployerOptions {
  /** Directory the rule manager persists into */
  rulesDir: string
  logger?: Logger
}

function isIndexFile(v: unknown): v is IndexFile {
  if (typeof v !== 'object' || v === null || !('technologies' in v)) return false
  const { technologies } = v
  return typeof technologies === 'object' && technologies !== null && !Array.isArray(technologies)
}

export class RuleDeployer {
  readonly rulesDir: string
  private readonly log: Logger

  constructor(opts: RuleDeployerOptions) {
    this.rulesDir = opts.rulesDir
    this.log = opts.logger ?? createLogger('deployer')
  }

  /**
   * Copy `<rulesDir>/<technology>/*.json` into
   * `<targetDir>/.cursor-rules/<technology>/` and merge the target's index.
   * Resolves to false when the technology was never fetched or anything
   * fails midway; files copied before a failure stay in place.
   */
  async deployRules(targetDir: string, technology: string): Promise<boolean> {
    if (!isSafePathSegment(technology)) {
      this.log.error(`Refusing to deploy unsafe technology name: ${JSON.stringify(technology)}`)
      return false
    }

    const sourceDir = path.join(this.rulesDir, technology)
    const targetRulesDir = path.join(targetDir, DEPLOY_DIR_NAME)
    this.log.info(`Deploying rules from ${sourceDir} to ${targetRulesDir}`)

    if (!(await pathExists(sourceDir))) {
      this.log.error(`Source rules directory doesn't exist: ${sourceDir}`)
      return false
    }

    try {
      const targetTechDir = path.join(targetRulesDir, technology)
      await fs.promises.mkdir(targetTechDir, { recursive: true })

      for (const file of await listJsonFiles(sourceDir)) {
        const from = path.join(sourceDir, file)
        const to = path.join(targetTechDir, file)
        await fs.promises.copyFile(from, to)
        this.log.debug(`Copied rule file: ${from} -> ${to}`)
      }

      await this.updateIndexFile(targetRulesDir, technology)

      this.log.info(`Successfully deployed rules to ${targetRulesDir}`)
      return true
    } catch (e) {
      this.log.error(`Error deploying rules to ${targetDir}: ${errorMessage(e)}`, e)
      return false
    }
  }

  detectProjectType(projectDir: string): Promise<string | null> {
    return detectProjectType(projectDir, this.log)
  }

  /**
   * Merge the entry for `technology` into `<rulesRoot>/index.json`, keeping
   * entries of other technologies. The entry lists the rule ids currently
   * present in `<rulesRoot>/<technology>/`.
   */
  async updateIndexFile(rulesRoot: string, technology: string): Promise<IndexFile> {
    const indexPath = path.join(rulesRoot, INDEX_FILE_NAME)
    let index: IndexFile = { technologies: {} }

    if (await pathExists(indexPath)) {
      try {
        const existing = await readJsonFile(indexPath)
        if (isIndexFile(existing)) index = existing
        else this.log.warn(`Ignoring malformed index file: ${indexPath}`)
      } catch (e) {
        this.log.warn(`Failed to read existing index file: ${errorMessage(e)}`)
      }
    }

    const techDir = path.join(rulesRoot, technology)
    if (await pathExists(techDir)) {
      const rules = (await listJsonFiles(techDir)).map((f) => f.slice(0, -'.json'.length))
      index.technologies[technology] = { rules, updated: true }
    }

    await writeJsonAtomic(indexPath, index)
    this.log.debug(`Updated index file at ${indexPath}`)
    return index
  }
}
