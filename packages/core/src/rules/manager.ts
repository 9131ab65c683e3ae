import path from 'node:path'

import { TtlCache } from '../cache/ttl-cache'
import { isSafePathSegment, writeJsonAtomic } from '../lib/fs'
import { createLogger, errorMessage, type Logger } from '../lib/log'
import { DEFAULT_TECHNOLOGY, fileExtension, technologyForExtension } from '../lib/technology'
import { buildRuleSet, type FileContext, type Rule, type RuleProvider, type RuleSet } from '../types'

export interface RuleManagerOptions {
  provider: RuleProvider
  /** Absolute directory that receives `<technology>/<rule_id>.json` */
  rulesDir: string
  ttlSeconds: number
  /** Epoch millis; injectable for tests */
  now?: () => number
  logger?: Logger
}

export interface CacheInfo {
  fetchedAt: Date
  fresh: boolean
}

/**
 * `project_type` wins; otherwise the explicit `file_type`, otherwise the
 * extension of `file_path`.
 */
export function resolveTechnology(ctx: FileContext): string {
  if (ctx.project_type) return ctx.project_type
  const fileType = ctx.file_type || fileExtension(ctx.file_path)
  return technologyForExtension(fileType) ?? DEFAULT_TECHNOLOGY
}

export class RuleManager {
  readonly rulesDir: string
  private readonly provider: RuleProvider
  private readonly cache: TtlCache<string, RuleSet>
  private readonly now: () => number
  private readonly log: Logger

  constructor(opts: RuleManagerOptions) {
    this.provider = opts.provider
    this.rulesDir = opts.rulesDir
    this.now = opts.now ?? Date.now
    this.log = opts.logger ?? createLogger('rule-manager')
    this.cache = new TtlCache<string, RuleSet>({ ttlMs: opts.ttlSeconds * 1000, now: this.now })
    this.log.info(`Initialized rule manager (provider=${this.provider.name}, ttl=${opts.ttlSeconds}s, rules dir=${this.rulesDir})`)
  }

  async getRulesForTechnology(technology: string): Promise<RuleSet> {
    this.log.debug(`Getting rules for technology: ${technology}`)

    const cached = this.cache.getFresh(technology)
    if (cached) {
      this.log.debug(`Cache hit for technology: ${technology}`)
      return cached
    }
    return this.cache.getOrLoad(
      technology,
      () => this.fetchAndStore(technology),
      (ruleset) => Date.parse(ruleset.fetched_at),
    )
  }

  async getRulesForFile(ctx: FileContext): Promise<RuleSet> {
    this.log.info(`Getting rules for file: ${ctx.file_path}`)
    return this.getRulesForTechnology(resolveTechnology(ctx))
  }

  async getRuleById(ruleId: string, technology: string): Promise<Rule | null> {
    const ruleset = await this.getRulesForTechnology(technology)
    return ruleset.rules.find((r) => r.id === ruleId) ?? null
  }

  inspect(technology: string): CacheInfo | null {
    const entry = this.cache.peek(technology)
    if (!entry) return null
    return { fetchedAt: new Date(entry.storedAt), fresh: this.cache.isFresh(entry) }
  }

  private async fetchAndStore(technology: string): Promise<RuleSet> {
    const rules = await this.provider.fetchRules(technology)
    const ruleset = buildRuleSet(rules, new Date(this.now()))
    await this.saveRulesLocally(technology, ruleset)
    return ruleset
  }

  /** Best-effort: a rule that cannot be written is logged and skipped. */
  private async saveRulesLocally(technology: string, ruleset: RuleSet): Promise<void> {
    if (!isSafePathSegment(technology)) {
      this.log.warn(`Not saving rules locally for unsafe technology name: ${JSON.stringify(technology)}`)
      return
    }
    const techDir = path.join(this.rulesDir, technology)

    for (const rule of ruleset.rules) {
      if (!isSafePathSegment(rule.id)) {
        this.log.error(`Error saving rule ${JSON.stringify(rule.id)}: id is not a valid file name`)
        continue
      }
      const rulePath = path.join(techDir, `${rule.id}.json`)
      try {
        await writeJsonAtomic(rulePath, rule)
        this.log.debug(`Saved rule to ${rulePath}`)
      } catch (e) {
        this.log.error(`Error saving rule ${rule.id} to ${rulePath}: ${errorMessage(e)}`, e)
      }
    }
  }
}
