import {
  createLogger,
  errorMessage,
  parseRepository,
  parseRule,
  type Logger,
} from '@rulehub/core'
import { mockProvider } from '@rulehub/provider-mock'
import type { Rule, RuleProvider } from '@rulehub/provider-types'

import { createOctokitClient, type RepoClient, type RepoClientFactory, type RepoEntry } from './repo-client'

export * from './repo-client'

/**
 * `pending` until the first fetch opens the connection; `degraded` is final
 * and routes every fetch to the fallback provider.
 */
export type ConnectionState =
  | { mode: 'pending' }
  | { mode: 'connected'; client: RepoClient }
  | { mode: 'degraded'; reason: string }

export interface GitHubProviderOptions {
  /** `owner/name` */
  repository: string
  token?: string
  /** Directory holding one sub-directory of `<id>.json` files per technology */
  rulesRoot?: string
  createClient?: RepoClientFactory
  /** Serves rules when the repository cannot be used; mock rules by default */
  fallback?: RuleProvider
  logger?: Logger
}

export class GitHubRuleProvider implements RuleProvider {
  readonly name = 'github'
  private state: ConnectionState = { mode: 'pending' }
  private connecting: Promise<ConnectionState> | null = null

  private readonly repository: string
  private readonly token: string
  private readonly rulesRoot: string
  private readonly createClient: RepoClientFactory
  private readonly fallback: RuleProvider
  private readonly log: Logger

  constructor(opts: GitHubProviderOptions) {
    this.repository = opts.repository
    this.token = opts.token ?? ''
    this.rulesRoot = opts.rulesRoot ?? 'rules'
    this.createClient = opts.createClient ?? createOctokitClient
    this.fallback = opts.fallback ?? mockProvider
    this.log = opts.logger ?? createLogger('provider-github')
  }

  get mode(): ConnectionState['mode'] {
    return this.state.mode
  }

  async fetchRules(technology: string): Promise<Rule[]> {
    this.log.info(`Fetching rules for technology: ${technology}`)
    const state = await this.connect()
    if (state.mode !== 'connected') {
      this.log.debug(`Repository unavailable (${state.mode}), serving ${this.fallback.name} rules for ${technology}`)
      return this.fallback.fetchRules(technology)
    }

    try {
      const rules = await this.fetchFromRepository(state.client, technology)
      this.log.info(`Fetched ${rules.length} rules for ${technology}`)
      return rules
    } catch (e) {
      this.log.error(`Error fetching rules for ${technology}: ${errorMessage(e)}`, e)
      return this.fallback.fetchRules(technology)
    }
  }

  /** Opens the connection once; concurrent callers share the attempt. */
  connect(): Promise<ConnectionState> {
    if (this.state.mode !== 'pending') return Promise.resolve(this.state)
    if (!this.connecting) {
      this.connecting = this.openConnection().then((state) => {
        this.state = state
        return state
      })
    }
    return this.connecting
  }

  private async openConnection(): Promise<ConnectionState> {
    try {
      const target = parseRepository(this.repository)
      if (!target) {
        throw new Error(`invalid repository "${this.repository}", expected owner/name`)
      }
      this.log.info(this.token ? 'Using authenticated GitHub access' : 'Using anonymous GitHub access')
      const client = this.createClient({ ...target, token: this.token || undefined })
      await client.verify()
      this.log.info(`Successfully connected to repository: ${this.repository}`)
      return { mode: 'connected', client }
    } catch (e) {
      const reason = errorMessage(e)
      this.log.warn(`Failed to connect to GitHub repository ${this.repository}: ${reason}`)
      this.log.warn(`Falling back to ${this.fallback.name} rules`)
      return { mode: 'degraded', reason }
    }
  }

  private async fetchFromRepository(client: RepoClient, technology: string): Promise<Rule[]> {
    const dir = `${this.rulesRoot}/${technology}`
    let entries: RepoEntry[]
    try {
      entries = await client.listDirectory(dir)
    } catch (e) {
      this.log.warn(`Path ${dir} not found in repository: ${errorMessage(e)}`)
      this.log.info('Listing repository root instead')
      entries = await client.listDirectory('')
    }

    const rules: Rule[] = []
    for (const entry of entries) {
      if (entry.type !== 'file' || !entry.name.endsWith('.json')) continue
      const rule = await this.readRule(client, entry, technology)
      if (rule) rules.push(rule)
    }
    return rules
  }

  /** Null (logged) when the file cannot be read, parsed or validated */
  private async readRule(client: RepoClient, entry: RepoEntry, technology: string): Promise<Rule | null> {
    try {
      const raw: unknown = JSON.parse(await client.readFile(entry.path))
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('expected a JSON object')
      }
      const data: Record<string, unknown> = { ...raw }
      if (!('id' in data)) data.id = entry.name.slice(0, -'.json'.length)
      if (!('technology' in data)) data.technology = technology
      if (data.updated_at === undefined || data.updated_at === null) {
        delete data.updated_at
        const date = await this.lastCommitDate(client, entry.path)
        if (date) data.updated_at = date
      }
      return parseRule(data)
    } catch (e) {
      this.log.error(`Error parsing rule from ${entry.path}: ${errorMessage(e)}`)
      return null
    }
  }

  private async lastCommitDate(client: RepoClient, filePath: string): Promise<string | null> {
    try {
      return await client.lastCommitDate(filePath)
    } catch (e) {
      this.log.warn(`Could not read commit history for ${filePath}: ${errorMessage(e)}`)
      return null
    }
  }
}

export function createGitHubProvider(opts: GitHubProviderOptions): GitHubRuleProvider {
  return new GitHubRuleProvider(opts)
}

export default createGitHubProvider
