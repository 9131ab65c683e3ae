import {
  errorMessage,
  isRule,
  type DeployResult,
  type FileContext,
  type Rule,
  type RuleSet,
} from '@rulehub/core'

export const API_PREFIX = '/api/v1'

/** Network failure, non-2xx answer or a body of the wrong shape */
export class RuleServerError extends Error {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.name = 'RuleServerError'
    this.status = status
  }
}

export interface DeployRequest {
  target_dir: string
  technology?: string
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string')
}

function isRuleSet(v: unknown): v is RuleSet {
  return isRecord(v)
    && Array.isArray(v.rules) && v.rules.every(isRule)
    && typeof v.total === 'number'
    && typeof v.fetched_at === 'string'
}

function isDeployResult(v: unknown): v is DeployResult {
  return isRecord(v)
    && typeof v.success === 'boolean'
    && typeof v.technology === 'string'
    && typeof v.rules_count === 'number'
    && typeof v.target_dir === 'string'
}

/** `fetch failed` hides the useful part (ECONNREFUSED, ENOTFOUND) in `cause` */
function networkReason(e: unknown): string {
  if (e instanceof Error && e.cause instanceof Error) return `${e.message} (${e.cause.message})`
  return errorMessage(e)
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

async function failureReason(res: Response): Promise<string> {
  const body = parseJson(await res.text())
  const status = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`
  return isRecord(body) && typeof body.detail === 'string' ? `${status}: ${body.detail}` : status
}

export class RuleServerClient {
  readonly baseUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(baseUrl: string, fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '')
    this.fetchImpl = fetchImpl
  }

  async listTechnologies(): Promise<string[]> {
    return this.request('GET', '/technologies', undefined, isStringArray)
  }

  async getRulesForFile(ctx: FileContext): Promise<RuleSet> {
    return this.request('POST', '/context/rules', ctx, isRuleSet)
  }

  async getRule(technology: string, ruleId: string): Promise<Rule> {
    const p = `/technologies/${encodeURIComponent(technology)}/rules/${encodeURIComponent(ruleId)}`
    return this.request('GET', p, undefined, isRule)
  }

  async deploy(req: DeployRequest): Promise<DeployResult> {
    return this.request('POST', '/deploy', req, isDeployResult)
  }

  private async request<T>(
    method: 'GET' | 'POST',
    endpoint: string,
    body: unknown,
    guard: (v: unknown) => v is T,
  ): Promise<T> {
    const url = `${this.baseUrl}${API_PREFIX}${endpoint}`
    let res: Response
    try {
      const doFetch = this.fetchImpl
      res = await doFetch(url, {
        method,
        headers: body === undefined ? { accept: 'application/json' } : { accept: 'application/json', 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      })
    } catch (e) {
      throw new RuleServerError(networkReason(e))
    }

    if (!res.ok) throw new RuleServerError(await failureReason(res), res.status)

    let data: unknown
    try {
      data = await res.json()
    } catch (e) {
      throw new RuleServerError(`invalid JSON from ${method} ${endpoint}: ${errorMessage(e)}`, res.status)
    }
    if (!guard(data)) throw new RuleServerError(`unexpected response shape from ${method} ${endpoint}`, res.status)
    return data
  }
}
