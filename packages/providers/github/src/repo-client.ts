import { Octokit } from '@octokit/rest'

export interface RepoEntry {
  /** `file`, `dir`, `symlink` or `submodule` */
  type: string
  name: string
  /** Repository-relative */
  path: string
}

/** The slice of the GitHub contents API the provider needs */
export interface RepoClient {
  /** Rejects when the repository cannot be reached with the given credentials */
  verify(): Promise<void>
  /** `''` lists the repository root. Rejects when the path is missing or not a directory. */
  listDirectory(dirPath: string): Promise<RepoEntry[]>
  /** Decoded UTF-8 text of a file */
  readFile(filePath: string): Promise<string>
  /** Author date of the newest commit touching the path, or null when there is none */
  lastCommitDate(filePath: string): Promise<string | null>
}

export interface RepoClientOptions {
  owner: string
  repo: string
  /** Anonymous access when empty */
  token?: string
  /** Replaces global fetch for every request */
  fetch?: typeof fetch
}

export type RepoClientFactory = (opts: RepoClientOptions) => RepoClient

const USER_AGENT = 'rulehub'

export class OctokitRepoClient implements RepoClient {
  private readonly octokit: Octokit
  private readonly owner: string
  private readonly repo: string

  constructor(opts: RepoClientOptions) {
    this.owner = opts.owner
    this.repo = opts.repo
    this.octokit = new Octokit({
      userAgent: USER_AGENT,
      ...(opts.token ? { auth: opts.token } : {}),
      ...(opts.fetch ? { request: { fetch: opts.fetch } } : {}),
    })
  }

  async verify(): Promise<void> {
    await this.octokit.rest.repos.get({ owner: this.owner, repo: this.repo })
  }

  async listDirectory(dirPath: string): Promise<RepoEntry[]> {
    const { data } = await this.octokit.rest.repos.getContent({
      owner: this.owner,
      repo: this.repo,
      path: dirPath,
    })
    if (!Array.isArray(data)) throw new Error(`${dirPath || '/'} is not a directory`)
    return data.map((e) => ({ type: e.type, name: e.name, path: e.path }))
  }

  async readFile(filePath: string): Promise<string> {
    const { data } = await this.octokit.rest.repos.getContent({
      owner: this.owner,
      repo: this.repo,
      path: filePath,
    })
    if (Array.isArray(data) || !('content' in data) || typeof data.content !== 'string') {
      throw new Error(`${filePath} is not a file`)
    }
    if (data.encoding === 'base64') return Buffer.from(data.content, 'base64').toString('utf8')
    if (data.encoding === 'utf-8' || data.encoding === 'utf8') return data.content
    throw new Error(`${filePath}: unsupported content encoding "${data.encoding}"`)
  }

  async lastCommitDate(filePath: string): Promise<string | null> {
    const { data } = await this.octokit.rest.repos.listCommits({
      owner: this.owner,
      repo: this.repo,
      path: filePath,
      per_page: 1,
    })
    return data[0]?.commit.author?.date ?? null
  }
}

export const createOctokitClient: RepoClientFactory = (opts) => new OctokitRepoClient(opts)
