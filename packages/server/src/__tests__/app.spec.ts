import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest'
import {
  KNOWN_TECHNOLOGIES,
  RuleDeployer,
  RuleManager,
  createMemoryLogger,
  type Rule,
  type RuleProvider,
} from '@rulehub/core'

import { buildServer } from '../app'
import { INTERNAL_ERROR_DETAIL } from '../errors'

const rule = (technology: string, id: string, patterns: string[]): Rule => ({
  id,
  technology,
  file_patterns: patterns,
  content: { linter: `${technology}-lint` },
  version: '1.0.0',
})

const RULES: Record<string, Rule[]> = {
  python: [rule('python', 'py-a', ['*.py']), rule('python', 'py-b', ['*.py'])],
  javascript: [rule('javascript', 'js-a', ['*.js'])],
  typescript: [rule('typescript', 'ts-a', ['*.ts'])],
}

describe('rule server', () => {
  let root: string
  let rulesDir: string
  let fetchRules: Mock<(technology: string) => Promise<Rule[]>>
  let logger: ReturnType<typeof createMemoryLogger>

  function makeApp() {
    const provider: RuleProvider = { name: 'fake', fetchRules }
    const silent = createMemoryLogger()
    const manager = new RuleManager({ provider, rulesDir, ttlSeconds: 60, logger: silent })
    const deployer = new RuleDeployer({ rulesDir, logger: silent })
    return buildServer({ manager, deployer, logger })
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rulehub-server-'))
    rulesDir = path.join(root, 'rules')
    fetchRules = vi.fn(async (technology: string) => RULES[technology] ?? [])
    logger = createMemoryLogger()
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  it('reports name, version and health', async () => {
    const app = makeApp()

    const index = await app.inject({ method: 'GET', url: '/' })
    expect(index.statusCode).toBe(200)
    expect(index.json()).toEqual({ name: 'rulehub', version: '0.1.0', status: 'running' })

    const health = await app.inject({ method: 'GET', url: '/health' })
    expect(health.json()).toEqual({ status: 'healthy' })
    await app.close()
  })

  it('lists the known technologies', async () => {
    const app = makeApp()
    const res = await app.inject({ method: 'GET', url: '/api/v1/technologies' })
    expect(res.json()).toEqual([...KNOWN_TECHNOLOGIES])
    await app.close()
  })

  it('serves a technology rule set and persists it', async () => {
    const app = makeApp()

    const res = await app.inject({ method: 'GET', url: '/api/v1/technologies/python/rules' })

    expect(res.statusCode).toBe(200)
    const body = res.json()
    expect(body.total).toBe(2)
    expect(body.rules.map((r: Rule) => r.id)).toEqual(['py-a', 'py-b'])
    expect(typeof body.fetched_at).toBe('string')
    expect(fs.existsSync(path.join(rulesDir, 'python', 'py-a.json'))).toBe(true)
    await app.close()
  })

  it('serves one rule by id or 404s', async () => {
    const app = makeApp()

    const hit = await app.inject({ method: 'GET', url: '/api/v1/technologies/python/rules/py-b' })
    expect(hit.statusCode).toBe(200)
    expect(hit.json()).toEqual(RULES.python?.[1])

    const miss = await app.inject({ method: 'GET', url: '/api/v1/technologies/python/rules/nope' })
    expect(miss.statusCode).toBe(404)
    expect(miss.json()).toEqual({ detail: 'Rule nope not found for python' })
    expect(fetchRules).toHaveBeenCalledTimes(1)
    await app.close()
  })

  it('rejects path parameters that are not plain names', async () => {
    const app = makeApp()

    const res = await app.inject({ method: 'GET', url: '/api/v1/technologies/-python/rules' })

    expect(res.statusCode).toBe(400)
    expect(res.json().detail).toMatch(/^params\/technology must match pattern/)
    expect(fetchRules).not.toHaveBeenCalled()
    await app.close()
  })

  it('resolves rules for a file context', async () => {
    const app = makeApp()

    const byExt = await app.inject({ method: 'POST', url: '/api/v1/context/rules', payload: { file_path: 'src/app.ts' } })
    expect(byExt.json().rules.map((r: Rule) => r.id)).toEqual(['ts-a'])

    const byProject = await app.inject({
      method: 'POST',
      url: '/api/v1/context/rules',
      payload: { file_path: 'src/app.ts', file_type: null, project_type: 'python' },
    })
    expect(byProject.json().total).toBe(2)

    const unknown = await app.inject({ method: 'POST', url: '/api/v1/context/rules', payload: { file_path: 'README' } })
    expect(unknown.json().total).toBe(0)
    expect(fetchRules.mock.calls).toEqual([['typescript'], ['python'], ['general']])
    await app.close()
  })

  it('resolves an unmapped file_type to the general set', async () => {
    const app = makeApp()

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/context/rules',
      payload: { file_path: './Makefile', file_type: '/Makefile' },
    })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({ rules: [], total: 0 })
    expect(fetchRules.mock.calls).toEqual([['general']])
    await app.close()
  })

  it('still rejects a project_type that is not a plain name', async () => {
    const app = makeApp()

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/context/rules',
      payload: { file_path: 'a.py', project_type: '../python' },
    })

    expect(res.statusCode).toBe(400)
    expect(res.json().detail).toMatch(/^body\/project_type must match pattern/)
    expect(fetchRules).not.toHaveBeenCalled()
    await app.close()
  })

  it('answers 400 for a context without file_path', async () => {
    const app = makeApp()
    const res = await app.inject({ method: 'POST', url: '/api/v1/context/rules', payload: { file_type: 'py' } })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ detail: "body must have required property 'file_path'" })
    await app.close()
  })

  describe('deploy', () => {
    it('deploys an explicit technology', async () => {
      const app = makeApp()
      const target = path.join(root, 'project')
      fs.mkdirSync(target)

      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/deploy',
        payload: { target_dir: target, technology: 'python' },
      })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({ success: true, technology: 'python', rules_count: 2, target_dir: target })
      expect(fs.readdirSync(path.join(target, '.cursor-rules', 'python')).sort()).toEqual(['py-a.json', 'py-b.json'])
      expect(JSON.parse(fs.readFileSync(path.join(target, '.cursor-rules', 'index.json'), 'utf8'))).toEqual({
        technologies: { python: { rules: ['py-a', 'py-b'], updated: true } },
      })
      await app.close()
    })

    it('detects the technology from project markers', async () => {
      const app = makeApp()
      const target = path.join(root, 'web')
      fs.mkdirSync(target)
      fs.writeFileSync(path.join(target, 'package.json'), '{}')

      const res = await app.inject({ method: 'POST', url: '/api/v1/deploy', payload: { target_dir: target } })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({ success: true, technology: 'javascript', rules_count: 1, target_dir: target })
      await app.close()
    })

    it('asks for a technology when none can be detected', async () => {
      const app = makeApp()
      const target = path.join(root, 'empty')
      fs.mkdirSync(target)

      const res = await app.inject({ method: 'POST', url: '/api/v1/deploy', payload: { target_dir: target } })

      expect(res.statusCode).toBe(400)
      expect(res.json()).toEqual({ detail: 'Could not detect project type. Please specify technology parameter.' })
      await app.close()
    })

    it('404s when the technology has no rules', async () => {
      const app = makeApp()
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/deploy',
        payload: { target_dir: root, technology: 'cobol' },
      })
      expect(res.statusCode).toBe(404)
      expect(res.json()).toEqual({ detail: 'No rules found for technology: cobol' })
      await app.close()
    })

    it('500s with the target when copying fails', async () => {
      const app = makeApp()
      const target = path.join(root, 'not-a-dir')
      fs.writeFileSync(target, 'plain file')

      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/deploy',
        payload: { target_dir: target, technology: 'python' },
      })

      expect(res.statusCode).toBe(500)
      expect(res.json()).toEqual({ detail: `Failed to deploy rules to ${target}` })
      await app.close()
    })
  })

  it('hides unexpected errors behind a generic 500 and logs them', async () => {
    fetchRules.mockRejectedValueOnce(new Error('provider exploded'))
    const app = makeApp()

    const res = await app.inject({ method: 'GET', url: '/api/v1/technologies/python/rules' })

    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({ detail: INTERNAL_ERROR_DETAIL })
    expect(logger.messages('ERROR')).toEqual([
      'Unhandled error on GET /api/v1/technologies/python/rules: provider exploded',
    ])
    await app.close()
  })

  it('answers unknown routes with a JSON 404', async () => {
    const app = makeApp()
    const res = await app.inject({ method: 'GET', url: '/api/v2/nothing' })
    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({ detail: 'Not Found' })
    await app.close()
  })

  it('allows any origin and logs each request', async () => {
    const app = makeApp()

    const res = await app.inject({ method: 'GET', url: '/health?probe=1', headers: { origin: 'http://example.test' } })

    expect(res.headers['access-control-allow-origin']).toBe('*')
    expect(logger.messages('INFO')).toHaveLength(1)
    expect(logger.messages('INFO')[0]).toMatch(/^GET \/health - 200 - \d+\.\d{4}s$/)
    await app.close()
  })
})
