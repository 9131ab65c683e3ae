import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

import { RuleManager, resolveTechnology } from '../manager'
import type { Rule, RuleProvider } from '../../types'
import { makeSandbox, makeTestLogger, readJson, type Sandbox } from '../../__tests__/helpers/sandbox'

function makeRule(id: string, technology = 'python'): Rule {
  return { id, technology, file_patterns: ['*.py'], content: { linter: 'ruff' }, version: '1.0.0' }
}

function makeProvider(byTech: Record<string, Rule[]>) {
  const fetchRules = vi.fn(async (technology: string) => byTech[technology] ?? [])
  const provider: RuleProvider = { name: 'fake', fetchRules }
  return { provider, fetchRules }
}

describe('RuleManager', () => {
  let sbx: Sandbox
  let t: number
  const now = () => t

  beforeEach(() => {
    sbx = makeSandbox('rulehub-manager-')
    t = Date.UTC(2024, 0, 1)
  })
  afterEach(() => sbx.cleanup())

  function makeManager(provider: RuleProvider, logger = makeTestLogger()) {
    return new RuleManager({ provider, rulesDir: sbx.root, ttlSeconds: 3600, now, logger })
  }

  it('builds a rule set and persists each rule as its own file', async () => {
    const { provider } = makeProvider({ python: [makeRule('python-linting'), makeRule('python-typing')] })
    const manager = makeManager(provider)

    const ruleset = await manager.getRulesForTechnology('python')

    expect(ruleset.total).toBe(2)
    expect(ruleset.rules.map((r) => r.id)).toEqual(['python-linting', 'python-typing'])
    expect(ruleset.fetched_at).toBe('2024-01-01T00:00:00.000Z')
    expect(fs.readdirSync(path.join(sbx.root, 'python')).sort()).toEqual(['python-linting.json', 'python-typing.json'])
    expect(readJson(path.join(sbx.root, 'python', 'python-linting.json'))).toEqual(makeRule('python-linting'))
  })

  it('serves the cached set within the ttl without calling the provider again', async () => {
    const { provider, fetchRules } = makeProvider({ python: [makeRule('python-linting')] })
    const manager = makeManager(provider)

    const first = await manager.getRulesForTechnology('python')
    t += 3599_000
    const second = await manager.getRulesForTechnology('python')

    expect(second).toBe(first)
    expect(fetchRules).toHaveBeenCalledTimes(1)
  })

  it('re-fetches exactly once after the ttl and advances the entry timestamp', async () => {
    const { provider, fetchRules } = makeProvider({ python: [makeRule('python-linting')] })
    const manager = makeManager(provider)

    await manager.getRulesForTechnology('python')
    expect(manager.inspect('python')).toEqual({ fetchedAt: new Date(Date.UTC(2024, 0, 1)), fresh: true })

    t += 3600_000
    expect(manager.inspect('python')?.fresh).toBe(false)

    const refreshed = await manager.getRulesForTechnology('python')
    await manager.getRulesForTechnology('python')

    expect(fetchRules).toHaveBeenCalledTimes(2)
    expect(refreshed.fetched_at).toBe('2024-01-01T01:00:00.000Z')
    expect(manager.inspect('python')).toEqual({ fetchedAt: new Date(Date.UTC(2024, 0, 1, 1)), fresh: true })
  })

  it('dates the cache entry from the fetch, not from when the files were written', async () => {
    const { provider } = makeProvider({ python: [makeRule('python-linting'), makeRule('python-typing')] })
    const logger = makeTestLogger()
    // each saved file takes a minute on this clock
    logger.debug.mockImplementation((msg) => {
      if (msg.startsWith('Saved rule to')) t += 60_000
    })

    const manager = makeManager(provider, logger)
    const ruleset = await manager.getRulesForTechnology('python')

    expect(ruleset.fetched_at).toBe('2024-01-01T00:00:00.000Z')
    expect(t).toBe(Date.UTC(2024, 0, 1, 0, 2))
    expect(manager.inspect('python')).toEqual({ fetchedAt: new Date(Date.UTC(2024, 0, 1)), fresh: true })

    t = Date.UTC(2024, 0, 1, 1)
    expect(manager.inspect('python')?.fresh).toBe(false)
  })

  it('calls the provider once for concurrent misses', async () => {
    const { provider, fetchRules } = makeProvider({ python: [makeRule('python-linting')] })
    const manager = makeManager(provider)

    const [a, b] = await Promise.all([
      manager.getRulesForTechnology('python'),
      manager.getRulesForTechnology('python'),
    ])
    expect(a).toBe(b)
    expect(fetchRules).toHaveBeenCalledTimes(1)
  })

  it('returns an empty set for a technology without rules', async () => {
    const { provider } = makeProvider({})
    const ruleset = await makeManager(provider).getRulesForTechnology('cobol')
    expect(ruleset.rules).toEqual([])
    expect(ruleset.total).toBe(0)
  })

  it('skips rules that cannot be written and keeps the others', async () => {
    const { provider } = makeProvider({ python: [makeRule('../escape'), makeRule('python-typing')] })
    const logger = makeTestLogger()
    const manager = makeManager(provider, logger)

    const ruleset = await manager.getRulesForTechnology('python')

    expect(ruleset.total).toBe(2)
    expect(fs.readdirSync(path.join(sbx.root, 'python'))).toEqual(['python-typing.json'])
    expect(fs.existsSync(path.join(sbx.root, 'escape.json'))).toBe(false)
    expect(logger.error).toHaveBeenCalledWith('Error saving rule "../escape": id is not a valid file name')
  })

  it('logs a write failure without failing the fetch', async () => {
    // a directory where the rule file should go makes the rename fail
    fs.mkdirSync(path.join(sbx.root, 'python', 'python-linting.json'), { recursive: true })
    const { provider } = makeProvider({ python: [makeRule('python-linting'), makeRule('python-typing')] })
    const logger = makeTestLogger()

    const ruleset = await makeManager(provider, logger).getRulesForTechnology('python')

    expect(ruleset.total).toBe(2)
    expect(fs.existsSync(path.join(sbx.root, 'python', 'python-typing.json'))).toBe(true)
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error.mock.calls[0]?.[0]).toMatch(/^Error saving rule python-linting to /)
  })

  it('finds a rule by id and reports a missing one as null', async () => {
    const { provider, fetchRules } = makeProvider({ python: [makeRule('python-linting'), makeRule('python-typing')] })
    const manager = makeManager(provider)

    expect((await manager.getRuleById('python-typing', 'python'))?.id).toBe('python-typing')
    expect(await manager.getRuleById('python-typing', 'python')).toEqual(makeRule('python-typing'))
    expect(await manager.getRuleById('nope', 'python')).toBeNull()
    expect(fetchRules).toHaveBeenCalledTimes(1)
  })

  it('resolves file context to a technology', async () => {
    const { provider, fetchRules } = makeProvider({ typescript: [makeRule('ts-strict', 'typescript')] })
    const manager = makeManager(provider)

    const ruleset = await manager.getRulesForFile({ file_path: 'src/index.ts' })
    expect(ruleset.rules[0]?.id).toBe('ts-strict')
    expect(fetchRules).toHaveBeenCalledWith('typescript')
  })
})

describe('resolveTechnology', () => {
  it('prefers project_type over any extension', () => {
    expect(resolveTechnology({ file_path: 'main.py', file_type: 'py', project_type: 'django' })).toBe('django')
  })

  it('uses file_type before the path extension', () => {
    expect(resolveTechnology({ file_path: 'main.py', file_type: 'rb' })).toBe('ruby')
  })

  it('falls back to the path extension, then to general', () => {
    expect(resolveTechnology({ file_path: 'cmd/main.go' })).toBe('golang')
    expect(resolveTechnology({ file_path: 'README' })).toBe('general')
    expect(resolveTechnology({ file_path: 'notes.txt', file_type: null, project_type: null })).toBe('general')
  })
})
