import type { Logger, Settings } from '@rulehub/core'
import { GitHubRuleProvider } from '@rulehub/provider-github'
import { mockProvider } from '@rulehub/provider-mock'
import type { RuleProvider } from '@rulehub/provider-types'

export type ProviderSettings = Pick<Settings, 'provider' | 'githubRepository' | 'githubToken'>

type ProviderFactory = (settings: ProviderSettings, logger?: Logger) => RuleProvider

const REGISTRY = new Map<string, ProviderFactory>([
  ['github', (s, logger) => new GitHubRuleProvider({ repository: s.githubRepository, token: s.githubToken, logger })],
  ['mock', () => mockProvider],
])

export function listProviders(): string[] {
  return Array.from(REGISTRY.keys()).sort()
}

/** `name` wins over `settings.provider`; lookup is case-insensitive. */
export function pickProvider(settings: ProviderSettings, name?: string, logger?: Logger): RuleProvider {
  const key = (name || settings.provider).trim().toLowerCase()
  const factory = REGISTRY.get(key)
  if (!factory) {
    throw new Error(`Unknown provider "${key}". Available: ${listProviders().join(', ')}`)
  }
  return factory(settings, logger)
}
