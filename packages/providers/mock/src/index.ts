import { cloneRules, type Rule, type RuleProvider } from '@rulehub/provider-types'

/** Fixed offline rule set, also the fallback when the rules repository is unreachable */
export const MOCK_RULES: Readonly<Record<string, readonly Rule[]>> = {
  python: [
    {
      id: 'python-linting',
      technology: 'python',
      file_patterns: ['*.py'],
      content: { linters: ['flake8', 'black'], rules: { max_line_length: 88 } },
      version: '1.0.0',
    },
    {
      id: 'python-typing',
      technology: 'python',
      file_patterns: ['*.py'],
      content: { type_checker: 'mypy', rules: { disallow_untyped_defs: true } },
      version: '1.0.0',
    },
  ],
  javascript: [
    {
      id: 'javascript-eslint',
      technology: 'javascript',
      file_patterns: ['*.js', '*.jsx'],
      content: { linter: 'eslint', rules: { semi: 'error', quotes: ['error', 'single'] } },
      version: '1.0.0',
    },
  ],
  typescript: [
    {
      id: 'typescript-tslint',
      technology: 'typescript',
      file_patterns: ['*.ts', '*.tsx'],
      content: { linter: 'tslint', rules: { indent: [true, 'spaces', 2] } },
      version: '1.0.0',
    },
  ],
  swift: [
    {
      id: 'swift-swiftlint',
      technology: 'swift',
      file_patterns: ['*.swift'],
      content: { linter: 'swiftlint', rules: { line_length: 120, force_cast: 'warning' } },
      version: '1.0.0',
    },
  ],
}

export const mockProvider: RuleProvider = {
  name: 'mock',
  async fetchRules(technology: string): Promise<Rule[]> {
    const rules = Object.hasOwn(MOCK_RULES, technology) ? MOCK_RULES[technology] : undefined
    return rules ? cloneRules(rules) : []
  },
}

export default mockProvider
