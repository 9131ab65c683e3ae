/**
 * A lint/style convention for one technology, as stored in the rules
 * repository and served over HTTP. Field names follow the wire format.
 */
export interface Rule {
  /** Unique within a technology; defaults to the source filename without `.json` */
  id: string
  technology: string
  /** Globs the rule applies to, e.g. `["*.py"]` */
  file_patterns: string[]
  /** Opaque payload (linter name, settings, ...) */
  content: Record<string, unknown>
  version: string
  /** ISO-8601 */
  updated_at?: string
}

export interface RuleSet {
  rules: Rule[]
  /** Always `rules.length` */
  total: number
  /** ISO-8601, set when the set is built */
  fetched_at: string
}

export interface FileContext {
  file_path: string
  file_type?: string | null
  project_type?: string | null
  additional_context?: Record<string, unknown> | null
}

export interface IndexEntry {
  rules: string[]
  updated: boolean
}

/** `<target>/.cursor-rules/index.json` */
export interface IndexFile {
  technologies: Record<string, IndexEntry>
}

export interface DeployResult {
  success: boolean
  technology: string
  rules_count: number
  target_dir: string
}

/**
 * Minimal rule source contract: name + async fetch for one technology.
 * Implementations resolve to an empty list rather than rejecting when a
 * technology has no rules.
 */
export interface RuleProvider {
  name: string
  fetchRules(technology: string): Promise<Rule[]>
}

export function buildRuleSet(rules: Rule[], fetchedAt: Date = new Date()): RuleSet {
  return {
    rules,
    total: rules.length,
    fetched_at: fetchedAt.toISOString(),
  }
}
