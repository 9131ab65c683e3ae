import Ajv2020 from 'ajv/dist/2020.js'
import type { ErrorObject } from 'ajv'
import addFormats from 'ajv-formats'

import ruleSchema from './schema/rule.schema.json'
import type { Rule } from '../types'

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
})
addFormats(ajv)

const validateRule = ajv.compile<Rule>(ruleSchema)

export class RuleValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`invalid rule: ${issues.join('; ')}`)
    this.name = 'RuleValidationError'
    this.issues = issues
  }
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
}

export function isRule(data: unknown): data is Rule {
  return validateRule(data)
}

/**
 * Validate a rule payload against rule.schema.json and copy out the known
 * fields. Extra keys in the payload are dropped.
 */
export function parseRule(data: unknown): Rule {
  if (!validateRule(data)) {
    throw new RuleValidationError(formatAjvErrors(validateRule.errors))
  }
  const rule: Rule = {
    id: data.id,
    technology: data.technology,
    file_patterns: [...data.file_patterns],
    content: data.content,
    version: data.version,
  }
  if (data.updated_at !== undefined) rule.updated_at = data.updated_at
  return rule
}
