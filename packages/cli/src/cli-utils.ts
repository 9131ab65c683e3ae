import { cyan, green, red, yellow } from 'colorette'
import type { Rule } from '@rulehub/core'

import { RuleServerError } from './api'

/** Pretty console helpers (consistent UX) */
export const ok   = (msg: string) => console.log(green('✔ ') + msg)
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** `- <id>: <technology> <version>` */
export function formatRuleLine(rule: Pick<Rule, 'id' | 'technology' | 'version'>): string {
  return `- ${rule.id}: ${rule.technology} ${rule.version}`
}

export function printList(items: string[]) {
  for (const item of items) console.log(`- ${item}`)
}

/**
 * Report a failed server call and give the exit code. Anything that is not a
 * RuleServerError is a bug and propagates.
 */
export function reportServerFailure(e: unknown): number {
  if (!(e instanceof RuleServerError)) throw e
  fail(`Failed to connect to rule server: ${e.message}`)
  return 1
}
