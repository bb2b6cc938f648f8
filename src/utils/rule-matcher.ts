import type { UpdatePolicy, UpdateRule } from '../types'

const regexCache = new Map<string, RegExp>()

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&')
}

function toRegExp(pattern: string): RegExp {
  let regex = regexCache.get(pattern)
  if (!regex) {
    const source = pattern.split('*').map(escapeRegExp).join('.*')
    regex = new RegExp(`^${source}$`, 'is')
    regexCache.set(pattern, regex)
  }
  return regex
}

/**
 * Check whether a package id matches a pattern.
 * `*` matches any run of characters, everything else is literal; comparison ignores case.
 */
export function matchesPattern(packageName: string, pattern: string): boolean {
  if (pattern.trim() === '')
    return false

  if (!pattern.includes('*'))
    return packageName.toLowerCase() === pattern.toLowerCase()

  return toRegExp(pattern).test(packageName)
}

/**
 * Find the first rule whose pattern matches the package id
 */
export function findMatchingRule(packageName: string, rules: readonly UpdateRule[]): UpdateRule | undefined {
  return rules.find(rule => matchesPattern(packageName, rule.pattern))
}

/**
 * Check whether a package id matches any of the given patterns
 */
export function matchesAny(packageName: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesPattern(packageName, pattern))
}

/**
 * Filter package ids down to those matching a pattern
 */
export function getMatchingPackages(packageNames: readonly string[], pattern: string): string[] {
  return packageNames.filter(name => matchesPattern(name, pattern))
}

/**
 * Group package ids by the policy that applies to them
 */
export function groupByPolicy(
  packageNames: readonly string[],
  rules: readonly UpdateRule[],
  defaultPolicy: UpdatePolicy,
): Map<UpdatePolicy, string[]> {
  const groups = new Map<UpdatePolicy, string[]>()

  for (const name of packageNames) {
    const policy = findMatchingRule(name, rules)?.policy ?? defaultPolicy
    const group = groups.get(policy)
    if (group)
      group.push(name)
    else
      groups.set(policy, [name])
  }

  return groups
}
