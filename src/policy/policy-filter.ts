import type { UpdateCandidate, UpdatePolicy, UpdateRule, UpdateType } from '../types'
import { findMatchingRule, matchesAny } from '../utils/rule-matcher'

export interface PolicyOptions {
  updatePolicy: UpdatePolicy
  excludePackages: readonly string[]
  updateRules: readonly UpdateRule[]
}

export interface PolicyResult {
  admitted: UpdateCandidate[]
  /** Candidates dropped by an exclusion pattern */
  excluded: UpdateCandidate[]
  /** Candidates whose category exceeds their ceiling */
  blocked: UpdateCandidate[]
}

const ADMITTED_TYPES: Record<UpdatePolicy, ReadonlySet<UpdateType>> = {
  patch: new Set(['patch']),
  minor: new Set(['patch', 'minor']),
  major: new Set(['patch', 'minor', 'major', 'prerelease']),
}

/**
 * Check whether an update category fits under a policy ceiling
 */
export function isWithinPolicy(updateType: UpdateType, policy: UpdatePolicy): boolean {
  return ADMITTED_TYPES[policy].has(updateType)
}

/**
 * Resolve the ceiling for a package: the first matching rule, else the default
 */
export function getEffectivePolicy(
  packageId: string,
  rules: readonly UpdateRule[],
  defaultPolicy: UpdatePolicy,
): UpdatePolicy {
  return findMatchingRule(packageId, rules)?.policy ?? defaultPolicy
}

/**
 * Partition candidates into admitted, excluded and blocked sets. Inputs are not mutated.
 */
export function partitionByPolicy(candidates: readonly UpdateCandidate[], options: PolicyOptions): PolicyResult {
  const result: PolicyResult = { admitted: [], excluded: [], blocked: [] }

  for (const candidate of candidates) {
    if (matchesAny(candidate.packageId, options.excludePackages)) {
      result.excluded.push(candidate)
      continue
    }

    const policy = getEffectivePolicy(candidate.packageId, options.updateRules, options.updatePolicy)
    if (isWithinPolicy(candidate.updateType, policy))
      result.admitted.push(candidate)
    else
      result.blocked.push(candidate)
  }

  return result
}

/**
 * Narrow candidates to those the policy, exclusions and rules allow
 */
export function applyPolicies(candidates: readonly UpdateCandidate[], options: PolicyOptions): UpdateCandidate[] {
  return partitionByPolicy(candidates, options).admitted
}
