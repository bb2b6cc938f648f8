import type { PackageReference, UpdateCandidate, UpdateType } from '../types'
import type { NuGetVersion } from './nuget-version'
import { maxVersion } from './nuget-version'

/**
 * Classify the magnitude of moving from `current` to `latest`
 */
export function classify(current: NuGetVersion, latest: NuGetVersion): UpdateType {
  if (latest.isPrerelease && !current.isPrerelease)
    return 'prerelease'

  if (latest.major > current.major)
    return 'major'

  if (latest.minor > current.minor)
    return 'minor'

  return 'patch'
}

/**
 * Pick the version an update would target
 */
export function selectLatest(
  stable: NuGetVersion,
  prerelease: NuGetVersion | undefined,
  includePrerelease: boolean,
): NuGetVersion {
  if (includePrerelease && prerelease && prerelease.greaterThan(stable))
    return prerelease
  return stable
}

export interface CandidateOptions {
  includePrerelease: boolean
  deprecated?: boolean
}

/**
 * Build an update candidate from every version the index lists for a reference.
 * Returns undefined when nothing newer than the current version is selectable.
 */
export function buildCandidate(
  reference: PackageReference,
  versions: readonly NuGetVersion[],
  options: CandidateOptions,
): UpdateCandidate | undefined {
  const current = reference.version
  const newestStable = maxVersion(versions.filter(v => !v.isPrerelease))
  const latestStableVersion = newestStable && newestStable.greaterThan(current) ? newestStable : current

  const latestPrereleaseVersion = options.includePrerelease
    ? maxVersion(versions.filter(v => v.isPrerelease))
    : undefined

  const targetVersion = selectLatest(latestStableVersion, latestPrereleaseVersion, options.includePrerelease)
  if (!targetVersion.greaterThan(current))
    return undefined

  return {
    packageId: reference.id,
    currentVersion: current,
    latestStableVersion,
    latestPrereleaseVersion,
    targetVersion,
    updateType: classify(current, targetVersion),
    deprecated: options.deprecated ?? false,
  }
}
