import semver from 'semver'

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9a-z-]+(?:\.[0-9a-z-]+)*))?(?:\+([0-9a-z-]+(?:\.[0-9a-z-]+)*))?$/i

/**
 * A NuGet package version: `major.minor.patch[.revision][-prerelease][+metadata]`.
 *
 * Missing numeric parts default to 0. Prerelease labels compare identifier by identifier,
 * ignoring case, with numeric identifiers compared numerically. Build metadata never
 * takes part in ordering or equality.
 */
export class NuGetVersion {
  private constructor(
    readonly major: number,
    readonly minor: number,
    readonly patch: number,
    readonly revision: number,
    readonly releaseLabels: readonly string[],
    readonly metadata: string | undefined,
    /** Text the version was parsed from, written back verbatim on update */
    readonly original: string,
  ) {}

  static parse(text: string): NuGetVersion | undefined {
    const trimmed = text.trim()
    const match = VERSION_PATTERN.exec(trimmed)
    if (!match)
      return undefined

    const [, major, minor, patch, revision, release, metadata] = match
    return new NuGetVersion(
      Number(major),
      Number(minor ?? 0),
      Number(patch ?? 0),
      Number(revision ?? 0),
      release ? release.split('.') : [],
      metadata,
      trimmed,
    )
  }

  get isPrerelease(): boolean {
    return this.releaseLabels.length > 0
  }

  get release(): string {
    return this.releaseLabels.join('.')
  }

  compareTo(other: NuGetVersion): number {
    const numeric = this.major - other.major
      || this.minor - other.minor
      || this.patch - other.patch
      || this.revision - other.revision
    if (numeric !== 0)
      return Math.sign(numeric)

    // A release sorts above any prerelease of the same numbers
    if (!this.isPrerelease || !other.isPrerelease)
      return Number(other.isPrerelease) - Number(this.isPrerelease)

    const length = Math.min(this.releaseLabels.length, other.releaseLabels.length)
    for (let i = 0; i < length; i++) {
      const result = compareLabel(this.releaseLabels[i], other.releaseLabels[i])
      if (result !== 0)
        return result
    }

    return Math.sign(this.releaseLabels.length - other.releaseLabels.length)
  }

  equals(other: NuGetVersion): boolean {
    return this.compareTo(other) === 0
  }

  greaterThan(other: NuGetVersion): boolean {
    return this.compareTo(other) > 0
  }

  /** `1.0` and `1.0.0.0` both normalize to `1.0.0` */
  toNormalizedString(): string {
    let text = `${this.major}.${this.minor}.${this.patch}`
    if (this.revision > 0)
      text += `.${this.revision}`
    if (this.isPrerelease)
      text += `-${this.release}`
    return text
  }

  toString(): string {
    return this.original
  }

  toJSON(): string {
    return this.original
  }
}

function compareLabel(a: string | undefined, b: string | undefined): number {
  return semver.compareIdentifiers((a ?? '').toLowerCase(), (b ?? '').toLowerCase())
}

export function parseVersion(text: string): NuGetVersion | undefined {
  return NuGetVersion.parse(text)
}

/**
 * Highest version of a list, or undefined when the list is empty
 */
export function maxVersion(versions: Iterable<NuGetVersion>): NuGetVersion | undefined {
  let best: NuGetVersion | undefined
  for (const version of versions) {
    if (!best || version.greaterThan(best))
      best = version
  }
  return best
}
