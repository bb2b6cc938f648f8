import type { Logger } from '../types'
import type { NuGetVersion } from '../version/nuget-version'
import { z } from 'zod'
import { NetworkError } from '../types'
import { parseVersion } from '../version/nuget-version'
import { PermitPool } from './permit-pool'

export const DEFAULT_INDEX_URL = 'https://api.nuget.org/v3-flatcontainer'
export const DEFAULT_CACHE_TTL_MS = 30 * 60 * 1000

const VersionIndexSchema = z.object({
  versions: z.array(z.string()),
})

export interface RegistryClientOptions {
  /** Base URL of the flat container */
  indexUrl?: string
  cacheTtlMs?: number
  /** Shared permit pool; a private pool of the default capacity is created otherwise */
  pool?: PermitPool
}

export interface VersionQueryOptions {
  /** Skip the cache read; the response still refreshes the cache */
  bypassCache?: boolean
  signal?: AbortSignal
}

interface CacheEntry {
  versions: NuGetVersion[]
  expiresAt: number
}

export class RegistryClient {
  private readonly indexUrl: string
  private readonly cacheTtlMs: number
  private readonly cache = new Map<string, CacheEntry>()
  readonly pool: PermitPool

  constructor(
    private readonly logger: Logger,
    options: RegistryClientOptions = {},
  ) {
    this.indexUrl = (options.indexUrl ?? DEFAULT_INDEX_URL).replace(/\/+$/, '')
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS
    this.pool = options.pool ?? new PermitPool()
  }

  /**
   * Get every published version of a package, stable and prerelease together.
   * An unknown package yields an empty list.
   */
  async getAllVersions(packageId: string, options: VersionQueryOptions = {}): Promise<NuGetVersion[]> {
    const key = packageId.toLowerCase()

    if (!options.bypassCache) {
      const cached = this.cache.get(key)
      if (cached && cached.expiresAt > Date.now()) {
        this.logger.debug(`Cache hit for ${packageId}`)
        return cached.versions
      }
    }

    const versions = await this.pool.run(signal => this.fetchVersions(packageId, signal), options.signal)
    this.cache.set(key, { versions, expiresAt: Date.now() + this.cacheTtlMs })
    return versions
  }

  /**
   * Forget cached version lists
   */
  clearCache(): void {
    this.cache.clear()
  }

  getIndexUrl(packageId: string): string {
    return `${this.indexUrl}/${encodeURIComponent(packageId.toLowerCase())}/index.json`
  }

  private async fetchVersions(packageId: string, signal?: AbortSignal): Promise<NuGetVersion[]> {
    const url = this.getIndexUrl(packageId)
    this.logger.debug(`GET ${url}`)

    let response: Response
    try {
      response = await fetch(url, { signal, headers: { Accept: 'application/json' } })
    }
    catch (error) {
      if (signal?.aborted)
        throw error
      throw new NetworkError(
        `Failed to query versions of ${packageId}: ${error instanceof Error ? error.message : String(error)}`,
        packageId,
        error,
      )
    }

    if (response.status === 404) {
      this.logger.debug(`${packageId} is not listed in the index`)
      return []
    }

    if (!response.ok)
      throw new NetworkError(`Index returned ${response.status} for ${packageId}`, packageId, { status: response.status })

    let body: unknown
    try {
      body = await response.json()
    }
    catch (error) {
      if (signal?.aborted)
        throw error
      throw new NetworkError(`Index returned an unreadable body for ${packageId}`, packageId, error)
    }

    const parsed = VersionIndexSchema.safeParse(body)
    if (!parsed.success)
      throw new NetworkError(`Index returned an unexpected body for ${packageId}`, packageId, parsed.error.issues)

    const versions: NuGetVersion[] = []
    for (const raw of parsed.data.versions) {
      const version = parseVersion(raw)
      if (version)
        versions.push(version)
    }
    return versions
  }
}
