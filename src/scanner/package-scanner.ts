import type {
  Logger,
  ManifestLocation,
  PackageReference,
  ResolutionFailure,
  UpdateCandidate,
} from '../types'
import type { RegistryClient } from '../registry/registry-client'
import { basename } from 'node:path'
import { ScanCancelledError } from '../types'
import { parseManifest, readReferenceIds } from '../utils/manifest-parser'
import { buildCandidate } from '../version/update-classifier'

export interface ScanOptions {
  includePrerelease: boolean
  bypassCache?: boolean
  signal?: AbortSignal
}

export interface PackageScanResult {
  references: PackageReference[]
  candidates: UpdateCandidate[]
  failures: ResolutionFailure[]
}

type Resolution =
  | { ok: true, candidate: UpdateCandidate | undefined }
  | { ok: false, failure: ResolutionFailure }

export class PackageScanner {
  constructor(
    private readonly registry: RegistryClient,
    private readonly logger: Logger,
  ) {}

  /**
   * Read the references that apply to a manifest. Under central management these are the
   * central file's entries for the ids the manifest references.
   */
  async readReferences(location: ManifestLocation): Promise<PackageReference[]> {
    if (!location.centralized || !location.centralFilePath)
      return parseManifest(location.manifestPath)

    const referenced = new Set((await readReferenceIds(location.manifestPath)).map(id => id.toLowerCase()))
    const central = await parseManifest(location.centralFilePath)
    const references = central.filter(entry => referenced.has(entry.id.toLowerCase()))

    this.logger.debug(`${references.length} of ${central.length} central versions apply to ${basename(location.manifestPath)}`)
    return references
  }

  /**
   * Scan a manifest for packages with newer versions
   */
  async scan(location: ManifestLocation, options: ScanOptions): Promise<PackageScanResult> {
    this.logger.info(`Scanning ${basename(location.manifestPath)} for outdated packages...`)
    const startTime = Date.now()

    const references = await this.readReferences(location)
    const candidates = await this.checkPackages(references, options)

    this.logger.debug(`Checked ${references.length} packages in ${Date.now() - startTime}ms`)
    return { references, ...candidates }
  }

  /**
   * Resolve every reference concurrently, throttled by the registry's permit pool.
   * A failed lookup is recorded and skipped; cancellation discards the whole result.
   */
  async checkPackages(
    references: readonly PackageReference[],
    options: ScanOptions,
  ): Promise<Omit<PackageScanResult, 'references'>> {
    const { signal } = options

    let resolutions: Resolution[]
    try {
      signal?.throwIfAborted()
      resolutions = await Promise.all(references.map(reference => this.resolve(reference, options)))
      signal?.throwIfAborted()
    }
    catch (error) {
      if (signal?.aborted)
        throw new ScanCancelledError(`Scan cancelled after starting ${references.length} version queries`, error)
      throw error
    }

    const candidates: UpdateCandidate[] = []
    const failures: ResolutionFailure[] = []
    for (const resolution of resolutions) {
      if (!resolution.ok)
        failures.push(resolution.failure)
      else if (resolution.candidate)
        candidates.push(resolution.candidate)
    }

    return { candidates, failures }
  }

  private async resolve(reference: PackageReference, options: ScanOptions): Promise<Resolution> {
    try {
      const versions = await this.registry.getAllVersions(reference.id, {
        bypassCache: options.bypassCache,
        signal: options.signal,
      })
      const candidate = buildCandidate(reference, versions, { includePrerelease: options.includePrerelease })
      if (candidate)
        this.logger.debug(`${reference.id}: ${candidate.currentVersion} -> ${candidate.targetVersion} (${candidate.updateType})`)
      return { ok: true, candidate }
    }
    catch (error) {
      if (options.signal?.aborted)
        throw error

      const message = error instanceof Error ? error.message : String(error)
      this.logger.warn(`Could not check ${reference.id}: ${message}`)
      return { ok: false, failure: { packageId: reference.id, message } }
    }
  }
}
