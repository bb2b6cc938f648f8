import type {
  Logger as LoggerContract,
  ManifestLocation,
  PilotConfig,
  ReportType,
  UpdateReport,
  UpdateRunResult,
  UpdateScanResult,
} from './types'
import { partitionByPolicy } from './policy/policy-filter'
import { PermitPool } from './registry/permit-pool'
import { RegistryClient } from './registry/registry-client'
import { ReportGenerator } from './report/report-generator'
import { PackageScanner } from './scanner/package-scanner'
import { ScanCancelledError } from './types'
import { PackageUpdater } from './update/package-updater'
import { Logger } from './utils/logger'
import { resolveManifestLocation } from './utils/manifest-parser'

export interface PilotDependencies {
  logger?: LoggerContract
  registry?: RegistryClient
  updater?: PackageUpdater
  reports?: ReportGenerator
}

export interface ScanRunOptions {
  /** Fetch fresh version lists instead of cached ones */
  bypassCache?: boolean
  signal?: AbortSignal
}

export interface UpdateRunOptions extends ScanRunOptions {
  /** Report what would change without touching any file */
  dryRun?: boolean
}

/**
 * Update engine for one project file: scan, filter by policy and apply
 */
export class Pilot {
  private readonly logger: LoggerContract
  private readonly registry: RegistryClient
  private readonly scanner: PackageScanner
  private readonly updater: PackageUpdater
  private readonly reports: ReportGenerator

  constructor(
    private readonly config: PilotConfig,
    private readonly manifestPath: string,
    dependencies: PilotDependencies = {},
  ) {
    this.logger = dependencies.logger ?? (config.verbose ? Logger.verbose() : Logger.quiet())
    this.registry = dependencies.registry ?? new RegistryClient(this.logger, {
      indexUrl: config.registry?.indexUrl,
      cacheTtlMs: config.registry?.cacheTtlMinutes !== undefined ? config.registry.cacheTtlMinutes * 60_000 : undefined,
      pool: new PermitPool(config.maxParallelism),
    })
    this.scanner = new PackageScanner(this.registry, this.logger)
    this.updater = dependencies.updater ?? new PackageUpdater(this.logger)
    this.reports = dependencies.reports ?? new ReportGenerator()
  }

  /**
   * Decide which file receives the updates. Resolved once per run.
   */
  async resolveLocation(): Promise<ManifestLocation> {
    return resolveManifestLocation(this.manifestPath, { logger: this.logger })
  }

  /**
   * Find outdated packages and the subset the policy allows
   */
  async scan(options: ScanRunOptions = {}, location?: ManifestLocation): Promise<UpdateScanResult> {
    const startTime = Date.now()
    const resolved = location ?? await this.resolveLocation()

    try {
      const { references, candidates, failures } = await this.scanner.scan(resolved, {
        includePrerelease: this.config.includePrerelease,
        bypassCache: options.bypassCache,
        signal: options.signal,
      })

      const partition = partitionByPolicy(candidates, this.config)
      const duration = Date.now() - startTime

      if (partition.blocked.length > 0)
        this.logger.debug(`Held back by policy: ${partition.blocked.map(c => `${c.packageId} (${c.updateType})`).join(', ')}`)

      this.logger.success(`Scan completed in ${duration}ms. Found ${partition.admitted.length} updates.`)
      return {
        location: resolved,
        totalPackages: references.length,
        candidates,
        updates: partition.admitted,
        excludedCount: partition.excluded.length + partition.blocked.length,
        failures,
        scannedAt: new Date(),
        duration,
      }
    }
    catch (error) {
      if (!(error instanceof ScanCancelledError))
        this.logger.error('Failed to scan for updates:', error instanceof Error ? error.message : error)
      throw error
    }
  }

  /**
   * Scan, then apply the admitted updates as one transactional batch
   */
  async update(options: UpdateRunOptions = {}): Promise<UpdateRunResult> {
    const location = await this.resolveLocation()
    const scan = await this.scan(options, location)

    if (scan.updates.length === 0) {
      this.logger.info('No updates to apply.')
      return { status: 'up-to-date', scan }
    }

    if (options.dryRun)
      return { status: 'preview', scan }

    const batch = await this.updater.applyUpdates(location, scan.updates)
    return { status: 'applied', scan, batch }
  }

  createReport(scan: UpdateScanResult, type: ReportType): UpdateReport {
    return this.reports.generateReport(scan.location.manifestPath, scan.updates, type, {
      totalPackages: scan.totalPackages,
      excludedCount: scan.excludedCount,
    })
  }

  get reportGenerator(): ReportGenerator {
    return this.reports
  }
}
