import type {
  BackupEntry,
  BackupSet,
  BatchResult,
  BatchState,
  CandidateResult,
  Logger,
  ManifestLocation,
  UpdateCandidate,
  UpdateVersionResult,
} from '../types'
import { constants } from 'node:fs'
import { copyFile, readFile, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { NotFoundError, PilotError, RollbackError, ValidationError } from '../types'
import {
  CENTRAL_ELEMENT,
  isWellFormedDocument,
  REFERENCE_ELEMENT,
  updateManifestContent,
} from '../utils/manifest-parser'

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/**
 * Format a date as `YYYYMMDDHHmmss` in local time
 */
export function formatBackupTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
}

/**
 * `App.csproj` becomes `App.backup.<timestamp>.csproj` in the same directory
 */
export function getBackupPath(filePath: string, timestamp: string): string {
  const ext = extname(filePath)
  const name = basename(filePath, ext)
  return join(dirname(filePath), `${name}.backup.${timestamp}${ext}`)
}

/** Files a batch touches: the manifest, plus the central version file when one is in use */
function filesOf(location: ManifestLocation): string[] {
  return location.centralized && location.centralFilePath
    ? [location.manifestPath, location.centralFilePath]
    : [location.manifestPath]
}

function toPilotError(error: unknown): PilotError {
  if (error instanceof PilotError)
    return error
  return new PilotError(error instanceof Error ? error.message : String(error), 'UPDATE_FAILED', error)
}

export interface PackageUpdaterOptions {
  /** Clock used for backup names */
  now?: () => Date
}

/**
 * Applies a batch of updates to one manifest: backup, mutate, validate, then commit or roll back.
 * Batches against the same manifest must not overlap.
 */
export class PackageUpdater {
  private batchState: BatchState = 'idle'
  private readonly now: () => Date

  constructor(
    private readonly logger: Logger,
    options: PackageUpdaterOptions = {},
  ) {
    this.now = options.now ?? (() => new Date())
  }

  get state(): BatchState {
    return this.batchState
  }

  /**
   * Copy every file the batch may touch to a timestamped sibling. Existing files are never overwritten.
   */
  async createBackup(location: ManifestLocation): Promise<BackupSet> {
    const timestamp = formatBackupTimestamp(this.now())
    const entries: BackupEntry[] = []

    for (const originalPath of filesOf(location)) {
      const backupPath = getBackupPath(originalPath, timestamp)
      try {
        await copyFile(originalPath, backupPath, constants.COPYFILE_EXCL)
      }
      catch (error) {
        await this.discardBackups(entries)
        throw new PilotError(
          `Failed to back up ${basename(originalPath)} to ${basename(backupPath)}: ${error instanceof Error ? error.message : String(error)}`,
          'BACKUP_FAILED',
          error,
        )
      }
      entries.push({ originalPath, backupPath })
      this.logger.debug(`Backed up ${originalPath} to ${backupPath}`)
    }

    return { timestamp, entries }
  }

  /** Remove the backups of a set that could not be completed. */
  private async discardBackups(entries: BackupEntry[]): Promise<void> {
    for (const entry of entries) {
      await rm(entry.backupPath, { force: true })
      this.logger.debug(`Removed ${entry.backupPath}`)
    }
  }

  /**
   * Rewrite one package's version in the file the location targets
   */
  async updateVersion(location: ManifestLocation, packageId: string, newVersion: string): Promise<UpdateVersionResult> {
    const filePath = location.targetPath
    const elementName = location.centralized ? CENTRAL_ELEMENT : REFERENCE_ELEMENT

    const content = await readFile(filePath, 'utf-8')
    const update = updateManifestContent(content, packageId, newVersion, elementName)
    if (!update) {
      return {
        kind: 'not-found',
        packageId,
        filePath,
        reason: `No ${elementName} with a Version for ${packageId} in ${basename(filePath)}`,
      }
    }

    await writeFile(filePath, update.content, 'utf-8')
    return { kind: 'updated', packageId, filePath, previousVersion: update.previousVersion, newVersion }
  }

  /**
   * Check that every file of the location still exists and is well-formed
   */
  async validate(location: ManifestLocation): Promise<boolean> {
    for (const filePath of filesOf(location)) {
      if (!await isWellFormedDocument(filePath)) {
        this.logger.debug(`${filePath} failed validation`)
        return false
      }
    }
    return true
  }

  /**
   * Copy every backup over its original
   */
  async restore(backup: BackupSet): Promise<void> {
    const failures: string[] = []
    const causes: unknown[] = []

    for (const entry of backup.entries) {
      try {
        await copyFile(entry.backupPath, entry.originalPath)
      }
      catch (error) {
        failures.push(entry.originalPath)
        causes.push(error)
      }
    }

    if (failures.length > 0)
      throw new RollbackError(`Failed to restore ${failures.join(', ')} from backup, the file may be inconsistent`, backup, causes)
  }

  /**
   * Apply candidates as one batch. Each candidate is applied independently; the final state is
   * validated once and the batch is rolled back if validation fails.
   */
  async applyUpdates(location: ManifestLocation, candidates: readonly UpdateCandidate[]): Promise<BatchResult> {
    this.batchState = 'idle'
    const backup = await this.createBackup(location)
    this.batchState = 'backed-up'

    this.logger.info(`Applying ${candidates.length} update(s) to ${basename(location.targetPath)}...`)
    this.batchState = 'mutating'

    const results: CandidateResult[] = []
    for (const candidate of candidates) {
      const result: CandidateResult = {
        packageId: candidate.packageId,
        fromVersion: candidate.currentVersion.toString(),
        toVersion: candidate.targetVersion.toString(),
        success: false,
      }

      try {
        const outcome = await this.updateVersion(location, candidate.packageId, result.toVersion)
        if (outcome.kind === 'updated') {
          result.success = true
          this.logger.success(`Updated ${candidate.packageId} to ${result.toVersion}`)
        }
        else {
          result.error = new NotFoundError(outcome.reason, candidate.packageId, outcome.filePath)
          this.logger.error(`Failed to update ${candidate.packageId}: ${outcome.reason}`)
        }
      }
      catch (error) {
        result.error = toPilotError(error)
        this.logger.error(`Failed to update ${candidate.packageId}: ${result.error.message}`)
      }

      results.push(result)
    }

    const succeeded = results.filter(result => result.success).length
    const summary = { results, succeeded, failed: results.length - succeeded, backup }

    if (await this.validate(location)) {
      this.batchState = 'committed'
      this.logger.success(`Updated ${succeeded} of ${results.length} package(s), backup saved at ${backup.entries.map(entry => entry.backupPath).join(', ')}`)
      return { outcome: 'committed', ...summary }
    }

    const validationError = new ValidationError(
      `${basename(location.targetPath)} is no longer well-formed after the update`,
      filesOf(location),
    )
    this.logger.error(`${validationError.message}, restoring from backup...`)

    try {
      await this.restore(backup)
    }
    catch (error) {
      const rollbackError = error instanceof RollbackError
        ? error
        : new RollbackError(error instanceof Error ? error.message : String(error), backup, error)
      this.batchState = 'rollback-failed'
      this.logger.error(rollbackError.message)
      return { outcome: 'rollback-failed', ...summary, error: rollbackError }
    }

    this.batchState = 'rolled-back'
    this.logger.warn('Changes rolled back')
    return { outcome: 'rolled-back', ...summary, error: validationError }
  }
}
