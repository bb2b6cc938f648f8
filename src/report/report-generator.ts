import type {
  OutputFormat,
  ReportType,
  UpdateCandidate,
  UpdateReport,
  UpdateSummary,
  UpdateType,
} from '../types'
import { writeFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { PilotError } from '../types'

const RULE_WIDTH = 80
const PACKAGE_WIDTH = 40
const VERSION_WIDTH = 15
const TYPE_WIDTH = 12

export interface SummaryOptions {
  /** Number of references in the manifest; defaults to updates plus excluded */
  totalPackages?: number
  excludedCount?: number
}

function truncate(text: string, width: number): string {
  return text.length > width - 3 ? `${text.slice(0, width - 3)}...` : text
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

export class ReportGenerator {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Count updates by category
   */
  calculateSummary(updates: readonly UpdateCandidate[], options: SummaryOptions = {}): UpdateSummary {
    const excludedCount = options.excludedCount ?? 0
    const count = (type: UpdateType): number => updates.filter(update => update.updateType === type).length

    return {
      totalPackages: options.totalPackages ?? updates.length + excludedCount,
      outdatedCount: updates.length,
      majorUpdates: count('major'),
      minorUpdates: count('minor'),
      patchUpdates: count('patch'),
      prereleaseUpdates: count('prerelease'),
      excludedCount,
    }
  }

  generateReport(
    projectPath: string,
    updates: readonly UpdateCandidate[],
    type: ReportType,
    options: SummaryOptions = {},
  ): UpdateReport {
    return {
      generatedAt: this.now(),
      projectPath,
      type,
      updates: [...updates],
      summary: this.calculateSummary(updates, options),
    }
  }

  /**
   * Render a report as a plain-text table with a summary
   */
  formatConsole(report: UpdateReport): string {
    const lines = [
      '='.repeat(RULE_WIDTH),
      `UPDATE REPORT - ${report.type.toUpperCase()}`,
      `Generated: ${formatTimestamp(report.generatedAt)}`,
      `Project: ${basename(report.projectPath)}`,
      '='.repeat(RULE_WIDTH),
      '',
    ]

    if (report.updates.length === 0) {
      lines.push('No updates available.')
      return lines.join('\n')
    }

    lines.push(this.formatTable(report.updates), '', this.formatSummary(report.summary))

    const warning = this.formatDeprecatedWarning(report.updates)
    if (warning)
      lines.push('', warning)

    return lines.join('\n')
  }

  formatTable(updates: readonly UpdateCandidate[]): string {
    const header = [
      'Package'.padEnd(PACKAGE_WIDTH),
      'Current'.padEnd(VERSION_WIDTH),
      'Latest'.padEnd(VERSION_WIDTH),
      'Type'.padEnd(TYPE_WIDTH),
    ].join(' ').trimEnd()

    const rows = updates.map((update) => {
      const type = update.deprecated ? `${update.updateType} [DEPRECATED]` : update.updateType
      return [
        truncate(update.packageId, PACKAGE_WIDTH).padEnd(PACKAGE_WIDTH),
        update.currentVersion.toString().padEnd(VERSION_WIDTH),
        update.targetVersion.toString().padEnd(VERSION_WIDTH),
        type,
      ].join(' ')
    })

    return [header, '-'.repeat(PACKAGE_WIDTH + VERSION_WIDTH * 2 + TYPE_WIDTH + 3), ...rows].join('\n')
  }

  formatSummary(summary: UpdateSummary): string {
    return [
      '-'.repeat(RULE_WIDTH),
      'SUMMARY',
      '-'.repeat(RULE_WIDTH),
      `Total packages:     ${summary.totalPackages}`,
      `Outdated packages:  ${summary.outdatedCount}`,
      `  - Major updates:  ${summary.majorUpdates}`,
      `  - Minor updates:  ${summary.minorUpdates}`,
      `  - Patch updates:  ${summary.patchUpdates}`,
      `  - Prerelease:     ${summary.prereleaseUpdates}`,
      `Excluded packages:  ${summary.excludedCount}`,
      '='.repeat(RULE_WIDTH),
    ].join('\n')
  }

  /**
   * Warning listing deprecated packages, or undefined when there are none
   */
  formatDeprecatedWarning(updates: readonly UpdateCandidate[]): string | undefined {
    const deprecated = updates.filter(update => update.deprecated)
    if (deprecated.length === 0)
      return undefined

    return [
      `WARNING: ${deprecated.length} deprecated package(s) found:`,
      ...deprecated.map(update => `  - ${update.packageId}`),
    ].join('\n')
  }

  /**
   * Describe what a dry run would change
   */
  formatPreview(updates: readonly UpdateCandidate[], projectPath: string): string {
    if (updates.length === 0)
      return 'No updates to apply.'

    const lines = [
      `[DRY RUN] Preview of updates for: ${basename(projectPath)}`,
      'The following changes would be made:',
      '='.repeat(RULE_WIDTH),
    ]

    for (const update of updates) {
      lines.push(
        '',
        `${update.packageId}:`,
        `  Current: ${update.currentVersion}`,
        `  New:     ${update.targetVersion}`,
      )
    }

    lines.push(
      '='.repeat(RULE_WIDTH),
      '',
      `Total updates: ${updates.length}`,
      '',
      'No changes were made. Run without --dry-run to apply these updates.',
    )
    return lines.join('\n')
  }

  toJson(report: UpdateReport): string {
    return JSON.stringify(report, null, 2)
  }

  /**
   * Write a report to disk. Only the JSON format can be saved.
   */
  async saveToFile(report: UpdateReport, outputPath: string, format: OutputFormat): Promise<void> {
    if (format !== 'json')
      throw new PilotError('Console format cannot be saved to a file, use --format json', 'INVALID_FORMAT')

    await writeFile(outputPath, `${this.toJson(report)}\n`, 'utf-8')
  }
}
