import type { Command } from 'cac'
import type { Environment } from '../config/config-loader'
import type { Logger as LoggerContract, OutputFormat, PilotConfig, PilotOptions } from '../types'
import { readFileSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import process from 'node:process'
import { CAC } from 'cac'
import { z } from 'zod'
import { CONFIG_FILE_NAME } from '../config'
import { parseUpdatePolicy, resolveConfig } from '../config/config-loader'
import { Pilot } from '../pilot'
import { ConfigurationError, ParseError, PilotError, ProjectResolutionError, ScanCancelledError } from '../types'
import { Logger } from '../utils/logger'
import { resolveProjectPath, validateOutputPath } from '../utils/project-path'

export const ExitCode = {
  Success: 0,
  UpdatesAvailable: 1,
  NotFound: 2,
  InvalidInput: 3,
  Unexpected: 4,
  RolledBack: 5,
  PartialSuccess: 6,
  RollbackFailed: 7,
} as const

export type ExitCode = typeof ExitCode[keyof typeof ExitCode]

export interface CLIOptions {
  project?: string
  config?: string
  includePrerelease?: boolean
  policy?: string
  exclude?: string
  /** `false` when `--no-cache` is passed */
  cache?: boolean
  verbose?: boolean
  dryRun?: boolean
  format?: string
  output?: string
  force?: boolean
}

export interface CommandContext {
  cwd?: string
  env?: Environment
  logger?: LoggerContract
  /** Sink for machine-readable output */
  write?: (text: string) => void
  signal?: AbortSignal
}

interface PreparedRun {
  config: PilotConfig
  manifestPath: string
  logger: LoggerContract
}

export const SAMPLE_CONFIG = {
  updatePolicy: 'minor',
  excludePackages: ['System.*', 'Microsoft.NETCore.App'],
  includePrerelease: false,
  maxParallelism: 5,
  updateRules: [
    { pattern: 'Microsoft.*', policy: 'minor' },
    { pattern: 'Newtonsoft.Json', policy: 'patch' },
  ],
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined)
    return undefined
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0)
}

/**
 * Translate command-line flags into the highest-precedence configuration layer
 */
export function optionsToConfig(options: CLIOptions): PilotOptions {
  const overrides: PilotOptions = {}

  if (options.policy !== undefined) {
    const policy = parseUpdatePolicy(options.policy)
    if (!policy)
      throw new ConfigurationError(`Invalid policy "${options.policy}". Expected patch, minor or major`, 'policy')
    overrides.updatePolicy = policy
  }

  if (options.includePrerelease)
    overrides.includePrerelease = true

  const exclude = splitList(options.exclude)
  if (exclude)
    overrides.excludePackages = exclude

  if (options.verbose)
    overrides.verbose = true

  return overrides
}

export function parseOutputFormat(value: string | undefined): OutputFormat {
  const format = (value ?? 'console').trim().toLowerCase()
  if (format === 'console' || format === 'json')
    return format
  throw new ConfigurationError(`Unsupported output format "${value}". Expected console or json`, 'format')
}

/**
 * Map a failure to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ProjectResolutionError)
    return error.missing ? ExitCode.NotFound : ExitCode.InvalidInput
  if (error instanceof ConfigurationError || error instanceof ParseError)
    return ExitCode.InvalidInput
  return ExitCode.Unexpected
}

async function prepare(options: CLIOptions, context: CommandContext, logger: LoggerContract): Promise<PreparedRun> {
  const cwd = context.cwd ?? process.cwd()
  const manifestPath = await resolveProjectPath(options.project ?? '.', cwd)

  const config = await resolveConfig({
    cwd,
    configPath: options.config,
    env: context.env,
    overrides: optionsToConfig(options),
    logger,
  })

  return { config, manifestPath, logger }
}

async function run(
  options: CLIOptions,
  context: CommandContext,
  logger: LoggerContract,
  body: (prepared: PreparedRun) => Promise<ExitCode>,
): Promise<ExitCode> {
  try {
    return await body(await prepare(options, context, logger))
  }
  catch (error) {
    if (error instanceof ScanCancelledError) {
      logger.warn('Scan cancelled, no results were kept')
      return ExitCode.Unexpected
    }

    const code = exitCodeFor(error)
    const message = error instanceof Error ? error.message : String(error)
    logger.error(code === ExitCode.Unexpected ? `Unexpected error: ${message}` : `Error: ${message}`)
    if (options.verbose && error instanceof Error && error.stack && !(error instanceof PilotError))
      logger.error(error.stack)
    return code
  }
}

function loggerFor(options: CLIOptions, context: CommandContext, silent = false): LoggerContract {
  return context.logger ?? new Logger({ verbose: options.verbose ?? false, silent })
}

/**
 * List outdated packages. Exits with 1 when updates are available.
 */
export async function scanCommand(options: CLIOptions = {}, context: CommandContext = {}): Promise<ExitCode> {
  const logger = loggerFor(options, context)

  return run(options, context, logger, async ({ config, manifestPath }) => {
    const pilot = new Pilot(config, manifestPath, { logger })
    const scan = await pilot.scan({ bypassCache: options.cache === false, signal: context.signal })
    const reports = pilot.reportGenerator

    logger.info(`Found ${scan.totalPackages} package references`)
    for (const failure of scan.failures)
      logger.warn(`Skipped ${failure.packageId}: ${failure.message}`)

    if (scan.updates.length === 0) {
      logger.success('All packages are up to date!')
      return ExitCode.Success
    }

    logger.info(`\n${reports.formatTable(scan.updates)}\n`)
    const warning = reports.formatDeprecatedWarning(scan.updates)
    if (warning)
      logger.warn(warning)

    return ExitCode.UpdatesAvailable
  })
}

/**
 * Apply admitted updates, or preview them with `--dry-run`
 */
export async function updateCommand(options: CLIOptions = {}, context: CommandContext = {}): Promise<ExitCode> {
  const logger = loggerFor(options, context)

  return run(options, context, logger, async ({ config, manifestPath }) => {
    const pilot = new Pilot(config, manifestPath, { logger })
    const result = await pilot.update({
      dryRun: options.dryRun ?? false,
      bypassCache: options.cache === false,
      signal: context.signal,
    })

    switch (result.status) {
      case 'up-to-date':
        return ExitCode.Success

      case 'preview':
        logger.info(pilot.reportGenerator.formatPreview(result.scan.updates, manifestPath))
        return ExitCode.Success

      case 'applied': {
        const { batch } = result
        if (batch.outcome === 'rolled-back')
          return ExitCode.RolledBack
        if (batch.outcome === 'rollback-failed') {
          logger.error(`Backup location: ${batch.backup.entries.map(entry => entry.backupPath).join(', ')}`)
          return ExitCode.RollbackFailed
        }

        const report = pilot.createReport(result.scan, 'applied')
        logger.info(pilot.reportGenerator.formatSummary(report.summary))
        return batch.failed === 0 ? ExitCode.Success : ExitCode.PartialSuccess
      }
    }
  })
}

/**
 * Write a console or JSON report of available updates
 */
export async function reportCommand(options: CLIOptions = {}, context: CommandContext = {}): Promise<ExitCode> {
  let format: OutputFormat
  try {
    format = parseOutputFormat(options.format)
  }
  catch (error) {
    loggerFor(options, context).error(error instanceof Error ? error.message : String(error))
    return ExitCode.InvalidInput
  }

  // JSON on stdout must not be interleaved with progress output
  const logger = loggerFor(options, context, format === 'json' && !options.output)
  const write = context.write ?? ((text: string) => process.stdout.write(`${text}\n`))

  return run(options, context, logger, async ({ config, manifestPath }) => {
    const outputPath = options.output ? await validateOutputPath(options.output, context.cwd) : undefined

    const pilot = new Pilot(config, manifestPath, { logger })
    const scan = await pilot.scan({ bypassCache: options.cache === false, signal: context.signal })
    const report = pilot.createReport(scan, 'preview')
    const reports = pilot.reportGenerator

    if (format === 'console') {
      logger.info(reports.formatConsole(report))
      return ExitCode.Success
    }

    if (outputPath) {
      await reports.saveToFile(report, outputPath, format)
      logger.success(`Report saved to: ${outputPath}`)
    }
    else {
      write(reports.toJson(report))
    }
    return ExitCode.Success
  })
}

/**
 * Write a sample configuration file into the working directory
 */
export async function initCommand(options: CLIOptions = {}, context: CommandContext = {}): Promise<ExitCode> {
  const logger = loggerFor(options, context)
  const target = join(resolve(context.cwd ?? process.cwd()), CONFIG_FILE_NAME)

  try {
    await writeFile(target, `${JSON.stringify(SAMPLE_CONFIG, null, 2)}\n`, { encoding: 'utf-8', flag: options.force ? 'w' : 'wx' })
  }
  catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      logger.error(`${CONFIG_FILE_NAME} already exists, pass --force to overwrite it`)
      return ExitCode.InvalidInput
    }
    logger.error(`Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`)
    return ExitCode.Unexpected
  }

  logger.success(`Sample configuration created: ${target}`)
  return ExitCode.Success
}

const PackageManifestSchema = z.object({ version: z.string() })

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
    const parsed = PackageManifestSchema.safeParse(raw)
    return parsed.success ? parsed.data.version : '0.0.0'
  }
  catch {
    return '0.0.0'
  }
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-p, --project <path>', 'Project file or directory containing one', { default: '.' })
    .option('-c, --config <path>', `Configuration file (defaults to the nearest ${CONFIG_FILE_NAME})`)
    .option('--include-prerelease', 'Include prerelease versions')
    .option('--policy <policy>', 'Update ceiling: patch, minor or major')
    .option('--exclude <patterns>', 'Comma-separated package patterns to exclude')
    .option('--no-cache', 'Bypass the version cache and fetch fresh data')
    .option('-v, --verbose', 'Enable verbose logging')
}

/**
 * Build the command-line interface. Each action resolves to its exit code.
 */
export function createCLI(context: CommandContext = {}): CAC {
  const cli = new CAC('nuget-pilot')

  cli.usage(`[command] [options]

Keep NuGet package references in .csproj, .fsproj and .vbproj files up to date

COMMANDS:
  scan      List outdated packages
  update    Apply updates with backup and rollback
  report    Write a console or JSON report
  init      Create a sample ${CONFIG_FILE_NAME}`)

  withSharedOptions(cli.command('scan', 'List outdated packages'))
    .example('nuget-pilot scan --project MyApp.csproj')
    .example('nuget-pilot scan -p src/MyApp --include-prerelease --no-cache')
    .action((options: CLIOptions) => scanCommand(options, context))

  withSharedOptions(cli.command('update', 'Apply updates with backup and rollback'))
    .option('--dry-run', 'Preview updates without changing any file')
    .example('nuget-pilot update --project MyApp.csproj --dry-run')
    .example('nuget-pilot update -p MyApp.csproj --policy major')
    .action((options: CLIOptions) => updateCommand(options, context))

  withSharedOptions(cli.command('report', 'Write a console or JSON report'))
    .option('--format <format>', 'Output format: console or json', { default: 'console' })
    .option('-o, --output <path>', 'Write the JSON report to a file')
    .example('nuget-pilot report -p MyApp.csproj --format json --output report.json')
    .action((options: CLIOptions) => reportCommand(options, context))

  cli
    .command('init', `Create a sample ${CONFIG_FILE_NAME}`)
    .option('--force', 'Overwrite an existing configuration file')
    .action((options: CLIOptions) => initCommand(options, context))

  cli.version(readPackageVersion())
  cli.help()

  return cli
}
