import type { Logger, PilotConfig, PilotOptions, UpdatePolicy } from '../types'
import { readFile, stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import process from 'node:process'
import { z } from 'zod'
import { CONFIG_FILE_NAME, MAX_PARALLELISM, mergeConfigs, MIN_PARALLELISM } from '../config'
import { ConfigurationError } from '../types'

export const ENV_PREFIX = 'NUGET_PILOT_'

const UPDATE_POLICIES = ['patch', 'minor', 'major'] as const

const UpdatePolicySchema = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(UPDATE_POLICIES))

export const UpdateRuleSchema = z.object({
  pattern: z.string().trim().min(1, 'Rule pattern must not be empty'),
  policy: UpdatePolicySchema,
})

export const ConfigFileSchema = z.object({
  verbose: z.boolean().optional(),
  updatePolicy: UpdatePolicySchema.optional(),
  excludePackages: z.array(z.string()).optional(),
  includePrerelease: z.boolean().optional(),
  maxParallelism: z.number().int().min(MIN_PARALLELISM).max(MAX_PARALLELISM).optional(),
  updateRules: z.array(UpdateRuleSchema).optional(),
  registry: z.object({
    indexUrl: z.string().url().optional(),
    cacheTtlMinutes: z.number().nonnegative().optional(),
  }).optional(),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type Environment = Record<string, string | undefined>

export function parseUpdatePolicy(value: string): UpdatePolicy | undefined {
  const parsed = UpdatePolicySchema.safeParse(value)
  return parsed.success ? parsed.data : undefined
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  }
  catch {
    return false
  }
}

/**
 * Find the configuration file in `cwd` or the nearest ancestor directory
 */
export async function findConfigFile(cwd: string = process.cwd()): Promise<string | undefined> {
  let directory = resolve(cwd)
  while (true) {
    const candidate = join(directory, CONFIG_FILE_NAME)
    if (await isFile(candidate))
      return candidate

    const parent = dirname(directory)
    if (parent === directory)
      return undefined
    directory = parent
  }
}

/**
 * Read and validate a configuration file
 */
export async function loadConfigFile(configPath: string): Promise<PilotOptions> {
  let raw: string
  try {
    raw = await readFile(configPath, 'utf-8')
  }
  catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`, 'configPath')
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  }
  catch (error) {
    throw new ConfigurationError(`Failed to parse configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`, 'configPath')
  }

  const parsed = ConfigFileSchema.safeParse(json)
  if (!parsed.success)
    throw new ConfigurationError(`Invalid configuration in ${configPath}: ${formatIssues(parsed.error)}`)

  return parsed.data
}

/**
 * Read overrides from `NUGET_PILOT_*` variables. Invalid values are ignored with a warning.
 */
export function readEnvConfig(env: Environment = process.env, logger?: Logger): PilotOptions {
  const options: PilotOptions = {}

  const policy = env[`${ENV_PREFIX}UPDATE_POLICY`]
  if (policy !== undefined) {
    const parsed = parseUpdatePolicy(policy)
    if (parsed)
      options.updatePolicy = parsed
    else
      logger?.warn(`Ignoring ${ENV_PREFIX}UPDATE_POLICY=${policy}, expected patch, minor or major`)
  }

  const prerelease = env[`${ENV_PREFIX}INCLUDE_PRERELEASE`]
  if (prerelease !== undefined) {
    const value = prerelease.trim().toLowerCase()
    if (value === 'true' || value === 'false')
      options.includePrerelease = value === 'true'
    else
      logger?.warn(`Ignoring ${ENV_PREFIX}INCLUDE_PRERELEASE=${prerelease}, expected true or false`)
  }

  const parallelism = env[`${ENV_PREFIX}MAX_PARALLELISM`]
  if (parallelism !== undefined) {
    const value = Number(parallelism.trim())
    if (/^\d+$/.test(parallelism.trim()) && value >= MIN_PARALLELISM && value <= MAX_PARALLELISM)
      options.maxParallelism = value
    else
      logger?.warn(`Ignoring ${ENV_PREFIX}MAX_PARALLELISM=${parallelism}, expected an integer from ${MIN_PARALLELISM} to ${MAX_PARALLELISM}`)
  }

  const exclude = env[`${ENV_PREFIX}EXCLUDE_PACKAGES`]
  if (exclude !== undefined && exclude.trim() !== '') {
    options.excludePackages = exclude
      .split(',')
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0)
  }

  return options
}

/**
 * Check the final configuration, whatever layer each value came from
 */
export function validateConfig(config: PilotConfig): PilotConfig {
  const { maxParallelism } = config
  if (!Number.isInteger(maxParallelism) || maxParallelism < MIN_PARALLELISM || maxParallelism > MAX_PARALLELISM)
    throw new ConfigurationError(`maxParallelism must be between ${MIN_PARALLELISM} and ${MAX_PARALLELISM}. Got: ${maxParallelism}`, 'maxParallelism')

  for (const rule of config.updateRules) {
    if (rule.pattern.trim() === '')
      throw new ConfigurationError('Update rules need a non-empty pattern', 'updateRules')
  }

  return config
}

export interface ResolveConfigOptions {
  cwd?: string
  /** Explicit configuration file; searched for from `cwd` when omitted */
  configPath?: string
  env?: Environment
  /** Highest-precedence values, usually from the command line */
  overrides?: PilotOptions
  logger?: Logger
}

/**
 * Resolve the effective configuration: defaults, then file, then environment, then overrides
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<PilotConfig> {
  const cwd = options.cwd ?? process.cwd()

  let configPath: string | undefined
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath)
    if (!await isFile(configPath))
      throw new ConfigurationError(`Configuration file not found: ${configPath}`, 'configPath')
  }
  else {
    configPath = await findConfigFile(cwd)
  }

  const fileLayer = configPath ? await loadConfigFile(configPath) : {}
  if (configPath)
    options.logger?.debug(`Loaded configuration from ${configPath}`)

  const envLayer = readEnvConfig(options.env ?? process.env, options.logger)
  return validateConfig(mergeConfigs(fileLayer, envLayer, options.overrides ?? {}))
}
