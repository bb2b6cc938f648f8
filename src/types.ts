import type { NuGetVersion } from './version/nuget-version'

// Core configuration types
export interface PilotConfig {
  /** Enable verbose logging */
  verbose?: boolean

  /** Default ceiling for updates that no rule overrides */
  updatePolicy: UpdatePolicy

  /** Package patterns to exclude from updates (`*` wildcards allowed) */
  excludePackages: string[]

  /** Include prerelease versions (alpha, beta, rc, etc.) */
  includePrerelease: boolean

  /** Maximum number of simultaneous index requests (1-16) */
  maxParallelism: number

  /** Package-specific ceilings, evaluated in order, first match wins */
  updateRules: UpdateRule[]

  /** Remote index settings */
  registry?: {
    /** Base URL of the NuGet v3 flat container */
    indexUrl?: string
    /** How long version lists stay cached, in minutes */
    cacheTtlMinutes?: number
  }
}

export type PilotOptions = Partial<PilotConfig>

/** Maximum update category a caller permits */
export type UpdatePolicy = 'patch' | 'minor' | 'major'

/** Magnitude of a version change */
export type UpdateType = 'patch' | 'minor' | 'major' | 'prerelease'

export interface UpdateRule {
  /** Package name pattern (supports wildcards like "Microsoft.*") */
  pattern: string
  /** Ceiling applied to matching packages */
  policy: UpdatePolicy
}

// Manifest types
export interface PackageReference {
  /** Package id as written in the manifest */
  id: string
  /** Declared version */
  version: NuGetVersion
}

export interface ManifestLocation {
  /** Absolute path of the project file */
  manifestPath: string
  /** File that receives version mutations */
  targetPath: string
  /** Absolute path of Directory.Packages.props when central management is active */
  centralFilePath?: string
  /** Whether versions live in the central file */
  centralized: boolean
}

// Update types
export interface UpdateCandidate {
  packageId: string
  currentVersion: NuGetVersion
  /** Highest stable version, never lower than the current one */
  latestStableVersion: NuGetVersion
  /** Highest prerelease, only looked up when prereleases are included */
  latestPrereleaseVersion?: NuGetVersion
  /** Version an update would write */
  targetVersion: NuGetVersion
  updateType: UpdateType
  deprecated: boolean
}

export interface ResolutionFailure {
  packageId: string
  message: string
}

export interface UpdateScanResult {
  /** Resolved manifest and mutation target */
  location: ManifestLocation
  /** Number of references read from the manifest */
  totalPackages: number
  /** Every reference with a newer version available */
  candidates: UpdateCandidate[]
  /** Candidates admitted by policy, exclusions and rules */
  updates: UpdateCandidate[]
  /** Candidates removed by the policy filter */
  excludedCount: number
  /** Packages whose versions could not be fetched */
  failures: ResolutionFailure[]
  scannedAt: Date
  duration: number
}

// Transactional update types
export type UpdateVersionResult =
  | {
    kind: 'updated'
    packageId: string
    filePath: string
    previousVersion: string
    newVersion: string
  }
  | {
    kind: 'not-found'
    packageId: string
    filePath: string
    reason: string
  }

export interface BackupEntry {
  originalPath: string
  backupPath: string
}

export interface BackupSet {
  timestamp: string
  entries: BackupEntry[]
}

export type BatchOutcome = 'committed' | 'rolled-back' | 'rollback-failed'

export type BatchState = 'idle' | 'backed-up' | 'mutating' | BatchOutcome

export interface CandidateResult {
  packageId: string
  fromVersion: string
  toVersion: string
  success: boolean
  error?: PilotError
}

export interface BatchResult {
  outcome: BatchOutcome
  results: CandidateResult[]
  succeeded: number
  failed: number
  backup: BackupSet
  /** Set when the batch did not commit */
  error?: ValidationError | RollbackError
}

export type UpdateRunResult =
  | { status: 'up-to-date', scan: UpdateScanResult }
  | { status: 'preview', scan: UpdateScanResult }
  | { status: 'applied', scan: UpdateScanResult, batch: BatchResult }

// Report types
export interface UpdateSummary {
  totalPackages: number
  outdatedCount: number
  majorUpdates: number
  minorUpdates: number
  patchUpdates: number
  prereleaseUpdates: number
  excludedCount: number
}

export type ReportType = 'preview' | 'applied'

export type OutputFormat = 'console' | 'json'

export interface UpdateReport {
  generatedAt: Date
  projectPath: string
  type: ReportType
  updates: UpdateCandidate[]
  summary: UpdateSummary
}

export interface Logger {
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug: (message: string, ...args: unknown[]) => void
  success: (message: string, ...args: unknown[]) => void
}

// Error types
export class PilotError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown,
  ) {
    super(message)
    this.name = 'PilotError'
  }
}

export class ParseError extends PilotError {
  constructor(message: string, public filePath: string, cause?: unknown) {
    super(message, 'PARSE_ERROR', cause)
    this.name = 'ParseError'
  }
}

export class NetworkError extends PilotError {
  constructor(message: string, public packageId: string, cause?: unknown) {
    super(message, 'NETWORK_ERROR', cause)
    this.name = 'NetworkError'
  }
}

export class NotFoundError extends PilotError {
  constructor(message: string, public packageId: string, public filePath: string) {
    super(message, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

export class ValidationError extends PilotError {
  constructor(message: string, public filePaths: string[]) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
  }
}

export class RollbackError extends PilotError {
  constructor(message: string, public backup: BackupSet, cause?: unknown) {
    super(message, 'ROLLBACK_FAILED', cause)
    this.name = 'RollbackError'
  }
}

export class ConfigurationError extends PilotError {
  constructor(message: string, public configKey?: string) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigurationError'
  }
}

export class ProjectResolutionError extends PilotError {
  constructor(message: string, public projectPath: string, public missing = false) {
    super(message, 'PROJECT_RESOLUTION_ERROR')
    this.name = 'ProjectResolutionError'
  }
}

export class ScanCancelledError extends PilotError {
  constructor(message = 'Scan cancelled', cause?: unknown) {
    super(message, 'CANCELLED', cause)
    this.name = 'ScanCancelledError'
  }
}
