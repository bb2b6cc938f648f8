export * from './types'

// Core functionality exports
export { Pilot } from './pilot'
export type { PilotDependencies, ScanRunOptions, UpdateRunOptions } from './pilot'
export { PackageScanner } from './scanner/package-scanner'
export { RegistryClient, DEFAULT_INDEX_URL } from './registry/registry-client'
export { PermitPool, DEFAULT_POOL_CAPACITY } from './registry/permit-pool'
export { PackageUpdater, formatBackupTimestamp, getBackupPath } from './update/package-updater'
export { ReportGenerator } from './report/report-generator'
export { Logger } from './utils/logger'

// Versions and policy
export { NuGetVersion, maxVersion, parseVersion } from './version/nuget-version'
export { buildCandidate, classify, selectLatest } from './version/update-classifier'
export { applyPolicies, getEffectivePolicy, isWithinPolicy, partitionByPolicy } from './policy/policy-filter'
export { findMatchingRule, getMatchingPackages, groupByPolicy, matchesPattern } from './utils/rule-matcher'

// Manifests
export {
  CENTRAL_MANAGEMENT_THRESHOLD,
  CENTRAL_VERSION_FILE,
  detectCentralizedManagement,
  isWellFormedDocument,
  locateCentralVersionFile,
  parseManifest,
  readReferenceIds,
  resolveManifestLocation,
} from './utils/manifest-parser'
export { resolveProjectPath } from './utils/project-path'

// Configuration
export { defaultConfig, defineConfig, mergeConfigs } from './config'
export { loadConfigFile, readEnvConfig, resolveConfig } from './config/config-loader'

// CLI exports
export { createCLI, ExitCode } from './cli/cli'
export { runCLI } from './cli/commands'
