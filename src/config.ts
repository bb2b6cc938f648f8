import type { PilotConfig, PilotOptions } from './types'
import { DEFAULT_POOL_CAPACITY } from './registry/permit-pool'
import { DEFAULT_INDEX_URL } from './registry/registry-client'

export const CONFIG_FILE_NAME = 'nuget-pilot.config.json'

export const MIN_PARALLELISM = 1
export const MAX_PARALLELISM = 16

export const defaultConfig: PilotConfig = {
  verbose: false,
  updatePolicy: 'minor',
  excludePackages: [],
  includePrerelease: false,
  maxParallelism: DEFAULT_POOL_CAPACITY,
  updateRules: [],
  registry: {
    indexUrl: DEFAULT_INDEX_URL,
    cacheTtlMinutes: 30,
  },
}

/**
 * Merge configuration layers over the defaults. Later layers win; undefined values never
 * override and lists are replaced, not concatenated.
 */
export function mergeConfigs(...layers: PilotOptions[]): PilotConfig {
  let merged: PilotConfig = {
    ...defaultConfig,
    excludePackages: [...defaultConfig.excludePackages],
    updateRules: [...defaultConfig.updateRules],
    registry: { ...defaultConfig.registry },
  }

  for (const layer of layers) {
    merged = {
      verbose: layer.verbose ?? merged.verbose,
      updatePolicy: layer.updatePolicy ?? merged.updatePolicy,
      excludePackages: layer.excludePackages ? [...layer.excludePackages] : merged.excludePackages,
      includePrerelease: layer.includePrerelease ?? merged.includePrerelease,
      maxParallelism: layer.maxParallelism ?? merged.maxParallelism,
      updateRules: layer.updateRules ? layer.updateRules.map(rule => ({ ...rule })) : merged.updateRules,
      registry: {
        indexUrl: layer.registry?.indexUrl ?? merged.registry?.indexUrl,
        cacheTtlMinutes: layer.registry?.cacheTtlMinutes ?? merged.registry?.cacheTtlMinutes,
      },
    }
  }

  return merged
}

/**
 * Typed helper for programmatic configuration
 */
export function defineConfig(config: PilotOptions): PilotOptions {
  return config
}
