import type { PolicyOptions } from '../src/policy/policy-filter'
import { describe, expect, it } from 'vitest'
import { applyPolicies, getEffectivePolicy, isWithinPolicy, partitionByPolicy } from '../src/policy/policy-filter'
import { candidate } from './test-utils'

describe('Policy Filter', () => {
  describe('isWithinPolicy', () => {
    it('should admit only patches under the patch ceiling', () => {
      expect(isWithinPolicy('patch', 'patch')).toBe(true)
      expect(isWithinPolicy('minor', 'patch')).toBe(false)
      expect(isWithinPolicy('major', 'patch')).toBe(false)
      expect(isWithinPolicy('prerelease', 'patch')).toBe(false)
    })

    it('should admit patches and minors under the minor ceiling', () => {
      expect(isWithinPolicy('patch', 'minor')).toBe(true)
      expect(isWithinPolicy('minor', 'minor')).toBe(true)
      expect(isWithinPolicy('major', 'minor')).toBe(false)
      expect(isWithinPolicy('prerelease', 'minor')).toBe(false)
    })

    it('should admit every category under the major ceiling', () => {
      expect(isWithinPolicy('major', 'major')).toBe(true)
      expect(isWithinPolicy('prerelease', 'major')).toBe(true)
    })
  })

  describe('getEffectivePolicy', () => {
    it('should fall back to the default policy', () => {
      expect(getEffectivePolicy('Serilog', [{ pattern: 'Microsoft.*', policy: 'major' }], 'patch')).toBe('patch')
      expect(getEffectivePolicy('Microsoft.Data.Sqlite', [{ pattern: 'Microsoft.*', policy: 'major' }], 'patch')).toBe('major')
    })
  })

  describe('partitionByPolicy', () => {
    const candidates = [
      candidate('Newtonsoft.Json', '12.0.3', '13.0.3', 'major'),
      candidate('Serilog', '3.0.0', '3.1.1', 'minor'),
      candidate('Microsoft.Extensions.Logging', '7.0.0', '8.0.0', 'major'),
      candidate('xunit', '2.4.1', '2.4.2', 'patch'),
    ]

    it('should keep only updates within the default ceiling', () => {
      const options: PolicyOptions = { updatePolicy: 'minor', excludePackages: [], updateRules: [] }
      const result = partitionByPolicy(candidates, options)
      expect(result.admitted.map(c => c.packageId)).toEqual(['Serilog', 'xunit'])
      expect(result.blocked.map(c => c.packageId)).toEqual(['Newtonsoft.Json', 'Microsoft.Extensions.Logging'])
      expect(result.excluded).toEqual([])
    })

    it('should let a rule raise the ceiling for matching packages', () => {
      const options: PolicyOptions = {
        updatePolicy: 'patch',
        excludePackages: [],
        updateRules: [{ pattern: 'Microsoft.*', policy: 'major' }],
      }
      expect(applyPolicies(candidates, options).map(c => c.packageId)).toEqual(['Microsoft.Extensions.Logging', 'xunit'])
    })

    it('should drop excluded packages before any rule applies', () => {
      const options: PolicyOptions = {
        updatePolicy: 'major',
        excludePackages: ['newtonsoft.*', 'XUNIT'],
        updateRules: [{ pattern: 'Newtonsoft.Json', policy: 'major' }],
      }
      const result = partitionByPolicy(candidates, options)
      expect(result.excluded.map(c => c.packageId)).toEqual(['Newtonsoft.Json', 'xunit'])
      expect(result.admitted.map(c => c.packageId)).toEqual(['Serilog', 'Microsoft.Extensions.Logging'])
    })

    it('should not mutate its input', () => {
      const input = [...candidates]
      applyPolicies(input, { updatePolicy: 'patch', excludePackages: ['Serilog'], updateRules: [] })
      expect(input).toEqual(candidates)
    })
  })
})
