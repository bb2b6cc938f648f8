import type { UpdateRule } from '../src/types'
import { describe, expect, it } from 'vitest'
import { findMatchingRule, getMatchingPackages, groupByPolicy, matchesPattern } from '../src/utils/rule-matcher'

describe('Rule Matcher', () => {
  describe('matchesPattern', () => {
    it('should match a prefix wildcard', () => {
      expect(matchesPattern('Microsoft.Extensions.Logging', 'Microsoft.*')).toBe(true)
      expect(matchesPattern('Newtonsoft.Json', 'Microsoft.*')).toBe(false)
    })

    it('should match exact names ignoring case', () => {
      expect(matchesPattern('Newtonsoft.Json', 'newtonsoft.json')).toBe(true)
      expect(matchesPattern('Newtonsoft.Json.Bson', 'Newtonsoft.Json')).toBe(false)
    })

    it('should treat dots and other characters literally', () => {
      expect(matchesPattern('MicrosoftXExtensions', 'Microsoft.Extensions')).toBe(false)
      expect(matchesPattern('MicrosoftXExtensions', 'Microsoft.*')).toBe(false)
      expect(matchesPattern('Foo(1)', 'Foo(*)')).toBe(true)
    })

    it('should support wildcards anywhere', () => {
      expect(matchesPattern('System.Text.Json', '*.Json')).toBe(true)
      expect(matchesPattern('System.Text.Json', 'System.*.Json')).toBe(true)
      expect(matchesPattern('Microsoft.', 'Microsoft.*')).toBe(true)
      expect(matchesPattern('anything', '*')).toBe(true)
    })

    it('should never match a blank pattern', () => {
      expect(matchesPattern('Serilog', '')).toBe(false)
      expect(matchesPattern('Serilog', '   ')).toBe(false)
    })
  })

  describe('findMatchingRule', () => {
    const rules: UpdateRule[] = [
      { pattern: 'Microsoft.*', policy: 'minor' },
      { pattern: 'Microsoft.Extensions.*', policy: 'major' },
      { pattern: 'Newtonsoft.Json', policy: 'patch' },
    ]

    it('should return the first rule in list order', () => {
      expect(findMatchingRule('Microsoft.Extensions.Logging', rules)).toEqual({ pattern: 'Microsoft.*', policy: 'minor' })
      expect(findMatchingRule('newtonsoft.json', rules)?.policy).toBe('patch')
    })

    it('should return undefined when nothing matches', () => {
      expect(findMatchingRule('Serilog', rules)).toBeUndefined()
    })

    it('should group packages by their effective policy', () => {
      const groups = groupByPolicy(['Microsoft.Data.Sqlite', 'Serilog', 'Newtonsoft.Json'], rules, 'major')
      expect(groups.get('minor')).toEqual(['Microsoft.Data.Sqlite'])
      expect(groups.get('major')).toEqual(['Serilog'])
      expect(groups.get('patch')).toEqual(['Newtonsoft.Json'])
    })

    it('should list matching packages', () => {
      expect(getMatchingPackages(['Microsoft.Data.Sqlite', 'Serilog', 'microsoft.identity.client'], 'Microsoft.*'))
        .toEqual(['Microsoft.Data.Sqlite', 'microsoft.identity.client'])
    })
  })
})
