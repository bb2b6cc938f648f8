import type { ManifestLocation } from '../src/types'
import { readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { NotFoundError, RollbackError, ValidationError } from '../src/types'
import { formatBackupTimestamp, getBackupPath, PackageUpdater } from '../src/update/package-updater'
import { parseManifest } from '../src/utils/manifest-parser'
import { candidate, createTempDir, createTestLogger, projectFile } from './test-utils'

const NOW = new Date(2024, 9, 5, 14, 30, 0)

describe('PackageUpdater', () => {
  describe('backup naming', () => {
    it('should format the timestamp in local time', () => {
      expect(formatBackupTimestamp(NOW)).toBe('20241005143000')
      expect(formatBackupTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102030405')
    })

    it('should insert the timestamp before the extension', () => {
      expect(getBackupPath(join('repo', 'App.csproj'), '20241005143000')).toBe(join('repo', 'App.backup.20241005143000.csproj'))
      expect(getBackupPath(join('repo', 'Directory.Packages.props'), '20241005143000'))
        .toBe(join('repo', 'Directory.Packages.backup.20241005143000.props'))
    })
  })

  describe('applyUpdates', () => {
    let root: string
    let manifestPath: string
    let location: ManifestLocation
    let original: string

    beforeEach(async () => {
      root = await createTempDir()
      manifestPath = join(root, 'App.csproj')
      location = { manifestPath, targetPath: manifestPath, centralized: false }
      original = projectFile(`    <PackageReference Include="Newtonsoft.Json" Version="12.0.3" />
    <PackageReference Include="Serilog" Version="3.1.1" />`)
      await writeFile(manifestPath, original)
    })

    afterEach(async () => {
      vi.restoreAllMocks()
      await rm(root, { recursive: true, force: true })
    })

    it('should commit every applied update and keep a backup', async () => {
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      const result = await updater.applyUpdates(location, [
        candidate('Newtonsoft.Json', '12.0.3', '13.0.3', 'major'),
        candidate('Serilog', '3.1.1', '3.2.0', 'minor'),
      ])

      expect(result.outcome).toBe('committed')
      expect(result.succeeded).toBe(2)
      expect(result.failed).toBe(0)
      expect(updater.state).toBe('committed')

      const updated = await readFile(manifestPath, 'utf-8')
      expect(updated).toBe(original.replace('12.0.3', '13.0.3').replace('3.1.1', '3.2.0'))

      const backupPath = join(root, 'App.backup.20241005143000.csproj')
      expect(result.backup.entries).toEqual([{ originalPath: manifestPath, backupPath }])
      expect(await readFile(backupPath, 'utf-8')).toBe(original)
    })

    it('should record a missing package without failing the batch', async () => {
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      const result = await updater.applyUpdates(location, [
        candidate('xunit', '2.4.1', '2.4.2', 'patch'),
        candidate('Serilog', '3.1.1', '3.1.2', 'patch'),
      ])

      expect(result.outcome).toBe('committed')
      expect(result.succeeded).toBe(1)
      expect(result.failed).toBe(1)
      expect(result.results[0].success).toBe(false)
      expect(result.results[0].error).toBeInstanceOf(NotFoundError)
      expect(result.results[1]).toEqual({ packageId: 'Serilog', fromVersion: '3.1.1', toVersion: '3.1.2', success: true })
    })

    it('should update the central version file under central management', async () => {
      const propsPath = join(root, 'Directory.Packages.props')
      const props = `<Project>
  <ItemGroup>
    <PackageVersion Include="Serilog" Version="3.1.1" />
  </ItemGroup>
</Project>
`
      await writeFile(propsPath, props)
      const central: ManifestLocation = { manifestPath, targetPath: propsPath, centralFilePath: propsPath, centralized: true }
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      const result = await updater.applyUpdates(central, [candidate('Serilog', '3.1.1', '4.0.0', 'major')])

      expect(result.outcome).toBe('committed')
      expect(await readFile(propsPath, 'utf-8')).toBe(props.replace('3.1.1', '4.0.0'))
      expect(await readFile(manifestPath, 'utf-8')).toBe(original)
      expect(result.backup.entries.map(entry => entry.backupPath)).toEqual([
        join(root, 'App.backup.20241005143000.csproj'),
        join(root, 'Directory.Packages.backup.20241005143000.props'),
      ])
    })

    it('should update the live reference and leave commented ones alone', async () => {
      const commented = projectFile(`    <!-- <PackageReference Include="Newtonsoft.Json" Version="11.0.1" /> -->
    <PackageReference Include="Newtonsoft.Json" Version="12.0.3" />`)
      await writeFile(manifestPath, commented)
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      const result = await updater.applyUpdates(location, [candidate('Newtonsoft.Json', '12.0.3', '13.0.3', 'major')])

      expect(result.outcome).toBe('committed')
      expect((await parseManifest(manifestPath)).map(reference => reference.version.toString())).toEqual(['13.0.3'])
      expect(await readFile(manifestPath, 'utf-8')).toBe(commented.replace('Version="12.0.3"', 'Version="13.0.3"'))
    })

    it('should not find a package that only appears in a comment', async () => {
      const commented = projectFile(`    <!-- <PackageReference Include="Serilog" Version="3.1.1" /> -->
    <PackageReference Include="Newtonsoft.Json" Version="12.0.3" />`)
      await writeFile(manifestPath, commented)
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      const result = await updater.updateVersion(location, 'Serilog', '4.0.0')

      expect(result.kind).toBe('not-found')
      expect(await readFile(manifestPath, 'utf-8')).toBe(commented)
    })

    it('should roll back when the result is no longer well-formed', async () => {
      const logger = createTestLogger()
      const updater = new PackageUpdater(logger, { now: () => NOW })
      vi.spyOn(updater, 'updateVersion').mockImplementation(async (target, packageId, newVersion) => {
        await writeFile(target.targetPath, '<Project><ItemGroup>')
        return { kind: 'updated', packageId, filePath: target.targetPath, previousVersion: '3.1.1', newVersion }
      })

      const result = await updater.applyUpdates(location, [candidate('Serilog', '3.1.1', '3.2.0', 'minor')])

      expect(result.outcome).toBe('rolled-back')
      expect(result.error).toBeInstanceOf(ValidationError)
      expect(updater.state).toBe('rolled-back')
      expect(await readFile(manifestPath, 'utf-8')).toBe(original)
      expect(logger.warn).toHaveBeenCalledWith('Changes rolled back')
    })

    it('should report a failed rollback', async () => {
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })
      vi.spyOn(updater, 'updateVersion').mockImplementation(async (target, packageId, newVersion) => {
        await writeFile(target.targetPath, '<Project><ItemGroup>')
        return { kind: 'updated', packageId, filePath: target.targetPath, previousVersion: '3.1.1', newVersion }
      })
      vi.spyOn(updater, 'restore').mockRejectedValue(new Error('disk full'))

      const result = await updater.applyUpdates(location, [candidate('Serilog', '3.1.1', '3.2.0', 'minor')])

      expect(result.outcome).toBe('rollback-failed')
      expect(result.error).toBeInstanceOf(RollbackError)
      expect(result.error?.message).toBe('disk full')
      expect(updater.state).toBe('rollback-failed')
    })

    it('should name the files a restore could not write', async () => {
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })
      const backup = {
        timestamp: '20241005143000',
        entries: [{ originalPath: manifestPath, backupPath: join(root, 'missing.backup.csproj') }],
      }

      await expect(updater.restore(backup)).rejects.toThrow(`Failed to restore ${manifestPath} from backup`)
    })

    it('should never overwrite an existing backup', async () => {
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })
      await updater.applyUpdates(location, [candidate('Serilog', '3.1.1', '3.2.0', 'minor')])

      await expect(updater.applyUpdates(location, [candidate('Serilog', '3.2.0', '3.3.0', 'minor')]))
        .rejects
        .toMatchObject({ code: 'BACKUP_FAILED' })
      expect(await readFile(join(root, 'App.backup.20241005143000.csproj'), 'utf-8')).toBe(original)
      expect((await readdir(root)).sort()).toEqual(['App.backup.20241005143000.csproj', 'App.csproj'])
    })

    it('should remove the backups already written when a later one fails', async () => {
      const propsPath = join(root, 'Directory.Packages.props')
      const takenPath = join(root, 'Directory.Packages.backup.20241005143000.props')
      await writeFile(propsPath, '<Project />')
      await writeFile(takenPath, '<Project />')
      const central: ManifestLocation = { manifestPath, targetPath: propsPath, centralFilePath: propsPath, centralized: true }
      const updater = new PackageUpdater(createTestLogger(), { now: () => NOW })

      await expect(updater.createBackup(central)).rejects.toMatchObject({ code: 'BACKUP_FAILED' })
      expect((await readdir(root)).sort()).toEqual([
        'App.csproj',
        'Directory.Packages.backup.20241005143000.props',
        'Directory.Packages.props',
      ])
    })
  })
})
