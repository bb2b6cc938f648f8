import type { Stats } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { basename, dirname, extname, join, resolve } from 'node:path'
import process from 'node:process'
import { ProjectResolutionError } from '../types'
import { isProjectFile, PROJECT_FILE_EXTENSIONS } from './manifest-parser'

async function tryStat(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path)
  }
  catch {
    return undefined
  }
}

/**
 * List project files directly inside a directory, sorted by name
 */
export async function findProjectFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true })
  return entries
    .filter(entry => entry.isFile() && isProjectFile(entry.name))
    .map(entry => join(directory, entry.name))
    .sort()
}

/**
 * Resolve a user-supplied path to exactly one project file.
 * The path may name the file itself or a directory holding a single project file.
 */
export async function resolveProjectPath(input: string, cwd: string = process.cwd()): Promise<string> {
  if (input.trim() === '')
    throw new ProjectResolutionError('Project path cannot be empty', input)

  const absolute = resolve(cwd, input)
  const stats = await tryStat(absolute)
  if (!stats)
    throw new ProjectResolutionError(`Project path not found: ${absolute}`, absolute, true)

  if (stats.isFile()) {
    if (!isProjectFile(absolute)) {
      throw new ProjectResolutionError(
        `Invalid project file type: ${extname(absolute) || basename(absolute)}. Expected ${PROJECT_FILE_EXTENSIONS.join(', ')}`,
        absolute,
      )
    }
    return absolute
  }

  const projects = await findProjectFiles(absolute)
  if (projects.length === 0)
    throw new ProjectResolutionError(`No project file found in ${absolute}`, absolute, true)

  if (projects.length > 1) {
    throw new ProjectResolutionError(
      `Multiple project files found in ${absolute}: ${projects.map(p => basename(p)).join(', ')}. Pass one explicitly`,
      absolute,
    )
  }

  return projects[0]
}

/**
 * Check that a report can be written to the given path
 */
export async function validateOutputPath(outputPath: string, cwd: string = process.cwd()): Promise<string> {
  const absolute = resolve(cwd, outputPath)

  const parent = await tryStat(dirname(absolute))
  if (!parent?.isDirectory())
    throw new ProjectResolutionError(`Output directory does not exist: ${dirname(absolute)}`, absolute, true)

  const existing = await tryStat(absolute)
  if (existing?.isDirectory())
    throw new ProjectResolutionError(`Expected a file path but got a directory: ${absolute}`, absolute)

  return absolute
}
