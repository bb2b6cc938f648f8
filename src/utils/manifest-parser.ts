import type { Logger, ManifestLocation, PackageReference } from '../types'
import { readFile, stat } from 'node:fs/promises'
import { basename, dirname, extname, resolve } from 'node:path'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { ParseError } from '../types'
import { parseVersion } from '../version/nuget-version'

/** Share of version-less references above which a manifest is treated as centrally managed */
export const CENTRAL_MANAGEMENT_THRESHOLD = 0.8

export const CENTRAL_VERSION_FILE = 'Directory.Packages.props'

export const PROJECT_FILE_EXTENSIONS = ['.csproj', '.fsproj', '.vbproj'] as const

export const REFERENCE_ELEMENT = 'PackageReference'
export const CENTRAL_ELEMENT = 'PackageVersion'
const CENTRAL_FLAG = 'ManagePackageVersionsCentrally'

interface XmlElement {
  name: string
  attributes: Map<string, string>
  children: XmlElement[]
  text: string
}

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readAttributes(value: unknown): Map<string, string> {
  const attributes = new Map<string, string>()
  if (isRecord(value)) {
    for (const [key, attr] of Object.entries(value)) {
      if (typeof attr === 'string')
        attributes.set(key.toLowerCase(), attr)
    }
  }
  return attributes
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes))
    return []

  const elements: XmlElement[] = []
  const list: unknown[] = nodes
  for (const node of list) {
    if (!isRecord(node))
      continue

    for (const [key, value] of Object.entries(node)) {
      if (key === ':@' || key.startsWith('#') || key.startsWith('?'))
        continue

      const children = toElements(value)
      const text = Array.isArray(value)
        ? value.map(child => (isRecord(child) && typeof child['#text'] === 'string' ? child['#text'] : '')).join('')
        : ''
      elements.push({ name: key, attributes: readAttributes(node[':@']), children, text })
    }
  }
  return elements
}

function* descendants(elements: XmlElement[], ...names: string[]): Generator<XmlElement> {
  for (const element of elements) {
    if (names.includes(element.name))
      yield element
    yield* descendants(element.children, ...names)
  }
}

/**
 * Check if a file path looks like a project file we can handle
 */
export function isProjectFile(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase()
  return PROJECT_FILE_EXTENSIONS.some(candidate => candidate === ext)
}

/**
 * Check whether content is well-formed XML with a root element
 */
export function isWellFormedContent(content: string): boolean {
  if (XMLValidator.validate(content) !== true)
    return false
  return toElements(xmlParser.parse(content)).length > 0
}

function parseDocument(filePath: string, content: string): XmlElement[] {
  const validation = XMLValidator.validate(content)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new ParseError(`Malformed XML in ${filePath}: ${msg} (line ${line})`, filePath, validation.err)
  }

  const elements = toElements(xmlParser.parse(content))
  if (elements.length === 0)
    throw new ParseError(`No root element in ${filePath}`, filePath)

  return elements
}

async function loadDocument(filePath: string): Promise<XmlElement[]> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  }
  catch (error) {
    throw new ParseError(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`, filePath, error)
  }
  return parseDocument(filePath, content)
}

function collectReferences(elements: XmlElement[]): PackageReference[] {
  const references: PackageReference[] = []
  for (const element of descendants(elements, REFERENCE_ELEMENT, CENTRAL_ELEMENT)) {
    const id = element.attributes.get('include')?.trim()
    const rawVersion = element.attributes.get('version')
    if (!id || rawVersion === undefined)
      continue

    const version = parseVersion(rawVersion)
    if (version)
      references.push({ id, version })
  }
  return references
}

/**
 * Parse package references from manifest content, in document order.
 * Entries without an id, without a version or with an unparsable version are skipped.
 */
export function parseManifestContent(filePath: string, content: string): PackageReference[] {
  return collectReferences(parseDocument(filePath, content))
}

/**
 * Parse package references from a manifest or central version file
 */
export async function parseManifest(filePath: string): Promise<PackageReference[]> {
  return collectReferences(await loadDocument(filePath))
}

/**
 * Ids of every PackageReference in a manifest, whether or not it declares a version
 */
export async function readReferenceIds(filePath: string): Promise<string[]> {
  const ids: string[] = []
  for (const element of descendants(await loadDocument(filePath), REFERENCE_ELEMENT)) {
    const id = element.attributes.get('include')?.trim()
    if (id)
      ids.push(id)
  }
  return ids
}

/**
 * Detect central package management: an explicit `ManagePackageVersionsCentrally` flag,
 * or more than `threshold` of the references declared without a version.
 */
export async function detectCentralizedManagement(
  filePath: string,
  threshold: number = CENTRAL_MANAGEMENT_THRESHOLD,
): Promise<boolean> {
  const elements = await loadDocument(filePath)

  for (const flag of descendants(elements, CENTRAL_FLAG)) {
    if (flag.text.trim().toLowerCase() === 'true')
      return true
  }

  const references = [...descendants(elements, REFERENCE_ELEMENT)]
  if (references.length === 0)
    return false

  const withoutVersion = references.filter(element => !element.attributes.has('version')).length
  return withoutVersion / references.length > threshold
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
 * Find the nearest Directory.Packages.props, starting in the manifest's own directory
 * and walking up at most `maxLevels` directories.
 */
export async function locateCentralVersionFile(manifestPath: string, maxLevels = 5): Promise<string | undefined> {
  let directory = dirname(resolve(manifestPath))

  for (let level = 0; level < maxLevels; level++) {
    const candidate = resolve(directory, CENTRAL_VERSION_FILE)
    if (await isFile(candidate))
      return candidate

    const parent = dirname(directory)
    if (parent === directory)
      break
    directory = parent
  }

  return undefined
}

export interface LocationOptions {
  threshold?: number
  logger?: Logger
}

/**
 * Decide which file receives version mutations for a manifest
 */
export async function resolveManifestLocation(manifestPath: string, options: LocationOptions = {}): Promise<ManifestLocation> {
  const absolute = resolve(manifestPath)
  const manifestMode: ManifestLocation = { manifestPath: absolute, targetPath: absolute, centralized: false }

  if (!await detectCentralizedManagement(absolute, options.threshold))
    return manifestMode

  const centralFilePath = await locateCentralVersionFile(absolute)
  if (!centralFilePath) {
    options.logger?.warn(`Central package management detected for ${basename(absolute)} but no ${CENTRAL_VERSION_FILE} was found, updating the project file instead`)
    return manifestMode
  }

  options.logger?.debug(`Using central version file ${centralFilePath}`)
  return { manifestPath: absolute, targetPath: centralFilePath, centralFilePath, centralized: true }
}

/**
 * Check that a file exists, is well-formed XML and has a root element
 */
export async function isWellFormedDocument(filePath: string): Promise<boolean> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  }
  catch {
    return false
  }
  return isWellFormedContent(content)
}

const START_TAG_ATTRIBUTES = String.raw`(?:[^>"']|"[^"]*"|'[^']*')*`
const UNPARSED_SPANS = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g

/** Blank comments and CDATA sections, keeping every offset in place. */
export function maskUnparsedSpans(content: string): string {
  return content.replace(UNPARSED_SPANS, span => span.replace(/[^\r\n]/g, ' '))
}

export interface ContentUpdate {
  content: string
  previousVersion: string
}

/**
 * Rewrite the `Version` attribute of the element whose `Include` matches `packageId`.
 * Every other byte is kept. Returns undefined when no such element carries a version.
 * Elements inside comments or CDATA are never matched.
 */
export function updateManifestContent(
  content: string,
  packageId: string,
  newVersion: string,
  elementName: string = REFERENCE_ELEMENT,
): ContentUpdate | undefined {
  const tagPattern = new RegExp(`<${elementName}\\b${START_TAG_ATTRIBUTES}\\/?>`, 'g')
  const includePattern = /\sInclude\s*=\s*(["'])(.*?)\1/i
  const versionPattern = /(\sVersion\s*=\s*)(["'])([^"']*)\2/i
  const wanted = packageId.toLowerCase()

  for (const match of maskUnparsedSpans(content).matchAll(tagPattern)) {
    const tag = match[0]
    const include = includePattern.exec(tag)
    if (!include || include[2].trim().toLowerCase() !== wanted)
      continue

    const version = versionPattern.exec(tag)
    if (!version)
      continue

    const start = (match.index ?? 0) + version.index
    const replaced = `${version[1]}${version[2]}${newVersion}${version[2]}`
    return {
      content: content.slice(0, start) + replaced + content.slice(start + version[0].length),
      previousVersion: version[3],
    }
  }

  return undefined
}
