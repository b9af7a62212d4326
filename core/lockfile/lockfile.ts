/**
 * Lock File Reading, Writing and Comparison
 *
 * `rockyard.lock` is JSON with sorted keys so that identical resolutions
 * produce identical bytes.
 */

import { randomBytes } from 'node:crypto'
import { readFile, rename, rm, writeFile } from 'node:fs/promises'
import { IntegrityViolationError, ParseError, ValidationError } from '../errors/index.js'
import { calculateIntegrity, integrityEquals } from '../integrity/index.js'
import type { PackageDescriptor, PackageName } from '../rockspec/index.js'
import type { ResolutionRequest, ResolvedGraph } from '../resolver/index.js'
import { formatConstraint, parseVersion, tryParseConstraint } from '../version/index.js'
import type { Constraint, Version } from '../version/index.js'
import type {
  LoadResult,
  LockData,
  LockDiff,
  LockEntry,
  LockHashes,
  LockRecord,
  LockValidation,
  SyncPlan,
} from './types.js'
import { LOCKFILE_VERSION } from './types.js'

// =============================================================================
// Load / save
// =============================================================================

export async function load(path: string): Promise<LoadResult> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'absent' }
    }
    throw error
  }
  return { status: 'loaded', data: parseLockData(text, path) }
}

/**
 * Parse and validate lockfile text
 */
export function parseLockData(text: string, path?: string): LockData {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ParseError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, { path })
  }

  const fail = (reason: string): never => {
    throw new ParseError(reason, { path })
  }

  if (!isRecord(raw)) return fail('lockfile must be an object')
  if (typeof raw.version !== 'string' || raw.version.split('.')[0] !== LOCKFILE_VERSION.split('.')[0]) {
    return fail(`unsupported lockfile version ${JSON.stringify(raw.version)}`)
  }

  const entrypoints = stringMap(raw.entrypoints) ?? fail('entrypoints must map names to constraints')
  for (const [name, text] of Object.entries(entrypoints)) {
    if (!tryParseConstraint(text)) fail(`invalid constraint for entrypoint ${name}: "${text}"`)
  }

  if (!isRecord(raw.rocks)) return fail('rocks must be an object')
  // Entries are defined, not assigned, so any valid name survives
  const rocks: Record<PackageName, LockEntry> = Object.fromEntries(
    Object.entries(raw.rocks).map(([name, value]) => [name, parseEntry(name, value, fail)])
  )

  return { version: raw.version, entrypoints, rocks }
}

function parseEntry(name: string, value: unknown, fail: (reason: string) => never): LockEntry {
  if (!isRecord(value)) return fail(`rocks.${name} must be an object`)
  const { version, pinned, constraint, source, hashes, dependencies, binaries } = value

  if (typeof version !== 'string') return fail(`rocks.${name}.version must be a string`)
  try {
    parseVersion(version)
  } catch {
    fail(`rocks.${name}.version "${version}" is not a version`)
  }
  if (typeof pinned !== 'boolean') return fail(`rocks.${name}.pinned must be a boolean`)
  if (typeof constraint !== 'string' || !tryParseConstraint(constraint)) {
    return fail(`rocks.${name}.constraint is not a valid constraint`)
  }
  if (typeof source !== 'string') return fail(`rocks.${name}.source must be a string`)

  const hashMap = stringMap(hashes) ?? fail(`rocks.${name}.hashes must map kinds to digests`)
  const deps = stringMap(dependencies) ?? fail(`rocks.${name}.dependencies must map names to versions`)
  if (!Array.isArray(binaries) || !binaries.every((b): b is string => typeof b === 'string')) {
    return fail(`rocks.${name}.binaries must be a list of strings`)
  }

  const entryHashes: LockHashes = {}
  if (hashMap.rockspec !== undefined) entryHashes.rockspec = hashMap.rockspec
  if (hashMap.source !== undefined) entryHashes.source = hashMap.source

  return { version, pinned, constraint, source, hashes: entryHashes, dependencies: deps, binaries }
}

/**
 * Deterministic JSON: sorted keys, 2-space indent, trailing newline
 */
export function serialize(data: LockData): string {
  return `${JSON.stringify(sortKeys(data), null, 2)}\n`
}

/**
 * Write to `<path>.<random>.tmp`, then rename over `path`
 */
export async function save(path: string, data: LockData): Promise<void> {
  const tmp = `${path}.${randomBytes(6).toString('hex')}.tmp`
  try {
    await writeFile(tmp, serialize(data))
    await rename(tmp, path)
  } catch (error) {
    await rm(tmp, { force: true })
    throw error
  }
}

// =============================================================================
// Building
// =============================================================================

export function emptyLock(): LockData {
  return { version: LOCKFILE_VERSION, entrypoints: {}, rocks: {} }
}

/**
 * Where a descriptor's source comes from
 */
export function sourceLocator(descriptor: PackageDescriptor): string {
  const source = descriptor.source
  switch (source.kind) {
    case 'url':
      return source.url
    case 'git':
      return `git+${source.url}${source.ref ? `#${source.ref}` : ''}`
    case 'file':
      return source.path
  }
}

function constraintText(constraint: Constraint): string {
  return constraint.raw || formatConstraint(constraint)
}

/**
 * Lock data for a resolved graph. Source digests and binaries come from
 * `records`, falling back to the previous entry when the version is
 * unchanged. Pins carry over from `prev`.
 */
export function fromGraph(
  graph: ResolvedGraph,
  records: ReadonlyMap<PackageName, LockRecord> = new Map(),
  prev?: LockData
): LockData {
  const entrypoints = new Map<PackageName, string>()
  const incoming = new Map<PackageName, string[]>()
  const note = (name: PackageName, text: string): void => {
    if (text === '') return
    const list = incoming.get(name) ?? []
    if (!list.includes(text)) list.push(text)
    incoming.set(name, list)
  }

  for (const root of graph.roots) {
    const text = constraintText(root.constraint)
    const previous = entrypoints.get(root.name)
    entrypoints.set(root.name, previous ? `${previous}, ${text}` : text)
    note(root.name, text)
  }
  for (const node of graph.nodes.values()) {
    for (const [dep, text] of Object.entries(node.constraints)) {
      note(dep, text)
    }
  }

  const rocks = new Map<PackageName, LockEntry>()
  for (const node of graph.nodes.values()) {
    const version = node.version.toString()
    const previous = prev?.rocks[node.name]
    const sameVersion = previous?.version === version
    const record = records.get(node.name)

    const hashes: LockHashes = { rockspec: calculateIntegrity(node.descriptor.rockspec) }
    const source = record?.hashes.source ?? (sameVersion ? previous?.hashes.source : undefined)
    if (source !== undefined) hashes.source = source

    const dependencies = new Map<PackageName, string>()
    for (const dep of node.dependencies) {
      const target = graph.nodes.get(dep)
      if (target) dependencies.set(dep, target.version.toString())
    }

    rocks.set(node.name, {
      version,
      pinned: previous?.pinned ?? false,
      constraint: (incoming.get(node.name) ?? []).join(', '),
      source: sourceLocator(node.descriptor),
      hashes,
      dependencies: Object.fromEntries(dependencies),
      binaries: [...(record?.binaries ?? (sameVersion ? previous?.binaries : undefined) ?? [])].sort(),
    })
  }

  return { version: LOCKFILE_VERSION, entrypoints: Object.fromEntries(entrypoints), rocks: Object.fromEntries(rocks) }
}

// =============================================================================
// Queries
// =============================================================================

export function diff(before: LockData | undefined, after: LockData): LockDiff {
  const result: LockDiff = { added: [], removed: [], changed: [] }
  const old = before?.rocks ?? {}

  for (const name of Object.keys(after.rocks).sort()) {
    const from = Object.hasOwn(old, name) ? old[name] : undefined
    const to = after.rocks[name]
    if (!from) {
      result.added.push({ name, version: to.version })
    } else if (from.version !== to.version) {
      result.changed.push({ name, from: from.version, to: to.version })
    }
  }
  for (const name of Object.keys(old).sort()) {
    if (!Object.hasOwn(after.rocks, name)) {
      result.removed.push({ name, version: old[name].version })
    }
  }
  return result
}

export function lockedVersions(data: LockData): Map<PackageName, Version> {
  const out = new Map<PackageName, Version>()
  for (const [name, entry] of Object.entries(data.rocks)) {
    out.set(name, parseVersion(entry.version))
  }
  return out
}

export function pinnedNames(data: LockData): Set<PackageName> {
  return new Set(Object.keys(data.rocks).filter((name) => data.rocks[name].pinned))
}

/**
 * Compare fetched digests with the entry; a digest the entry lacks is not
 * checked
 */
export function verifyEntry(name: PackageName, entry: LockEntry, actual: LockHashes): void {
  for (const kind of ['rockspec', 'source'] as const) {
    const expected = entry.hashes[kind]
    const got = actual[kind]
    if (expected !== undefined && got !== undefined && !integrityEquals(expected, got)) {
      throw new IntegrityViolationError(name, kind, expected, got)
    }
  }
}

export function setPinned(data: LockData, name: PackageName, pinned: boolean): LockData {
  const entry = data.rocks[name]
  if (!entry) {
    throw new ValidationError(`${name} is not in the lockfile`, { package: name })
  }
  return { ...data, rocks: { ...data.rocks, [name]: { ...entry, pinned } } }
}

/**
 * Roots whose request differs from the recorded entrypoints
 */
export function syncPlan(data: LockData, roots: readonly ResolutionRequest[]): SyncPlan {
  const requested = new Map<PackageName, string>()
  for (const root of roots) {
    const text = constraintText(root.constraint)
    const previous = requested.get(root.name)
    requested.set(root.name, previous ? `${previous}, ${text}` : text)
  }

  const toAdd = [...requested.keys()]
    .filter((name) => data.entrypoints[name] !== requested.get(name) || !(name in data.rocks))
    .sort()
  const toRemove = Object.keys(data.entrypoints)
    .filter((name) => !requested.has(name))
    .sort()
  return { toAdd, toRemove }
}

export function validate(data: LockData): LockValidation {
  const errors: string[] = []
  const warnings: string[] = []

  for (const name of Object.keys(data.entrypoints).sort()) {
    if (!(name in data.rocks)) {
      errors.push(`Entrypoint ${name} has no locked rock`)
    }
  }

  for (const name of Object.keys(data.rocks).sort()) {
    const entry = data.rocks[name]
    for (const [dep, version] of Object.entries(entry.dependencies)) {
      const target = data.rocks[dep]
      if (!target) {
        errors.push(`${name} depends on ${dep}, which is not locked`)
      } else if (target.version !== version) {
        errors.push(`${name} expects ${dep}@${version} but ${target.version} is locked`)
      }
    }
    if (!entry.hashes.rockspec) {
      warnings.push(`Missing rockspec hash for ${name}`)
    }
    if (!entry.hashes.source) {
      warnings.push(`Missing source hash for ${name}`)
    }
  }

  return { valid: errors.length === 0, errors, warnings }
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined
  const entries: [string, string][] = []
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') return undefined
    entries.push([key, item])
  }
  return Object.fromEntries(entries)
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])])
    )
  }
  return value
}
