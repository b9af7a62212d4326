/**
 * Project file
 *
 * `rockyard.toml` at the project root:
 *
 * ```toml
 * package = "app"
 * version = "0.1.0"
 * lua = ">= 5.1"
 *
 * [dependencies]
 * luasocket = "~> 3.0"
 *
 * [build_dependencies]
 * luarocks-build-treesitter = ">= 1.0"
 * ```
 *
 * @module core/project
 */

import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import * as TOML from 'smol-toml'
import { isMissingFile } from '../config/index.js'
import { ParseError, ValidationError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { ResolutionRequest } from '../resolver/index.js'
import { normalizePackageName, type PackageName } from '../rockspec/index.js'
import { parseConstraint, parseVersion, satisfies } from '../version/index.js'

export const PROJECT_FILE = 'rockyard.toml'

export interface Project {
  /** Location of the project file */
  path: string
  package?: string
  version?: string
  /** Constraint on the Lua runtime */
  lua?: string
  /** Name -> constraint text */
  dependencies: Record<PackageName, string>
  buildDependencies: Record<PackageName, string>
}

export function emptyProject(dir: string): Project {
  return { path: join(dir, PROJECT_FILE), dependencies: {}, buildDependencies: {} }
}

// =============================================================================
// Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function constraintTable(value: unknown, key: string, path: string): Record<PackageName, string> {
  if (value === undefined) return {}
  if (!isRecord(value)) {
    throw new ValidationError(`${key} must be a table`, { path })
  }
  const out: Record<PackageName, string> = {}
  for (const [rawName, text] of Object.entries(value)) {
    if (typeof text !== 'string') {
      throw new ValidationError(`${key}.${rawName} must be a constraint string`, { path })
    }
    parseConstraint(text)
    out[normalizePackageName(rawName)] = text.trim()
  }
  return out
}

export function parseProject(text: string, path: string): Project {
  let table: Record<string, unknown>
  try {
    table = TOML.parse(text)
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : String(error), { path })
  }

  const str = (key: string): string | undefined => {
    const value = table[key]
    if (value === undefined) return undefined
    if (typeof value !== 'string') throw new ValidationError(`${key} must be a string`, { path })
    return value
  }

  const lua = str('lua')
  if (lua !== undefined) parseConstraint(lua)

  return {
    path,
    package: str('package'),
    version: str('version'),
    lua,
    dependencies: constraintTable(table.dependencies, 'dependencies', path),
    buildDependencies: constraintTable(table.build_dependencies, 'build_dependencies', path),
  }
}

export async function loadProject(dir: string): Promise<Project | undefined> {
  const path = join(dir, PROJECT_FILE)
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`No ${PROJECT_FILE} in ${dir}`)
      return undefined
    }
    throw error
  }
  return parseProject(text, path)
}

// =============================================================================
// Writing
// =============================================================================

function sorted(map: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const key of Object.keys(map).sort()) {
    out[key] = map[key]
  }
  return out
}

export function serializeProject(project: Project): string {
  const table: Record<string, unknown> = {}
  if (project.package !== undefined) table.package = project.package
  if (project.version !== undefined) table.version = project.version
  if (project.lua !== undefined) table.lua = project.lua
  table.dependencies = sorted(project.dependencies)
  if (Object.keys(project.buildDependencies).length > 0) {
    table.build_dependencies = sorted(project.buildDependencies)
  }
  return `${TOML.stringify(table).trimEnd()}\n`
}

export async function saveProject(project: Project): Promise<void> {
  await writeFile(project.path, serializeProject(project))
  logger.debug(`Wrote ${project.path}`)
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Root requests: dependencies, then build dependencies not already listed
 */
export function projectRequests(project: Project): ResolutionRequest[] {
  const requests: ResolutionRequest[] = []
  for (const [name, text] of Object.entries(project.dependencies)) {
    requests.push({ name, constraint: parseConstraint(text) })
  }
  for (const [name, text] of Object.entries(project.buildDependencies)) {
    if (name in project.dependencies) continue
    requests.push({ name, constraint: parseConstraint(text) })
  }
  return requests
}

/**
 * @throws ValidationError when `luaVersion` is outside the project's `lua` constraint
 */
export function checkLuaVersion(project: Project, luaVersion: string): void {
  if (project.lua === undefined) return
  if (!satisfies(parseConstraint(project.lua), parseVersion(luaVersion))) {
    throw new ValidationError(`Lua ${luaVersion} does not satisfy the project's lua constraint ${project.lua}`, {
      path: project.path,
    })
  }
}
