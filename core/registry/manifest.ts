/**
 * Server manifests
 *
 * A LuaRocks server publishes `manifest-<lua version>`, a Lua file of the
 * form
 *
 * ```lua
 * repository = {
 *   luasocket = {
 *     ["3.1.0-1"] = { { arch = "rockspec" }, { arch = "src" } },
 *   },
 * }
 * ```
 *
 * Only versions that ship a rockspec are listed; binary-only uploads
 * cannot be built from source.
 *
 * @module core/registry/manifest
 */

import { MalformedIndexError, ParseError } from '../errors/index.js'
import { logger } from '../logger.js'
import { evaluateLua, isTable, isValidPackageName } from '../rockspec/index.js'
import type { LuaTable, PackageName } from '../rockspec/index.js'
import { sort, tryParseVersion } from '../version/index.js'
import type { Version } from '../version/index.js'

/** Package name -> versions, ascending */
export type Manifest = ReadonlyMap<PackageName, readonly Version[]>

export function parseManifest(text: string, source?: string): Manifest {
  let globals: LuaTable
  try {
    globals = evaluateLua(text, source)
  } catch (error) {
    if (error instanceof ParseError) {
      throw new MalformedIndexError(`unreadable manifest: ${error.message}`, source)
    }
    throw error
  }

  const repository = globals.get('repository')
  if (!isTable(repository)) {
    throw new MalformedIndexError('manifest has no "repository" table', source)
  }

  const packages = new Map<PackageName, Version[]>()
  for (const [rawName, entry] of repository.fields()) {
    if (!isTable(entry)) {
      throw new MalformedIndexError(`manifest entry for "${rawName}" is not a table`, source)
    }
    if (!isValidPackageName(rawName)) {
      logger.debug(`Skipping manifest entry with invalid name "${rawName}"`)
      continue
    }

    const name = rawName.toLowerCase()
    const versions = packages.get(name) ?? []
    for (const [rawVersion, arches] of entry.fields()) {
      if (!isTable(arches)) {
        throw new MalformedIndexError(`manifest entry for "${rawName} ${rawVersion}" is not a table`, source)
      }
      if (!hasRockspec(arches)) continue

      const version = tryParseVersion(rawVersion)
      if (!version) {
        logger.debug(`Skipping unparseable version "${rawVersion}" of ${name}`)
        continue
      }
      versions.push(version)
    }
    packages.set(name, versions)
  }

  const manifest = new Map<PackageName, readonly Version[]>()
  for (const [name, versions] of packages) {
    manifest.set(name, Object.freeze(sort(versions)))
  }
  return manifest
}

function hasRockspec(arches: LuaTable): boolean {
  return arches.list().some((item) => isTable(item) && item.get('arch') === 'rockspec')
}
