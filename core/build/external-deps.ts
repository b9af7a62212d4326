/**
 * External dependency probing
 *
 * For each `external_dependencies` entry: pkg-config, then
 * `<NAME>_DIR` / `<NAME>_INCDIR` / `<NAME>_LIBDIR` from the environment
 * or configured variables, then the search prefixes.
 */

import { join } from 'node:path'
import type { Config } from '../config/index.js'
import { ExternalDependencyNotFoundError, ToolNotFoundError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { CommandRunner } from '../process/index.js'
import type { ExternalDependencySpec, PackageDescriptor } from '../rockspec/index.js'
import { isFile } from './collect.js'
import { toolchainDefaults } from './variables.js'
import type { ExternalDependencyInfo } from './types.js'

export interface ProbeOptions {
  config: Config
  runner: CommandRunner
  env?: Record<string, string | undefined>
  signal?: AbortSignal
}

const LIB_SUBDIRS = ['lib', 'lib64', 'lib/x86_64-linux-gnu', 'lib/aarch64-linux-gnu']

function libraryNames(library: string, config: Config): string[] {
  if (config.platform === 'windows') {
    return [`${library}.lib`, `${library}.dll`]
  }
  const shared = config.platform === 'macosx' ? 'dylib' : toolchainDefaults(config.platform).LIB_EXTENSION
  return [`lib${library}.${shared}`, `lib${library}.a`]
}

async function hasLibrary(libdir: string, library: string, config: Config): Promise<boolean> {
  for (const file of libraryNames(library, config)) {
    if (await isFile(join(libdir, file))) return true
  }
  return false
}

async function fromPkgConfig(name: string, options: ProbeOptions): Promise<ExternalDependencyInfo | undefined> {
  const module = name.toLowerCase()
  const pkgConfig = (args: string[]) => options.runner.run('pkg-config', args, { signal: options.signal })

  try {
    const exists = await pkgConfig(['--exists', module])
    if (exists.exitCode !== 0) return undefined
  } catch (error) {
    if (error instanceof ToolNotFoundError) return undefined
    throw error
  }

  const variable = async (key: string): Promise<string | undefined> => {
    const result = await pkgConfig([`--variable=${key}`, module])
    const value = result.stdout.trim()
    return result.exitCode === 0 && value !== '' ? value : undefined
  }
  return { dir: await variable('prefix'), incdir: await variable('includedir'), libdir: await variable('libdir') }
}

async function fromVariables(
  name: string,
  spec: ExternalDependencySpec,
  options: ProbeOptions
): Promise<ExternalDependencyInfo | undefined> {
  const env = options.env ?? process.env
  const lookup = (key: string): string | undefined => env[key] ?? options.config.variables[key]

  const dir = lookup(`${name}_DIR`)
  const incdir = lookup(`${name}_INCDIR`) ?? (dir !== undefined ? join(dir, 'include') : undefined)
  const libdir = lookup(`${name}_LIBDIR`) ?? (dir !== undefined ? join(dir, 'lib') : undefined)
  if (dir === undefined && incdir === undefined && libdir === undefined) return undefined

  if (spec.header !== undefined && (incdir === undefined || !(await isFile(join(incdir, spec.header))))) {
    return undefined
  }
  if (spec.library !== undefined && (libdir === undefined || !(await hasLibrary(libdir, spec.library, options.config)))) {
    return undefined
  }
  return { dir, incdir, libdir }
}

async function fromPrefixes(spec: ExternalDependencySpec, options: ProbeOptions): Promise<ExternalDependencyInfo | undefined> {
  for (const prefix of options.config.searchPrefixes) {
    const incdir = join(prefix, 'include')
    if (spec.header !== undefined && !(await isFile(join(incdir, spec.header)))) continue

    let libdir: string | undefined
    if (spec.library !== undefined) {
      for (const sub of LIB_SUBDIRS) {
        if (await hasLibrary(join(prefix, sub), spec.library, options.config)) {
          libdir = join(prefix, sub)
          break
        }
      }
      if (libdir === undefined) continue
    }

    return { dir: prefix, incdir, libdir: libdir ?? join(prefix, 'lib') }
  }
  return undefined
}

export async function probeExternalDependency(
  name: string,
  spec: ExternalDependencySpec,
  options: ProbeOptions
): Promise<ExternalDependencyInfo | undefined> {
  return (
    (await fromPkgConfig(name, options)) ??
    (await fromVariables(name, spec, options)) ??
    (await fromPrefixes(spec, options))
  )
}

/**
 * Probe every external dependency of a descriptor, keyed by upper-case name
 */
export async function probeExternalDependencies(
  descriptor: PackageDescriptor,
  options: ProbeOptions
): Promise<Record<string, ExternalDependencyInfo>> {
  const found: Record<string, ExternalDependencyInfo> = {}
  for (const [rawName, spec] of Object.entries(descriptor.externalDependencies)) {
    const name = rawName.toUpperCase()
    const info = await probeExternalDependency(name, spec, options)
    if (!info) {
      throw new ExternalDependencyNotFoundError(rawName, descriptor.name)
    }
    logger.debug(`Found external dependency ${name} for ${descriptor.name}: ${info.incdir ?? info.dir ?? ''}`)
    found[name] = info
  }
  return found
}
